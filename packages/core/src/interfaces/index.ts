export type {
  ConnectorConfig,
  ConnectionState,
  IRecordSource,
  TermSheetSource,
} from './connector.js';
