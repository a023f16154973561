/**
 * Collaborator interfaces
 *
 * The reconciliation engine never does I/O. Booking data and term sheets are
 * handed to it by sources implementing these interfaces.
 */

import type { ReadResult, TermSheetData } from '../types/index.js';

/** Configuration common to all record sources */
export interface ConnectorConfig {
  /** Unique identifier for this source */
  id: string;
  /** Human-readable name */
  name: string;
  /** Source type (csv, json, excel, ...) */
  type: string;
}

/** Connection state */
export type ConnectionState = 'disconnected' | 'connecting' | 'connected' | 'error';

/**
 * Read-only source of raw booking rows
 */
export interface IRecordSource<TConfig extends ConnectorConfig = ConnectorConfig> {
  readonly config: TConfig;

  readonly state: ConnectionState;

  /**
   * Open the source and materialize its rows
   * @throws ConnectorError if the source cannot be read
   */
  connect(): Promise<void>;

  /** Release materialized rows */
  disconnect(): Promise<void>;

  /** Rows in source order */
  readRecords(): Promise<ReadResult>;
}

/**
 * Produces a structured term sheet from a document.
 *
 * Implementations (PDF text extraction, model-based extraction, a saved JSON
 * file) own their own timeouts and cancellation.
 */
export interface TermSheetSource {
  readTermSheet(): Promise<TermSheetData>;
}
