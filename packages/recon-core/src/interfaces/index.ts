export type { IReconciliationEngine, TermSheetView } from './reconciliation-engine.js';
