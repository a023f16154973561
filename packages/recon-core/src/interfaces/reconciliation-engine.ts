/**
 * Reconciliation Engine Interface
 */

import type { AttributeView } from '@termrecon/core';
import type { ReconciliationResult } from '../types/index.js';

/** Term sheet seen as canonical field name -> value */
export type TermSheetView = Readonly<{ [field: string]: unknown }>;

/**
 * Compares one term sheet against a collection of booking records.
 * Synchronous and free of I/O; never throws for data problems.
 */
export interface IReconciliationEngine {
  /**
   * @param termSheet - Extracted term sheet
   * @param bookingRecords - Booking rows, in the order results should come back
   * @returns One result per candidate booking record; empty on caller error
   */
  reconcile(
    termSheet: TermSheetView | null | undefined,
    bookingRecords: readonly AttributeView[] | null | undefined
  ): ReconciliationResult[];
}
