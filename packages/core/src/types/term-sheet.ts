/**
 * Term sheet types
 */

import type { z } from 'zod';
import type { termSheetSchema } from '../validation/schemas.js';

/**
 * Terms extracted from a term sheet document.
 *
 * Every attribute is optional: `undefined` or `null` means the extractor did
 * not find it, which is not the same thing as `''` or `0`.
 */
export type TermSheetData = Readonly<z.infer<typeof termSheetSchema>>;

/** Canonical field names known to the term sheet model */
export type TermSheetField = keyof TermSheetData;
