export {
  termSheetSchema,
  tradeIdSchema,
  DEFAULT_TRADE_ID_FIELDS,
  bookingValueSchema,
  bookingRowSchema,
} from './schemas.js';
export type { TermSheetInput, BookingRowInput } from './schemas.js';
