export { summarizeBookings } from './booking-summary.js';
export type { BookingSummary } from './booking-summary.js';
