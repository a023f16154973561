export { BookingRecord } from './booking-record.js';
