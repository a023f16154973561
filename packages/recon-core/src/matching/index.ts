export { RecordMatcher } from './record-matcher.js';
export type { RecordMatcherOptions } from './record-matcher.js';
