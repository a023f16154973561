export { isAbsent, snapshotAttributes, stringifyValue } from './records.js';
