export { FieldResolver } from './field-resolver.js';
export type { FieldResolution } from './field-resolver.js';
