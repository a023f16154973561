/**
 * Record types for data exchanged between loaders and the reconciliation engine
 */

/** Generic record type - one row of data keyed by attribute name */
export type Record = {
  [key: string]: unknown;
};

/**
 * Name-based view over a record.
 *
 * The field resolver only ever looks at attribute names, so anything that can
 * hand out a name -> value mapping can take part in a reconciliation run.
 */
export interface AttributeView {
  /** Attribute name to value, in the order the source exposed them */
  attributes(): Readonly<Record>;
}

/** Result of reading a record source */
export interface ReadResult {
  /** The retrieved records */
  records: Record[];
  /** Total count before any row was dropped */
  totalCount: number;
}
