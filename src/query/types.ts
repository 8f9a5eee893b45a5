/**
 * Parameters of one standard (non-bulk) request. Built exclusively via
 * QueryBuilder; a built Query never changes afterwards.
 */
export interface QueryDefinition {
  readonly resource: string;
  /** Direct entity access: `Resource('key')`. */
  readonly key: string | null;
  /** Opaque OData boolean expression, sent verbatim. */
  readonly filter: string | null;
  readonly select: readonly string[] | null;
  readonly expand: readonly string[] | null;
  /** Pre-combined `"field direction"`. */
  readonly orderBy: string | null;
  readonly top: number | null;
  readonly skip: number | null;
  /** Embed `@odata.count` alongside the records. */
  readonly count: boolean;
  /** Request the `/$count` endpoint instead of records. */
  readonly countOnly: boolean;
  /** Opaque aggregation expression. */
  readonly apply: string | null;
}

/**
 * Parameters of one replication (bulk) request. Only filter, select and
 * top exist on this endpoint.
 */
export interface ReplicationQueryDefinition {
  readonly resource: string;
  readonly filter: string | null;
  readonly select: readonly string[] | null;
  readonly top: number | null;
}
