import type { QueryDefinition, ReplicationQueryDefinition } from './types.js';
import { Query, ReplicationQuery } from './query.js';
import { InvalidQueryError } from '../errors.js';

/** Upper bound of `$top` on the replication endpoint. */
export const MAX_REPLICATION_TOP = 2000;

const MAX_UINT32 = 4294967295;

function emptyDefinition(resource: string, key: string | null): QueryDefinition {
  return {
    resource,
    key,
    filter: null,
    select: null,
    expand: null,
    orderBy: null,
    top: null,
    skip: null,
    count: false,
    countOnly: false,
    apply: null,
  };
}

function toFieldList(fields: readonly (string | readonly string[])[]): readonly string[] {
  return fields.flat();
}

function assertResource(resource: string): void {
  if (resource.length === 0) {
    throw new InvalidQueryError('Resource name cannot be empty');
  }
}

function assertUint32(param: '$top' | '$skip', value: number | null): void {
  if (value === null) return;
  if (!Number.isInteger(value) || value < 0 || value > MAX_UINT32) {
    throw new InvalidQueryError(`${param} must be a non-negative integer, got ${value}`);
  }
}

const UNPAIRED_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/** Percent-encoding is only defined for well-formed UTF-16. */
function assertWellFormed(param: string, value: string | null): void {
  if (value !== null && UNPAIRED_SURROGATE.test(value)) {
    throw new InvalidQueryError(`${param} contains an unpaired surrogate`);
  }
}

/**
 * Key access addresses a single entity, so none of the collection
 * parameters apply to it. Checked in a fixed order; the first conflict wins.
 */
function assertKeyAccessCompatible(def: QueryDefinition): void {
  const conflicts: Array<[boolean, string]> = [
    [def.filter !== null, '$filter'],
    [def.top !== null, '$top'],
    [def.skip !== null, '$skip'],
    [def.orderBy !== null, '$orderby'],
    [def.apply !== null, '$apply'],
    [def.count || def.countOnly, '$count'],
  ];
  for (const [isSet, param] of conflicts) {
    if (isSet) {
      throw new InvalidQueryError(`Key access cannot be used with ${param}`);
    }
  }
}

/**
 * Fluent immutable query builder. Every setter returns a new QueryBuilder
 * and overwrites whatever the previous value of that field was; existing
 * instances are never mutated. Validation happens once, in build().
 */
export class QueryBuilder {
  private constructor(private readonly _def: QueryDefinition) {}

  /** Start a collection query against the given resource. */
  static create(resource: string): QueryBuilder {
    return new QueryBuilder(emptyDefinition(resource, null));
  }

  /** Start a direct key access query: `Resource('key')`. */
  static byKey(resource: string, key: string): QueryBuilder {
    return new QueryBuilder(emptyDefinition(resource, key));
  }

  private with(patch: Partial<QueryDefinition>): QueryBuilder {
    return new QueryBuilder({ ...this._def, ...patch });
  }

  /**
   * Set the OData filter expression. The text is not parsed; it is
   * percent-encoded and sent as-is.
   */
  filter(expression: string): QueryBuilder {
    return this.with({ filter: expression });
  }

  /** Set an aggregation expression, e.g. `groupby((City))`. */
  apply(expression: string): QueryBuilder {
    return this.with({ apply: expression });
  }

  /** The direction is passed through unchecked; servers accept `asc` and `desc`. */
  orderBy(field: string, direction: string): QueryBuilder {
    return this.with({ orderBy: `${field} ${direction}` });
  }

  select(...fields: (string | readonly string[])[]): QueryBuilder {
    return this.with({ select: toFieldList(fields) });
  }

  expand(...fields: (string | readonly string[])[]): QueryBuilder {
    return this.with({ expand: toFieldList(fields) });
  }

  top(n: number): QueryBuilder {
    return this.with({ top: n });
  }

  skip(n: number): QueryBuilder {
    return this.with({ skip: n });
  }

  /** Include `@odata.count` in the response alongside the records. */
  withCount(): QueryBuilder {
    return this.with({ count: true });
  }

  /** Request only the number of matching records via `/$count`. */
  count(): QueryBuilder {
    return this.with({ countOnly: true });
  }

  /**
   * Validates the accumulated parameters and returns the frozen Query.
   *
   * @throws InvalidQueryError when key access is combined with a
   *   collection parameter, the resource is empty, $top/$skip is out
   *   of range, or a percent-encoded parameter holds an unpaired surrogate.
   */
  build(): Query {
    const def = this._def;
    assertResource(def.resource);
    if (def.key !== null) {
      assertKeyAccessCompatible(def);
    }
    assertUint32('$top', def.top);
    assertUint32('$skip', def.skip);
    assertWellFormed('key', def.key);
    assertWellFormed('$filter', def.filter);
    assertWellFormed('$apply', def.apply);
    assertWellFormed('$orderby', def.orderBy);
    return new Query(def);
  }
}

/**
 * Builder for the replication endpoint. It has no key, skip, orderby,
 * apply or count setters because the endpoint supports none of them.
 */
export class ReplicationQueryBuilder {
  private constructor(private readonly _def: ReplicationQueryDefinition) {}

  static create(resource: string): ReplicationQueryBuilder {
    return new ReplicationQueryBuilder({ resource, filter: null, select: null, top: null });
  }

  private with(patch: Partial<ReplicationQueryDefinition>): ReplicationQueryBuilder {
    return new ReplicationQueryBuilder({ ...this._def, ...patch });
  }

  filter(expression: string): ReplicationQueryBuilder {
    return this.with({ filter: expression });
  }

  select(...fields: (string | readonly string[])[]): ReplicationQueryBuilder {
    return this.with({ select: toFieldList(fields) });
  }

  /** Page size, at most 2000. */
  top(n: number): ReplicationQueryBuilder {
    return this.with({ top: n });
  }

  build(): ReplicationQuery {
    const def = this._def;
    assertResource(def.resource);
    assertUint32('$top', def.top);
    assertWellFormed('$filter', def.filter);
    if (def.top !== null && def.top > MAX_REPLICATION_TOP) {
      throw new InvalidQueryError(
        `Replication $top cannot exceed ${MAX_REPLICATION_TOP}, got ${def.top}`,
      );
    }
    return new ReplicationQuery(def);
  }
}
