import type { QueryDefinition, ReplicationQueryDefinition } from './types.js';
import { compileQuery, compileReplicationQuery } from './compiler.js';

/**
 * A validated, frozen standard query. Obtain one from QueryBuilder.build().
 */
export class Query implements QueryDefinition {
  readonly resource: string;
  readonly key: string | null;
  readonly filter: string | null;
  readonly select: readonly string[] | null;
  readonly expand: readonly string[] | null;
  readonly orderBy: string | null;
  readonly top: number | null;
  readonly skip: number | null;
  readonly count: boolean;
  readonly countOnly: boolean;
  readonly apply: string | null;

  /** @internal */
  constructor(definition: QueryDefinition) {
    this.resource = definition.resource;
    this.key = definition.key;
    this.filter = definition.filter;
    this.select = definition.select === null ? null : Object.freeze([...definition.select]);
    this.expand = definition.expand === null ? null : Object.freeze([...definition.expand]);
    this.orderBy = definition.orderBy;
    this.top = definition.top;
    this.skip = definition.skip;
    this.count = definition.count;
    this.countOnly = definition.countOnly;
    this.apply = definition.apply;
    Object.freeze(this);
  }

  get isKeyAccess(): boolean {
    return this.key !== null;
  }

  /** True when the query targets `/$count` (key access takes precedence). */
  get isCountOnly(): boolean {
    return this.key === null && this.countOnly;
  }

  /**
   * @example
   * query.resource('Property').filter("City eq 'Austin'").top(10).build().toODataString()
   * // "Property?$filter=City%20eq%20%27Austin%27&$top=10"
   */
  toODataString(): string {
    return compileQuery(this);
  }
}

/**
 * A validated, frozen replication query. Obtain one from
 * ReplicationQueryBuilder.build().
 */
export class ReplicationQuery implements ReplicationQueryDefinition {
  readonly resource: string;
  readonly filter: string | null;
  readonly select: readonly string[] | null;
  readonly top: number | null;

  /** @internal */
  constructor(definition: ReplicationQueryDefinition) {
    this.resource = definition.resource;
    this.filter = definition.filter;
    this.select = definition.select === null ? null : Object.freeze([...definition.select]);
    this.top = definition.top;
    Object.freeze(this);
  }

  toODataString(): string {
    return compileReplicationQuery(this);
  }
}
