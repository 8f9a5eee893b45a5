import type { QueryDefinition, ReplicationQueryDefinition } from './types.js';

/**
 * Percent-encodes a URL component, leaving only the RFC 3986 unreserved
 * characters as-is. encodeURIComponent alone keeps `!'()*` literal, and
 * OData string literals are quoted with `'`.
 */
export function encodeComponent(value: string): string {
  return encodeURIComponent(value).replace(
    /[!'()*]/g,
    (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`,
  );
}

/** Field lists are identifiers and stay unencoded, commas included. */
function joinFields(fields: readonly string[]): string {
  return fields.join(',');
}

function withParams(path: string, params: string[]): string {
  return params.length > 0 ? `${path}?${params.join('&')}` : path;
}

/**
 * Compiles a key-access query: `Resource('key')` with optional
 * `$select` and `$expand`.
 */
function compileKeyAccess(query: QueryDefinition, key: string): string {
  const params: string[] = [];
  if (query.select !== null) params.push(`$select=${joinFields(query.select)}`);
  if (query.expand !== null) params.push(`$expand=${joinFields(query.expand)}`);
  return withParams(`${query.resource}('${encodeComponent(key)}')`, params);
}

/**
 * Compiles a count-only query. Only the filter is carried over; any other
 * parameter set on the query is dropped.
 */
function compileCountOnly(query: QueryDefinition): string {
  const params: string[] = [];
  if (query.filter !== null) params.push(`$filter=${encodeComponent(query.filter)}`);
  return withParams(`${query.resource}/$count`, params);
}

/**
 * Compiles a collection query. Parameters are emitted in a fixed order:
 * $apply, $filter, $select, $expand, $orderby, $top, $skip, $count.
 */
function compileCollection(query: QueryDefinition): string {
  const params: string[] = [];
  if (query.apply !== null) params.push(`$apply=${encodeComponent(query.apply)}`);
  if (query.filter !== null) params.push(`$filter=${encodeComponent(query.filter)}`);
  if (query.select !== null) params.push(`$select=${joinFields(query.select)}`);
  if (query.expand !== null) params.push(`$expand=${joinFields(query.expand)}`);
  if (query.orderBy !== null) params.push(`$orderby=${encodeComponent(query.orderBy)}`);
  if (query.top !== null) params.push(`$top=${query.top}`);
  if (query.skip !== null) params.push(`$skip=${query.skip}`);
  if (query.count) params.push('$count=true');
  return withParams(query.resource, params);
}

/**
 * Compiles a QueryDefinition into the path and query string appended to
 * the service root. Total over any built Query.
 */
export function compileQuery(query: QueryDefinition): string {
  if (query.key !== null) {
    return compileKeyAccess(query, query.key);
  }
  if (query.countOnly) {
    return compileCountOnly(query);
  }
  return compileCollection(query);
}

/** Compiles a replication query: `Resource/replication?$filter&$select&$top`. */
export function compileReplicationQuery(query: ReplicationQueryDefinition): string {
  const params: string[] = [];
  if (query.filter !== null) params.push(`$filter=${encodeComponent(query.filter)}`);
  if (query.select !== null) params.push(`$select=${joinFields(query.select)}`);
  if (query.top !== null) params.push(`$top=${query.top}`);
  return withParams(`${query.resource}/replication`, params);
}
