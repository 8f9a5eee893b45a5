import { QueryBuilder, ReplicationQueryBuilder } from './builder.js';

/**
 * Entry point for the query DSL.
 *
 * @example
 * query.resource('Property')
 *   .filter("City eq 'Austin' and ListPrice gt 500000")
 *   .select('ListingKey', 'City', 'ListPrice')
 *   .orderBy('ListPrice', 'desc')
 *   .top(10)
 *   .build()
 *
 * query.byKey('Property', '12345').expand('ListOffice').build()
 *
 * query.replication('Property').top(2000).build()
 */
export const query = {
  resource(name: string): QueryBuilder {
    return QueryBuilder.create(name);
  },
  byKey(name: string, key: string): QueryBuilder {
    return QueryBuilder.byKey(name, key);
  },
  replication(name: string): ReplicationQueryBuilder {
    return ReplicationQueryBuilder.create(name);
  },
};
