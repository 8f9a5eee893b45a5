export { query } from './query/query-object.js';
export { QueryBuilder, ReplicationQueryBuilder, MAX_REPLICATION_TOP } from './query/builder.js';
export { Query, ReplicationQuery } from './query/query.js';
export type { QueryDefinition, ReplicationQueryDefinition } from './query/types.js';
export { ReplicationResponse } from './replication/response.js';
export type {
  ODataRecord,
  ODataCollection,
  Transport,
  TransportRequest,
  TransportResponse,
  ResponseHeaders,
  ResoApi,
} from './types.js';
export { ResoClient } from './client/reso-client.js';
export type { ResoClientOptions } from './client/reso-client.js';
export { FetchTransport } from './client/transport.js';
export { createClientConfig, configFromEnv, describeConfig, DEFAULT_TIMEOUT_MS } from './client/config.js';
export type { ClientConfig, ClientConfigOptions } from './client/config.js';
export { createLogger } from './logger.js';
export {
  ResoError,
  HttpStatusError,
  ConfigError,
  NetworkError,
  UnauthorizedError,
  ForbiddenError,
  NotFoundError,
  RateLimitedError,
  ServerError,
  ODataError,
  ParseError,
  InvalidQueryError,
  errorFromStatus,
} from './errors.js';
export type { ResoErrorKind, AnyResoError } from './errors.js';
