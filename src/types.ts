import type { Query, ReplicationQuery } from './query/query.js';
import type { ReplicationResponse } from './replication/response.js';

/** A single entity as returned by the server; fields depend on the resource. */
export type ODataRecord = Record<string, unknown>;

/** The JSON envelope of a collection response. */
export interface ODataCollection<R = ODataRecord> {
  value: R[];
  '@odata.context'?: string;
  '@odata.count'?: number;
  '@odata.nextLink'?: string;
  [annotation: string]: unknown;
}

export interface TransportRequest {
  url: string;
  accept: string;
  token: string;
  timeoutMs: number;
}

export interface ResponseHeaders {
  get(name: string): string | null;
}

export interface TransportResponse {
  status: number;
  headers: ResponseHeaders;
  body: string;
}

/**
 * Executes one authenticated GET. Implementations reject with
 * NetworkError when no status was received; any status, success or not,
 * resolves.
 */
export interface Transport {
  execute(request: TransportRequest): Promise<TransportResponse>;
}

export interface ResoApi {
  execute(query: Query): Promise<ODataCollection>;
  executeByKey(query: Query): Promise<ODataRecord>;
  executeCount(query: Query): Promise<number>;
  fetchMetadata(): Promise<string>;
  executeReplication(query: ReplicationQuery): Promise<ReplicationResponse>;
  executeNextLink(nextLink: string): Promise<ReplicationResponse>;
  replicate(query: ReplicationQuery): AsyncIterable<ReplicationResponse>;
  replicateRecords(query: ReplicationQuery): AsyncIterable<ODataRecord>;
}
