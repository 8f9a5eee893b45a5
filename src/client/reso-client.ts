import type { Logger } from 'pino';
import type { Query, ReplicationQuery } from '../query/query.js';
import type { ODataCollection, ODataRecord, ResoApi, Transport, TransportResponse } from '../types.js';
import { ReplicationResponse } from '../replication/response.js';
import { errorFromStatus } from '../errors.js';
import { createLogger } from '../logger.js';
import { configFromEnv, describeConfig, type ClientConfig } from './config.js';
import { FetchTransport } from './transport.js';
import {
  decodeCollection,
  decodeCount,
  decodeRecord,
  decodeReplicationRecords,
  extractNextLink,
} from './decode.js';

const ACCEPT_JSON = 'application/json';
const ACCEPT_TEXT = 'text/plain';
const ACCEPT_XML = 'application/xml';

export interface ResoClientOptions {
  config: ClientConfig;
  transport?: Transport;
  logger?: Logger;
}

export class ResoClient implements ResoApi {
  private readonly config: ClientConfig;
  private readonly transport: Transport;
  private readonly logger: Logger;

  constructor(options: ResoClientOptions) {
    this.config = options.config;
    this.transport = options.transport ?? new FetchTransport();
    this.logger = options.logger ?? createLogger('reso-client');
    this.logger.debug({ config: describeConfig(this.config) }, 'client created');
  }

  /**
   * Creates a client from RESO_BASE_URL, RESO_TOKEN, RESO_DATASET_ID and
   * RESO_TIMEOUT.
   *
   * @throws ConfigError when a required variable is missing.
   */
  static fromEnv(options: Omit<ResoClientOptions, 'config'> = {}): ResoClient {
    return new ResoClient({ ...options, config: configFromEnv() });
  }

  get baseUrl(): string {
    return this.config.baseUrl;
  }

  /** `{baseUrl}/{datasetId}/{path}`, or `{baseUrl}/{path}` without a dataset id. */
  buildUrl(path: string): string {
    const { baseUrl, datasetId } = this.config;
    return datasetId !== undefined ? `${baseUrl}/${datasetId}/${path}` : `${baseUrl}/${path}`;
  }

  private async send(url: string, accept: string): Promise<TransportResponse> {
    const response = await this.transport.execute({
      url,
      accept,
      token: this.config.token,
      timeoutMs: this.config.timeoutMs,
    });
    if (response.status < 200 || response.status > 299) {
      throw errorFromStatus(response.status, response.body);
    }
    return response;
  }

  /** Executes a collection query and returns the decoded OData envelope. */
  async execute(query: Query): Promise<ODataCollection> {
    const url = this.buildUrl(query.toODataString());
    this.logger.info({ url }, 'executing query');

    const response = await this.send(url, ACCEPT_JSON);
    const collection = decodeCollection(response.body);
    this.logger.debug({ records: collection.value.length }, 'query result');
    return collection;
  }

  /**
   * Executes a key access query (`Property('12345')`). The server answers
   * with the entity itself rather than a `value` envelope.
   */
  async executeByKey(query: Query): Promise<ODataRecord> {
    const url = this.buildUrl(query.toODataString());
    this.logger.info({ url }, 'executing key access query');

    const response = await this.send(url, ACCEPT_JSON);
    return decodeRecord(response.body);
  }

  /** Executes a `/$count` query and returns the plain-text count. */
  async executeCount(query: Query): Promise<number> {
    const url = this.buildUrl(query.toODataString());
    this.logger.info({ url }, 'executing count query');

    const response = await this.send(url, ACCEPT_TEXT);
    const count = decodeCount(response.body);
    this.logger.info({ count }, 'count result');
    return count;
  }

  /** Fetches the raw `$metadata` XML document. */
  async fetchMetadata(): Promise<string> {
    const url = this.buildUrl('$metadata');
    this.logger.info({ url }, 'fetching metadata');

    const response = await this.send(url, ACCEPT_XML);
    return response.body;
  }

  private async fetchPage(url: string): Promise<ReplicationResponse> {
    const response = await this.send(url, ACCEPT_JSON);
    // The cursor travels in the headers, not the body.
    const nextLink = extractNextLink(response.headers);
    this.logger.debug({ nextLink }, 'next link from headers');

    const records = decodeReplicationRecords(response.body);
    this.logger.debug({ records: records.length }, 'replication page');
    return new ReplicationResponse(records, nextLink);
  }

  /** Fetches the first page of a replication walk. */
  async executeReplication(query: ReplicationQuery): Promise<ReplicationResponse> {
    const url = this.buildUrl(query.toODataString());
    this.logger.info({ url }, 'executing replication query');
    return this.fetchPage(url);
  }

  /**
   * Fetches the page a previous response's next link points to. The link
   * is an absolute URL and is requested exactly as received.
   */
  async executeNextLink(nextLink: string): Promise<ReplicationResponse> {
    this.logger.info({ url: nextLink }, 'executing next link');
    return this.fetchPage(nextLink);
  }

  /**
   * Walks a replication query page by page, following each next link in
   * turn until the server stops sending one. Failures end the walk.
   */
  async *replicate(query: ReplicationQuery): AsyncGenerator<ReplicationResponse> {
    let page = await this.executeReplication(query);
    yield page;

    let nextLink = page.nextLink();
    while (nextLink !== null) {
      page = await this.executeNextLink(nextLink);
      yield page;
      nextLink = page.nextLink();
    }
  }

  /** Like replicate(), but yields the individual records in server order. */
  async *replicateRecords(query: ReplicationQuery): AsyncGenerator<ODataRecord> {
    for await (const page of this.replicate(query)) {
      yield* page.records;
    }
  }
}
