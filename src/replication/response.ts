import type { ODataRecord } from '../types.js';

/**
 * One page of a replication walk. The next link is an opaque absolute
 * URL taken from the response headers; it is handed back verbatim to
 * ResoClient.executeNextLink() and never parsed.
 */
export class ReplicationResponse<R = ODataRecord> {
  readonly records: readonly R[];
  readonly recordCount: number;
  private readonly _nextLink: string | null;

  constructor(records: readonly R[], nextLink: string | null = null) {
    this.records = Object.freeze([...records]);
    this.recordCount = this.records.length;
    this._nextLink = nextLink;
    Object.freeze(this);
  }

  hasMore(): boolean {
    return this._nextLink !== null;
  }

  nextLink(): string | null {
    return this._nextLink;
  }
}
