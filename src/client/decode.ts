import { z } from 'zod';
import type { ODataCollection, ODataRecord, ResponseHeaders } from '../types.js';
import { ParseError } from '../errors.js';

const RecordSchema = z.record(z.unknown());

const CollectionSchema = z
  .object({
    value: z.array(RecordSchema),
    '@odata.context': z.string().optional(),
    '@odata.count': z.number().optional(),
    '@odata.nextLink': z.string().optional(),
  })
  .passthrough();

/** A replication page whose `value` is missing or not an array has no records. */
const ReplicationPageSchema = z.object({
  value: z.array(z.unknown()).catch([]),
});

const ReplicationRecordsSchema = z.array(RecordSchema);

/** Response headers that carry the replication cursor, in priority order. */
export const NEXT_LINK_HEADERS = ['next', 'link'] as const;

export function parseJson(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch (err) {
    throw new ParseError(`Failed to parse JSON: ${err instanceof Error ? err.message : String(err)}`, err);
  }
}

export function decodeCollection(body: string): ODataCollection {
  const parsed = CollectionSchema.safeParse(parseJson(body));
  if (!parsed.success) {
    throw new ParseError(`Unexpected collection response: ${parsed.error.message}`, parsed.error);
  }
  return parsed.data;
}

export function decodeRecord(body: string): ODataRecord {
  const parsed = RecordSchema.safeParse(parseJson(body));
  if (!parsed.success) {
    throw new ParseError(`Unexpected entity response: ${parsed.error.message}`, parsed.error);
  }
  return parsed.data;
}

export function decodeReplicationRecords(body: string): ODataRecord[] {
  const page = ReplicationPageSchema.safeParse(parseJson(body));
  if (!page.success) return [];
  const records = ReplicationRecordsSchema.safeParse(page.data.value);
  if (!records.success) {
    throw new ParseError(`Unexpected replication record: ${records.error.message}`, records.error);
  }
  return records.data;
}

export function decodeCount(body: string): number {
  const text = body.trim();
  if (!/^\d+$/.test(text)) {
    throw new ParseError(`Failed to parse count '${text}'`);
  }
  const count = Number(text);
  if (!Number.isSafeInteger(count)) {
    throw new ParseError(`Failed to parse count '${text}': exceeds the safe integer range`);
  }
  return count;
}

export function extractNextLink(headers: ResponseHeaders): string | null {
  for (const name of NEXT_LINK_HEADERS) {
    const value = headers.get(name);
    if (value !== null) return value;
  }
  return null;
}
