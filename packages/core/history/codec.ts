/**
 * Durable index format: a JSON array of
 * `{ id, content, timestamp, entry_type, metadata }`, most recent first.
 */
import { z } from "zod";
import { ClipboardEntry, createEntry } from "../models/ClipboardEntry";
import { PersistenceError, describeError } from "../errors";

const MetadataSchema = z.record(
  z.string(),
  z.union([z.string(), z.number(), z.boolean(), z.null()])
);

export const IndexRecordSchema = z.object({
  id: z.string().min(1).optional(),
  content: z.string(),
  timestamp: z.number().finite(),
  entry_type: z.string().min(1).default("text"),
  metadata: MetadataSchema.default({}),
});

export type IndexRecord = z.input<typeof IndexRecordSchema>;

export interface DecodedIndex {
  entries: ClipboardEntry[];
  /** Positions of records that failed validation and were dropped. */
  skipped: number[];
}

export function toIndexRecord(entry: ClipboardEntry): IndexRecord {
  return {
    id: entry.id,
    content: entry.content,
    timestamp: entry.timestamp,
    entry_type: entry.entryType,
    metadata: { ...entry.metadata },
  };
}

export function encodeIndex(entries: readonly ClipboardEntry[]): string {
  return JSON.stringify(entries.map(toIndexRecord), null, 2);
}

export function decodeIndex(raw: string, makeId: () => string): DecodedIndex {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new PersistenceError(`Index is not valid JSON: ${describeError(err)}`, { cause: err });
  }
  if (!Array.isArray(parsed)) {
    throw new PersistenceError("Index must be a JSON array");
  }

  const entries: ClipboardEntry[] = [];
  const skipped: number[] = [];
  parsed.forEach((item: unknown, position: number) => {
    const result = IndexRecordSchema.safeParse(item);
    if (!result.success) {
      skipped.push(position);
      return;
    }
    const record = result.data;
    entries.push(
      createEntry({
        id: record.id ?? makeId(),
        content: record.content,
        timestamp: record.timestamp,
        entryType: record.entry_type,
        metadata: record.metadata,
      })
    );
  });
  return { entries, skipped };
}

/** Ciphertext file name for an entry: truncated integer timestamp. */
export function blobNameFor(entry: Pick<ClipboardEntry, "timestamp">): string {
  return `${Math.trunc(entry.timestamp)}.vault`;
}
