/**
 * One captured clipboard snapshot. Entries are frozen when created and never
 * mutated afterwards.
 */
import { EntryType } from "./enums";

export type MetadataValue = string | number | boolean | null;
export type EntryMetadata = Readonly<Record<string, MetadataValue>>;

export interface ClipboardEntry {
  /** Unique identifier (UUID) */
  readonly id: string;
  /** Text payload */
  readonly content: string;
  /** Capture instant, wall-clock seconds since the epoch */
  readonly timestamp: number;
  /** Content type */
  readonly entryType: EntryType | string;
  /** Attached at creation, never mutated */
  readonly metadata: EntryMetadata;
}

export function createEntry(fields: {
  id: string;
  content: string;
  timestamp: number;
  entryType?: EntryType | string;
  metadata?: Record<string, MetadataValue>;
}): ClipboardEntry {
  return Object.freeze({
    id: fields.id,
    content: fields.content,
    timestamp: fields.timestamp,
    entryType: fields.entryType ?? EntryType.Text,
    metadata: Object.freeze({ ...(fields.metadata ?? {}) }),
  });
}

export function isTextEntry(entry: ClipboardEntry): boolean {
  return entry.entryType === EntryType.Text;
}

function isMetadataValue(value: unknown): value is MetadataValue {
  return (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  );
}

/**
 * Validate a ClipboardEntry object.
 */
export function validateEntry(entry: ClipboardEntry): boolean {
  return (
    typeof entry.id === "string" &&
    typeof entry.content === "string" &&
    typeof entry.timestamp === "number" &&
    Number.isFinite(entry.timestamp) &&
    typeof entry.entryType === "string" &&
    typeof entry.metadata === "object" &&
    entry.metadata !== null &&
    Object.values(entry.metadata).every(isMetadataValue)
  );
}

/** Placeholder shown in place of non-text content. */
export function placeholderFor(entryType: string): string {
  return `[${entryType}]`;
}

export function entryPreview(entry: ClipboardEntry, maxLength = 100): string {
  if (!isTextEntry(entry)) return placeholderFor(entry.entryType);
  if (entry.content.length > maxLength) {
    return entry.content.slice(0, maxLength) + "...";
  }
  return entry.content;
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** Local time as `YYYY-MM-DD HH:MM:SS`. */
export function entryDisplayTime(entry: ClipboardEntry): string {
  const d = new Date(entry.timestamp * 1000);
  return (
    `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ` +
    `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`
  );
}
