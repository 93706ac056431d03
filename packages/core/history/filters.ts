import { ClipboardEntry, isTextEntry } from "../models/ClipboardEntry";

/** Case-insensitive substring match; non-text entries never match. */
export function bySearch(query: string) {
  const q = query.toLowerCase();
  return (entry: ClipboardEntry) =>
    isTextEntry(entry) && entry.content.toLowerCase().includes(q);
}
