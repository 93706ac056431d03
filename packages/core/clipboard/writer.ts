import { ClipboardEntry, isTextEntry } from "../models/ClipboardEntry";
import * as log from "../logger";

export type ClipboardWriteFn = (text: string) => Promise<void>;

export interface ClipboardWriter {
  /** Resolves false for entries that cannot go back on the clipboard. */
  write(entry: ClipboardEntry): Promise<boolean>;
}

export function createWriter(fn: ClipboardWriteFn): ClipboardWriter {
  return {
    async write(entry: ClipboardEntry) {
      if (!isTextEntry(entry)) return false;
      log.debug("Writing entry to clipboard");
      await fn(entry.content);
      return true;
    },
  };
}
