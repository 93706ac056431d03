import type { ChangeDetector } from "../clipboard/watcher";
import type { HistoryStats, HistoryStore, SearchHit } from "../history/store";
import type { ClipboardEntry } from "../models/ClipboardEntry";

/**
 * Read/search/restore surface for a presentation layer. Holds no state of
 * its own.
 */
export interface HistoryFacade {
  /** Defaults to the configured max_history_items. */
  getHistory(limit?: number): Promise<ClipboardEntry[]>;
  search(query: string): Promise<SearchHit[]>;
  restoreToClipboard(index: number): Promise<boolean>;
  removeEntry(index: number): Promise<boolean>;
  clearHistory(): Promise<void>;
  getStats(): Promise<HistoryStats>;
  /** Decrypted ciphertext of an entry; throws DecryptionError on bad data. */
  inspect(index: number): Promise<string | null>;
}

export function createHistoryFacade(options: {
  store: HistoryStore;
  detector: ChangeDetector;
  defaultLimit?: number;
}): HistoryFacade {
  const { store, detector, defaultLimit } = options;
  return {
    getHistory: (limit = defaultLimit) => store.getHistory(limit),
    search: (query) => store.searchHistory(query),
    restoreToClipboard: (index) => detector.restoreToClipboard(index),
    removeEntry: (index) => store.removeEntry(index),
    clearHistory: async () => {
      await store.clearHistory();
      detector.resetObserved();
    },
    getStats: () => store.getStats(),
    inspect: (index) => store.readEncrypted(index),
  };
}
