import { v4 as uuidv4 } from "uuid";
import { VaultCipher } from "../crypto/cipher";
import { PersistenceError, describeError } from "../errors";
import { createLogger } from "../logger";
import {
  ClipboardEntry,
  MetadataValue,
  createEntry,
  isTextEntry,
} from "../models/ClipboardEntry";
import { EntryType } from "../models/enums";
import { blobNameFor, decodeIndex, encodeIndex } from "./codec";
import { bySearch } from "./filters";
import { VaultStorageBackend } from "./types";

const log = createLogger("store");

export const INDEX_FILE = "index.json";
export const ENCRYPTED_INDEX_FILE = "index.vault";

export interface SearchHit {
  /** Position in the full history, not in the result list */
  index: number;
  entry: ClipboardEntry;
}

export interface HistoryStats {
  totalEntries: number;
  storagePath: string;
  encryptionEnabled: boolean;
}

export interface HistoryStore {
  addEntry(
    content: string,
    entryType?: EntryType | string,
    metadata?: Record<string, MetadataValue>
  ): Promise<ClipboardEntry | null>;
  getHistory(limit?: number): Promise<ClipboardEntry[]>;
  getEntry(index: number): Promise<ClipboardEntry | null>;
  removeEntry(index: number): Promise<boolean>;
  clearHistory(): Promise<void>;
  searchHistory(query: string): Promise<SearchHit[]>;
  getStats(): Promise<HistoryStats>;
  readEncrypted(index: number): Promise<string | null>;
  onNew(cb: (entry: ClipboardEntry) => void): () => void;
}

export type HistoryStoreOptions = {
  backend: VaultStorageBackend;
  /** Encryption is enabled when a cipher is given. */
  cipher?: VaultCipher | null;
  /** Store the index itself as ciphertext (`index.vault`). Needs a cipher. */
  encryptIndex?: boolean;
  /** Epoch milliseconds */
  now?: () => number;
  makeId?: () => string;
};

/**
 * Owns the ordered history (index 0 = most recent) and everything persisted
 * for it. Every operation runs under one exclusive lock, so an in-memory change
 * and the index rewrite that follows it are never observed apart.
 *
 * Storage failures are logged as {@link PersistenceError} and never thrown:
 * the in-memory list stays authoritative until the next successful write.
 */
export class VaultHistoryStore implements HistoryStore {
  private entries: ClipboardEntry[] = [];
  private listeners = new Set<(entry: ClipboardEntry) => void>();
  private queue: Promise<void> = Promise.resolve();
  private readonly backend: VaultStorageBackend;
  private readonly cipher: VaultCipher | null;
  private readonly encryptIndex: boolean;
  private readonly now: () => number;
  private readonly makeId: () => string;
  /** Index file in the format no longer configured, awaiting removal */
  private staleIndex: string | undefined;

  private constructor(options: HistoryStoreOptions) {
    this.backend = options.backend;
    this.cipher = options.cipher ?? null;
    this.encryptIndex = Boolean(options.encryptIndex && this.cipher);
    this.now = options.now ?? Date.now;
    this.makeId = options.makeId ?? uuidv4;
  }

  static async open(options: HistoryStoreOptions): Promise<VaultHistoryStore> {
    const store = new VaultHistoryStore(options);
    if (options.encryptIndex && !store.cipher) {
      log.warn("encrypt_index ignored: encryption is disabled");
    }
    if (store.cipher && !store.encryptIndex) {
      log.warn(`${INDEX_FILE} keeps entry text in plaintext; enable encrypt_index to protect it`);
    }
    await store.exclusive(async () => {
      await store.loadIndex();
      if (store.staleIndex) await store.saveIndex();
    });
    return store;
  }

  private get indexFile(): string {
    return this.encryptIndex ? ENCRYPTED_INDEX_FILE : INDEX_FILE;
  }

  private exclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const run = this.queue.then(() => fn());
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private persistenceFailure(action: string, name: string, err: unknown): PersistenceError {
    const failure = new PersistenceError(`Failed to ${action} ${name}: ${describeError(err)}`, {
      cause: err,
      path: name,
    });
    log.error(failure.message);
    return failure;
  }

  /** Resolves undefined when the read failed, null when the file is absent. */
  private async readIndexFile(name: string): Promise<Buffer | null | undefined> {
    try {
      return await this.backend.readFile(name);
    } catch (err) {
      this.persistenceFailure("read", name, err);
      return undefined;
    }
  }

  /** Replaces the in-memory list; false when the bytes could not be decoded. */
  private async decodeInto(name: string, raw: Buffer, encrypted: boolean): Promise<boolean> {
    try {
      const text = encrypted && this.cipher ? this.cipher.decryptText(raw) : raw.toString("utf8");
      const { entries, skipped } = decodeIndex(text, this.makeId);
      if (skipped.length > 0) {
        log.warn(`Skipped ${skipped.length} invalid record(s) in ${name}`, skipped);
      }
      this.entries = entries;
      log.debug(`Loaded ${entries.length} entries from ${name}`);
      return true;
    } catch (err) {
      this.persistenceFailure("decode", name, err);
      // keep the unreadable bytes; the next save would otherwise overwrite them
      await this.writeOrReport(`${name}.unreadable`, raw);
      return false;
    }
  }

  /**
   * Loads the index in the configured format, falling back to the other one
   * after encrypt_index was toggled. The other file is marked stale and
   * removed by the next successful save.
   */
  private async loadIndex(): Promise<void> {
    this.entries = [];
    const primary = this.indexFile;
    const raw = await this.readIndexFile(primary);
    if (raw === undefined) return;

    // without a cipher index.vault can be neither read nor safely dropped
    const legacyName = this.encryptIndex ? INDEX_FILE : ENCRYPTED_INDEX_FILE;
    const legacy = this.cipher ? await this.readIndexFile(legacyName) : null;
    if (!this.cipher && !raw) {
      const orphan = await this.readIndexFile(ENCRYPTED_INDEX_FILE);
      if (orphan) log.warn(`${ENCRYPTED_INDEX_FILE} found but encryption is disabled; it is left untouched`);
    }

    if (raw && (await this.decodeInto(primary, raw, this.encryptIndex))) {
      if (legacy) this.staleIndex = legacyName;
      return;
    }
    if (!legacy) return;
    if (await this.decodeInto(legacyName, legacy, !this.encryptIndex)) {
      log.info(`Migrating history from ${legacyName} to ${primary}`);
      this.staleIndex = legacyName;
    }
  }

  private async writeOrReport(name: string, data: string | Uint8Array): Promise<boolean> {
    try {
      await this.backend.writeFile(name, data);
      return true;
    } catch (err) {
      this.persistenceFailure("write", name, err);
      return false;
    }
  }

  private async saveIndex(): Promise<boolean> {
    const json = encodeIndex(this.entries);
    const data = this.encryptIndex && this.cipher ? this.cipher.encrypt(json) : json;
    const saved = await this.writeOrReport(this.indexFile, data);
    const stale = this.staleIndex;
    if (saved && stale) {
      try {
        await this.backend.removeFile(stale);
        this.staleIndex = undefined;
        log.info(`Removed ${stale}`);
      } catch (err) {
        this.persistenceFailure("remove", stale, err);
      }
    }
    return saved;
  }

  /**
   * Entries captured within the same second share one ciphertext file, which
   * always holds the newest of them. It is rewritten for the newest survivor,
   * or deleted when none is left.
   */
  private async removeBlob(entry: ClipboardEntry): Promise<void> {
    if (!isTextEntry(entry)) return;
    const name = blobNameFor(entry);
    const survivor = this.entries.find((e) => isTextEntry(e) && blobNameFor(e) === name);
    if (survivor) {
      if (this.cipher) await this.writeOrReport(name, this.cipher.encrypt(survivor.content));
      return;
    }
    try {
      await this.backend.removeFile(name);
    } catch (err) {
      this.persistenceFailure("remove", name, err);
    }
  }

  private isValidIndex(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.entries.length;
  }

  addEntry(
    content: string,
    entryType: EntryType | string = EntryType.Text,
    metadata?: Record<string, MetadataValue>
  ): Promise<ClipboardEntry | null> {
    return this.exclusive(async () => {
      const latest = this.entries[0];
      if (latest && latest.content === content) {
        log.debug("Skipping duplicate of most recent entry");
        return null;
      }

      const entry = createEntry({
        id: this.makeId(),
        content,
        timestamp: this.now() / 1000,
        entryType,
        metadata,
      });
      this.entries.unshift(entry);

      if (this.cipher && isTextEntry(entry)) {
        await this.writeOrReport(blobNameFor(entry), this.cipher.encrypt(entry.content));
      }
      await this.saveIndex();

      for (const listener of this.listeners) {
        try {
          listener(entry);
        } catch (err) {
          log.warn("onNew listener failed", describeError(err));
        }
      }
      return entry;
    });
  }

  getHistory(limit?: number): Promise<ClipboardEntry[]> {
    return this.exclusive(() =>
      limit !== undefined && limit > 0 ? this.entries.slice(0, limit) : this.entries.slice()
    );
  }

  getEntry(index: number): Promise<ClipboardEntry | null> {
    return this.exclusive(() => (this.isValidIndex(index) ? this.entries[index] : null));
  }

  removeEntry(index: number): Promise<boolean> {
    return this.exclusive(async () => {
      if (!this.isValidIndex(index)) return false;
      const [entry] = this.entries.splice(index, 1);
      await this.removeBlob(entry);
      await this.saveIndex();
      return true;
    });
  }

  clearHistory(): Promise<void> {
    return this.exclusive(async () => {
      const removed = this.entries;
      this.entries = [];
      for (const entry of removed) {
        await this.removeBlob(entry);
      }
      await this.saveIndex();
      log.info(`Cleared ${removed.length} entries`);
    });
  }

  searchHistory(query: string): Promise<SearchHit[]> {
    return this.exclusive(() => {
      const matches = bySearch(query);
      const hits: SearchHit[] = [];
      this.entries.forEach((entry, index) => {
        if (matches(entry)) hits.push({ index, entry });
      });
      return hits;
    });
  }

  getStats(): Promise<HistoryStats> {
    return this.exclusive(() => ({
      totalEntries: this.entries.length,
      storagePath: this.backend.location,
      encryptionEnabled: this.cipher !== null,
    }));
  }

  /**
   * Decrypts the entry's ciphertext file. Resolves null when there is nothing
   * to decrypt or the file belongs to another entry; a DecryptionError is
   * passed on to the caller.
   */
  readEncrypted(index: number): Promise<string | null> {
    return this.exclusive(async () => {
      if (!this.cipher || !this.isValidIndex(index)) return null;
      const entry = this.entries[index];
      if (!isTextEntry(entry)) return null;
      const name = blobNameFor(entry);
      let raw: Buffer | null;
      try {
        raw = await this.backend.readFile(name);
      } catch (err) {
        this.persistenceFailure("read", name, err);
        return null;
      }
      if (!raw) return null;
      const text = this.cipher.decryptText(raw);
      // a later capture in the same second has replaced the file
      if (text !== entry.content) {
        log.warn(`${name} holds a newer entry from the same second`);
        return null;
      }
      return text;
    });
  }

  onNew(cb: (entry: ClipboardEntry) => void): () => void {
    this.listeners.add(cb);
    return () => {
      this.listeners.delete(cb);
    };
  }
}

export function openHistoryStore(options: HistoryStoreOptions): Promise<VaultHistoryStore> {
  return VaultHistoryStore.open(options);
}
