/**
 * Storage backend interface for the vault directory. Files are addressed by
 * bare name (`index.json`, `1700000000.vault`); the backend decides where they
 * live.
 */
export interface VaultStorageBackend {
  /** Where the vault lives, reported by the store's stats. */
  readonly location: string;
  /** Resolves null when the file does not exist. */
  readFile(name: string): Promise<Buffer | null>;
  /** Replaces the whole file. */
  writeFile(name: string, data: string | Uint8Array): Promise<void>;
  /** Resolves false when there was nothing to remove. */
  removeFile(name: string): Promise<boolean>;
}

/**
 * In-memory backend, used by tests and by headless callers that do not want
 * anything on disk.
 */
export class InMemoryVaultBackend implements VaultStorageBackend {
  readonly location: string;
  private files = new Map<string, Buffer>();

  constructor(location = "memory://vault") {
    this.location = location;
  }

  async readFile(name: string) {
    const data = this.files.get(name);
    return data ? Buffer.from(data) : null;
  }
  async writeFile(name: string, data: string | Uint8Array) {
    this.files.set(name, typeof data === "string" ? Buffer.from(data, "utf8") : Buffer.from(data));
  }
  async removeFile(name: string) {
    return this.files.delete(name);
  }

  has(name: string): boolean {
    return this.files.has(name);
  }
  names(): string[] {
    return Array.from(this.files.keys()).sort();
  }
}
