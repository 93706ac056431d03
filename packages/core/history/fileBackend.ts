import fs from "node:fs/promises";
import path from "node:path";
import { VaultStorageBackend } from "./types";

function assertBareName(name: string) {
  if (!name || name !== path.basename(name) || name === "." || name === "..") {
    throw new Error(`Invalid vault file name: ${name}`);
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Vault directory on the local file system. Writes go to a temp file that is
 * renamed over the target, so a crash never leaves a half-written index.
 */
export class FileVaultBackend implements VaultStorageBackend {
  readonly location: string;
  private dirReady = false;

  constructor(dir: string) {
    this.location = path.resolve(dir);
  }

  private async ensureDir() {
    if (this.dirReady) return;
    await fs.mkdir(this.location, { recursive: true });
    this.dirReady = true;
  }

  async readFile(name: string): Promise<Buffer | null> {
    assertBareName(name);
    try {
      return await fs.readFile(path.join(this.location, name));
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
  }

  async writeFile(name: string, data: string | Uint8Array): Promise<void> {
    assertBareName(name);
    await this.ensureDir();
    const target = path.join(this.location, name);
    const tmp = `${target}.${process.pid}.tmp`;
    try {
      await fs.writeFile(tmp, data, { mode: 0o600 });
      await fs.rename(tmp, target);
    } catch (err) {
      await fs.rm(tmp, { force: true });
      // directory removed underneath us; recreate on the next write
      if (isNotFound(err)) this.dirReady = false;
      throw err;
    }
  }

  async removeFile(name: string): Promise<boolean> {
    assertBareName(name);
    try {
      await fs.unlink(path.join(this.location, name));
      return true;
    } catch (err) {
      if (isNotFound(err)) return false;
      throw err;
    }
  }
}
