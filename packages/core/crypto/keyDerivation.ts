import { pbkdf2Sync, randomBytes } from "node:crypto";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { PersistenceError, describeError } from "../errors";
import { createLogger } from "../logger";

const log = createLogger("crypto");

export const KDF_ITERATIONS = 100_000;
export const KEY_LENGTH = 32;
export const SALT_LENGTH = 16;
export const SALT_FILE_NAME = ".vault_salt";

/**
 * PBKDF2-HMAC-SHA256 over `password` and `salt`, returned as base64url text.
 * Deterministic: the same inputs always produce the same key.
 */
export function deriveKey(
  password: string | Uint8Array,
  salt: Uint8Array,
  iterations: number = KDF_ITERATIONS
): string {
  if (!Number.isInteger(iterations) || iterations <= 0) {
    throw new Error("PBKDF2 iteration count must be a positive integer");
  }
  return pbkdf2Sync(password, salt, iterations, KEY_LENGTH, "sha256").toString("base64url");
}

/**
 * Fallback password used when none is configured. It is derived from the host
 * name alone, so anyone who knows the machine name can derive the key: this
 * only keeps casual readers out of the vault directory.
 */
export function defaultPassword(hostname: string = os.hostname()): string {
  return `clipvault-${hostname}`;
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

async function readSalt(saltPath: string): Promise<Buffer | undefined> {
  try {
    const salt = await fs.readFile(saltPath);
    if (salt.length !== SALT_LENGTH) {
      throw new PersistenceError(
        `Salt file has ${salt.length} bytes, expected ${SALT_LENGTH}`,
        { path: saltPath }
      );
    }
    return salt;
  } catch (err) {
    if (errorCode(err) === "ENOENT") return undefined;
    if (err instanceof PersistenceError) throw err;
    throw new PersistenceError(`Failed to read salt: ${describeError(err)}`, {
      cause: err,
      path: saltPath,
    });
  }
}

/**
 * Returns the vault salt, creating it on first use. The salt is never rotated;
 * losing the file makes every existing ciphertext undecryptable.
 */
export async function loadOrCreateSalt(saltPath: string): Promise<Buffer> {
  const existing = await readSalt(saltPath);
  if (existing) return existing;

  const salt = randomBytes(SALT_LENGTH);
  try {
    await fs.mkdir(path.dirname(saltPath), { recursive: true });
    await fs.writeFile(saltPath, salt, { mode: 0o600, flag: "wx" });
    log.info("Created new vault salt", saltPath);
    return salt;
  } catch (err) {
    // another process created it between our read and write
    if (errorCode(err) === "EEXIST") {
      const raced = await readSalt(saltPath);
      if (raced) return raced;
    }
    throw new PersistenceError(`Failed to write salt: ${describeError(err)}`, {
      cause: err,
      path: saltPath,
    });
  }
}
