/**
 * Error taxonomy for the vault.
 *
 * Persistence and transient read failures are logged and absorbed by the
 * store and the poller. Decryption failures reach the caller of an explicit
 * decrypt.
 */

export enum VaultErrorReason {
  Decryption = "decryption",
  Persistence = "persistence",
  TransientRead = "transient-read",
  Config = "config",
}

export class VaultError extends Error {
  readonly reason: VaultErrorReason;

  constructor(reason: VaultErrorReason, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "VaultError";
    this.reason = reason;
  }
}

export class DecryptionError extends VaultError {
  constructor(message = "Ciphertext is malformed or failed authentication", options?: { cause?: unknown }) {
    super(VaultErrorReason.Decryption, message, options);
    this.name = "DecryptionError";
  }
}

export class PersistenceError extends VaultError {
  /** File the failed operation targeted, when known. */
  readonly path?: string;

  constructor(message: string, options?: { cause?: unknown; path?: string }) {
    super(VaultErrorReason.Persistence, message, options);
    this.name = "PersistenceError";
    this.path = options?.path;
  }
}

export class TransientReadError extends VaultError {
  constructor(message = "Failed to read clipboard", options?: { cause?: unknown }) {
    super(VaultErrorReason.TransientRead, message, options);
    this.name = "TransientReadError";
  }
}

export class ConfigError extends VaultError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(VaultErrorReason.Config, message, options);
    this.name = "ConfigError";
  }
}

export function isVaultError(value: unknown, reason?: VaultErrorReason): value is VaultError {
  if (!(value instanceof VaultError)) return false;
  return reason === undefined || value.reason === reason;
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
