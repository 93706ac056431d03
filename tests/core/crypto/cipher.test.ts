import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import {
  KDF_ITERATIONS,
  SALT_LENGTH,
  createCipherFromPassword,
  createVaultCipher,
  defaultPassword,
  deriveKey,
  loadOrCreateSalt,
} from "../../../packages/core/crypto";
import { DecryptionError, PersistenceError } from "../../../packages/core/errors";

const salt = Buffer.alloc(SALT_LENGTH, 7);

describe("key derivation", () => {
  it("is deterministic for the same password and salt", () => {
    expect(deriveKey("test-secret", salt)).toBe(deriveKey("test-secret", salt));
  });

  it("produces a 32-byte url-safe key", () => {
    const key = deriveKey("test-secret", salt);
    expect(key).toMatch(/^[A-Za-z0-9_-]+$/);
    expect(Buffer.from(key, "base64url")).toHaveLength(32);
  });

  it("changes with the salt and the password", () => {
    const base = deriveKey("test-secret", salt);
    expect(deriveKey("test-secret", Buffer.alloc(SALT_LENGTH, 8))).not.toBe(base);
    expect(deriveKey("other-secret", salt)).not.toBe(base);
  });

  it("uses 100k iterations by default", () => {
    expect(KDF_ITERATIONS).toBe(100_000);
    expect(deriveKey("test-secret", salt)).toBe(deriveKey("test-secret", salt, 100_000));
  });

  it("rejects a non-positive iteration count", () => {
    expect(() => deriveKey("test-secret", salt, 0)).toThrow("positive integer");
  });

  it("builds the default password from the host name", () => {
    expect(defaultPassword("desk-01")).toBe("clipvault-desk-01");
  });
});

describe("vault cipher", () => {
  const cipher = createCipherFromPassword("test-secret", salt);

  it("round-trips text including multi-byte characters", () => {
    const original = "Hello 世界! 🎉 Testing unicode";
    const token = cipher.encrypt(original);
    expect(token.toString("utf8")).not.toContain("Hello");
    expect(cipher.decryptText(token)).toBe(original);
  });

  it("round-trips an empty payload", () => {
    expect(cipher.decryptText(cipher.encrypt(""))).toBe("");
  });

  it("uses a fresh IV per encryption", () => {
    expect(cipher.encrypt("same").equals(cipher.encrypt("same"))).toBe(false);
  });

  it("rejects tampered ciphertext", () => {
    const token = cipher.encrypt("secret text");
    token[token.length - 1] ^= 0xff;
    expect(() => cipher.decrypt(token)).toThrow(DecryptionError);
  });

  it("rejects a tampered auth tag", () => {
    const token = cipher.encrypt("secret text");
    token[15] ^= 0x01;
    expect(() => cipher.decryptText(token)).toThrow(DecryptionError);
  });

  it("rejects arbitrary and truncated bytes", () => {
    expect(() => cipher.decrypt(Buffer.from("not a vault token"))).toThrow(DecryptionError);
    expect(() => cipher.decrypt(cipher.encrypt("abc").subarray(0, 10))).toThrow("truncated");
    expect(() => cipher.decrypt(new Uint8Array(0))).toThrow(DecryptionError);
  });

  it("rejects an unknown token version", () => {
    const token = cipher.encrypt("abc");
    token[0] = 0x02;
    expect(() => cipher.decrypt(token)).toThrow("Unsupported ciphertext version 2");
  });

  it("rejects ciphertext made with another key", () => {
    const other = createCipherFromPassword("other-secret", salt);
    expect(() => other.decrypt(cipher.encrypt("abc"))).toThrow(DecryptionError);
  });

  it("rejects keys of the wrong length", () => {
    expect(() => createVaultCipher(Buffer.alloc(16).toString("base64url"))).toThrow("32 bytes");
  });

  it("rejects plaintext that is not UTF-8", () => {
    const token = cipher.encrypt(Uint8Array.from([0xff, 0xfe]));
    expect(cipher.decrypt(token)).toEqual(Buffer.from([0xff, 0xfe]));
    expect(() => cipher.decryptText(token)).toThrow("not valid UTF-8");
  });
});

describe("salt file", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "clipvault-salt-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("creates 16 random bytes once and reuses them", async () => {
    const saltPath = path.join(dir, "nested", ".vault_salt");
    const first = await loadOrCreateSalt(saltPath);
    const second = await loadOrCreateSalt(saltPath);
    expect(first).toHaveLength(16);
    expect(second.equals(first)).toBe(true);
    expect((await fs.readFile(saltPath)).equals(first)).toBe(true);
  });

  it("refuses a salt file of the wrong size", async () => {
    const saltPath = path.join(dir, ".vault_salt");
    await fs.writeFile(saltPath, Buffer.alloc(4));
    await expect(loadOrCreateSalt(saltPath)).rejects.toBeInstanceOf(PersistenceError);
  });
});
