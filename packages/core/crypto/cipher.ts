import {
  createCipheriv,
  createDecipheriv,
  randomBytes,
  type CipherGCMTypes,
} from "node:crypto";
import { DecryptionError } from "../errors";
import { KEY_LENGTH, deriveKey } from "./keyDerivation";

const ALGORITHM: CipherGCMTypes = "aes-256-gcm";
const TOKEN_VERSION = 0x01;
const IV_LENGTH = 12;
const TAG_LENGTH = 16;
const HEADER_LENGTH = 1 + IV_LENGTH + TAG_LENGTH;

export interface VaultCipher {
  /** `version | iv | tag | ciphertext`; everything decrypt needs is embedded. */
  encrypt(plaintext: string | Uint8Array): Buffer;
  decrypt(token: Uint8Array): Buffer;
  /** Like decrypt, but also rejects plaintext that is not valid UTF-8. */
  decryptText(token: Uint8Array): string;
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

export function createVaultCipher(key: string): VaultCipher {
  const keyBytes = Buffer.from(key, "base64url");
  if (keyBytes.length !== KEY_LENGTH) {
    throw new Error(`Cipher key must decode to ${KEY_LENGTH} bytes`);
  }

  function decrypt(token: Uint8Array): Buffer {
    const buf = Buffer.from(token);
    if (buf.length < HEADER_LENGTH) {
      throw new DecryptionError("Ciphertext is truncated");
    }
    if (buf[0] !== TOKEN_VERSION) {
      throw new DecryptionError(`Unsupported ciphertext version ${buf[0]}`);
    }
    const iv = buf.subarray(1, 1 + IV_LENGTH);
    const tag = buf.subarray(1 + IV_LENGTH, HEADER_LENGTH);
    const body = buf.subarray(HEADER_LENGTH);
    try {
      const decipher = createDecipheriv(ALGORITHM, keyBytes, iv, {
        authTagLength: TAG_LENGTH,
      });
      decipher.setAuthTag(tag);
      return Buffer.concat([decipher.update(body), decipher.final()]);
    } catch (err) {
      throw new DecryptionError(undefined, { cause: err });
    }
  }

  return {
    encrypt(plaintext) {
      const data = typeof plaintext === "string" ? Buffer.from(plaintext, "utf8") : plaintext;
      const iv = randomBytes(IV_LENGTH);
      const cipher = createCipheriv(ALGORITHM, keyBytes, iv, {
        authTagLength: TAG_LENGTH,
      });
      const body = Buffer.concat([cipher.update(data), cipher.final()]);
      return Buffer.concat([Buffer.from([TOKEN_VERSION]), iv, cipher.getAuthTag(), body]);
    },
    decrypt,
    decryptText(token) {
      const bytes = decrypt(token);
      try {
        return utf8.decode(bytes);
      } catch (err) {
        throw new DecryptionError("Decrypted payload is not valid UTF-8", { cause: err });
      }
    },
  };
}

export function createCipherFromPassword(
  password: string | Uint8Array,
  salt: Uint8Array,
  iterations?: number
): VaultCipher {
  return createVaultCipher(deriveKey(password, salt, iterations));
}
