/**
 * AES-256-GCM encryption of the cache document with a machine-bound key.
 *
 * Blob layout: base64(iv[12] || tag[16] || ciphertext), where the plaintext
 * is the UTF-8 JSON text of the document. The key is PBKDF2-HMAC-SHA256 of
 * the machine identity with a fixed salt, so the same machine always derives
 * the same key and any other machine fails authentication.
 */
import { createCipheriv, createDecipheriv, pbkdf2Sync, randomBytes } from "node:crypto";
import { CacheCorruptionError } from "../errors.js";

const KEY_DERIVATION_SALT = "dynalias-cache-encryption-v1";
const PBKDF2_ITERATIONS = 100000;
const PBKDF2_KEYLEN = 32;
const PBKDF2_DIGEST = "sha256";
const AES_ALGORITHM = "aes-256-gcm";
const IV_LENGTH = 12;
const TAG_LENGTH = 16;

export type CacheDocument = Record<string, unknown>;

export function deriveKey(machineId: string): Buffer {
  return pbkdf2Sync(
    Buffer.from(machineId, "utf-8"),
    Buffer.from(KEY_DERIVATION_SALT, "utf-8"),
    PBKDF2_ITERATIONS,
    PBKDF2_KEYLEN,
    PBKDF2_DIGEST,
  );
}

export function encryptDocument(doc: CacheDocument, key: Buffer): string {
  const iv = randomBytes(IV_LENGTH);
  const cipher = createCipheriv(AES_ALGORITHM, key, iv, { authTagLength: TAG_LENGTH });
  const ciphertext = Buffer.concat([cipher.update(JSON.stringify(doc), "utf-8"), cipher.final()]);
  const tag = cipher.getAuthTag();
  return Buffer.concat([iv, tag, ciphertext]).toString("base64");
}

function isDocument(value: unknown): value is CacheDocument {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function decryptDocument(blob: string, key: Buffer): CacheDocument {
  const bytes = Buffer.from(blob, "base64");
  if (bytes.length < IV_LENGTH + TAG_LENGTH) {
    throw new CacheCorruptionError("Encrypted cache payload is truncated");
  }

  const iv = bytes.subarray(0, IV_LENGTH);
  const tag = bytes.subarray(IV_LENGTH, IV_LENGTH + TAG_LENGTH);
  const ciphertext = bytes.subarray(IV_LENGTH + TAG_LENGTH);

  let plaintext: string;
  try {
    const decipher = createDecipheriv(AES_ALGORITHM, key, iv, { authTagLength: TAG_LENGTH });
    decipher.setAuthTag(tag);
    plaintext = Buffer.concat([decipher.update(ciphertext), decipher.final()]).toString("utf-8");
  } catch (err) {
    throw new CacheCorruptionError(
      "Failed to decrypt cache data (created on a different machine, or corrupted)",
      { cause: err },
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(plaintext) as unknown;
  } catch (err) {
    throw new CacheCorruptionError("Decrypted cache is not valid JSON", { cause: err });
  }
  if (!isDocument(parsed)) {
    throw new CacheCorruptionError("Decrypted cache is not a JSON object");
  }
  return parsed;
}
