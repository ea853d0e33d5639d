import { createCipheriv, createDecipheriv, randomBytes } from "node:crypto";
import { z } from "zod";
import { DecryptError, EncryptionFailure, KeyMismatchError } from "./errors.js";

const ALGORITHM = "aes-256-gcm";
const IV_BYTES = 12;
const AUTH_TAG_BYTES = 16;
export const KEY_BYTES = 32;

const HEX_RE = /^[0-9a-f]*$/i;

/** Encrypted payload as stored in token columns (JSON-serialized). */
const encryptedPayloadSchema = z.object({
  iv: z.string().regex(HEX_RE).length(IV_BYTES * 2),
  authTag: z.string().regex(HEX_RE).length(AUTH_TAG_BYTES * 2),
  ciphertext: z.string().regex(HEX_RE),
});

export type EncryptedPayload = z.infer<typeof encryptedPayloadSchema>;

/**
 * Decode a 32-byte key from its configured form: 64 hex chars, or base64
 * that decodes to exactly 32 bytes.
 */
export function parseEncryptionKey(raw: string): Buffer {
  const trimmed = raw.trim();
  if (trimmed.length === KEY_BYTES * 2 && HEX_RE.test(trimmed)) {
    return Buffer.from(trimmed, "hex");
  }
  const decoded = Buffer.from(trimmed, "base64");
  if (decoded.length !== KEY_BYTES) {
    throw new EncryptionFailure(
      `Encryption key must be ${KEY_BYTES} bytes (64 hex chars or base64), got ${decoded.length} bytes`,
    );
  }
  return decoded;
}

/** Generate a random 32-byte key, hex-encoded. */
export function generateEncryptionKey(): string {
  return randomBytes(KEY_BYTES).toString("hex");
}

/**
 * AES-256-GCM cipher for token material.
 *
 * The key is copied once at construction and never mutated, so a single
 * instance can be shared by every component. Each call draws a fresh IV,
 * so encrypting the same plaintext twice yields different ciphertext.
 */
export class TokenCipher {
  private readonly key: Buffer;

  constructor(key: Buffer) {
    if (key.length !== KEY_BYTES) {
      throw new EncryptionFailure(`Encryption key must be ${KEY_BYTES} bytes, got ${key.length}`);
    }
    this.key = Buffer.from(key);
  }

  static fromConfig(raw: string): TokenCipher {
    if (!raw) throw new EncryptionFailure("TOKEN_ENCRYPTION_KEY is not configured");
    return new TokenCipher(parseEncryptionKey(raw));
  }

  encryptBytes(plaintext: Uint8Array): EncryptedPayload {
    try {
      const iv = randomBytes(IV_BYTES);
      const cipher = createCipheriv(ALGORITHM, this.key, iv);
      const encrypted = Buffer.concat([cipher.update(plaintext), cipher.final()]);
      return {
        iv: iv.toString("hex"),
        authTag: cipher.getAuthTag().toString("hex"),
        ciphertext: encrypted.toString("hex"),
      };
    } catch (err) {
      throw new EncryptionFailure("Failed to encrypt token material", { cause: err });
    }
  }

  decryptBytes(payload: EncryptedPayload): Buffer {
    const decipher = createDecipheriv(ALGORITHM, this.key, Buffer.from(payload.iv, "hex"));
    decipher.setAuthTag(Buffer.from(payload.authTag, "hex"));
    try {
      return Buffer.concat([decipher.update(Buffer.from(payload.ciphertext, "hex")), decipher.final()]);
    } catch (err) {
      throw new KeyMismatchError({ cause: err });
    }
  }

  /** Encrypt a UTF-8 string into the serialized column form. */
  encrypt(plaintext: string): string {
    return JSON.stringify(this.encryptBytes(Buffer.from(plaintext, "utf-8")));
  }

  decrypt(serialized: string): string {
    return this.decryptBytes(parsePayload(serialized)).toString("utf-8");
  }
}

function parsePayload(serialized: string): EncryptedPayload {
  let json: unknown;
  try {
    json = JSON.parse(serialized);
  } catch (err) {
    throw new DecryptError("Ciphertext is not a valid encrypted payload", { cause: err });
  }
  const parsed = encryptedPayloadSchema.safeParse(json);
  if (!parsed.success) {
    throw new DecryptError(`Ciphertext payload is malformed: ${parsed.error.issues[0]?.message ?? "invalid"}`);
  }
  return parsed.data;
}
