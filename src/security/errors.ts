/** Encryption of token material failed (bad key, cipher error). */
export class EncryptionFailure extends Error {
  readonly code: string = "ENCRYPTION_FAILURE";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EncryptionFailure";
  }
}

/** Stored token material could not be turned back into plaintext. */
export class DecryptionFailure extends Error {
  readonly code: string = "DECRYPTION_FAILURE";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DecryptionFailure";
  }
}

/** Ciphertext is malformed: not a payload this service produced. */
export class DecryptError extends DecryptionFailure {
  override readonly code = "DECRYPT_ERROR";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DecryptError";
  }
}

/** Payload is well formed but authentication failed: wrong key or tampered data. */
export class KeyMismatchError extends DecryptionFailure {
  override readonly code = "KEY_MISMATCH";

  constructor(options?: { cause?: unknown }) {
    super("Ciphertext authentication failed (wrong key or tampered payload)", options);
    this.name = "KeyMismatchError";
  }
}
