export type KeystoreErrorCode = "INCORRECT_PASSWORD" | "TRANSPORT_FAILURE" | "INVALID_KEYSTORE";

export class KeystoreError extends Error {
  constructor(
    message: string,
    public readonly code: KeystoreErrorCode,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = "KeystoreError";
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
    };
  }
}

/**
 * Raised for any keystore decryption failure. A wrong password never yields a
 * different key.
 */
export class IncorrectPasswordError extends KeystoreError {
  constructor(details?: unknown) {
    super("Incorrect password", "INCORRECT_PASSWORD", details);
    this.name = "IncorrectPasswordError";
  }
}

/** File system failure underneath a keystore operation. */
export class KeystoreIoError extends KeystoreError {
  constructor(operation: string, cause: unknown) {
    super(
      `keystore ${operation} failed: ${redactSensitiveInfo(describeError(cause))}`,
      "TRANSPORT_FAILURE",
      cause,
    );
    this.name = "KeystoreIoError";
  }
}

export function describeError(err: unknown): string {
  const message = err instanceof Error ? err.message : String(err ?? "");
  return message.length > 0 ? message : "unknown error";
}

/**
 * Redact sensitive information from error messages before they are logged or
 * returned across a process boundary.
 */
export function redactSensitiveInfo(message: string): string {
  let redacted = message;

  // URLs (RPC endpoints, query strings, embedded credentials)
  redacted = redacted.replace(/https?:\/\/[^\s]+/g, "[URL]");

  // Absolute file paths with at least two segments (Unix and Windows)
  redacted = redacted.replace(/\/[a-zA-Z0-9_.-]+\/[a-zA-Z0-9_.\-/]+/g, "[PATH]");
  redacted = redacted.replace(/[A-Z]:\\[a-zA-Z0-9_\-.\\]+/g, "[PATH]");

  // Environment variable assignments
  redacted = redacted.replace(/[A-Z_]+=[^\s]+/g, "[ENV]");

  // Private keys, addresses and hashes
  redacted = redacted.replace(/0x[a-fA-F0-9]{40,}/g, "[HEX]");

  // JWT-like tokens
  redacted = redacted.replace(/eyJ[a-zA-Z0-9_-]+\.[a-zA-Z0-9_-]+\.[a-zA-Z0-9_-]+/g, "[TOKEN]");

  redacted = redacted.replace(/\bBearer\s+[^\s]+/gi, "Bearer [REDACTED]");

  return redacted;
}
