/**
 * Wallet error types
 */

import { KeystoreError, redactSensitiveInfo } from "@acctkit/keystore";
import type { WalletProviderKind } from "./provider.js";

/**
 * Error codes
 */
export const ErrorCode = {
  UNKNOWN: "UNKNOWN_ERROR",
  NOT_CONNECTED: "NOT_CONNECTED",
  NO_LOCAL_ACCOUNT: "NO_LOCAL_ACCOUNT",
  INCORRECT_PASSWORD: "INCORRECT_PASSWORD",
  UNSUPPORTED_ON_PLATFORM: "UNSUPPORTED_ON_PLATFORM",
  TRANSPORT_FAILURE: "TRANSPORT_FAILURE",
  INVALID_PARAMS: "INVALID_PARAMS",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Base wallet error
 */
export class WalletError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly provider?: WalletProviderKind,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = "WalletError";
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      provider: this.provider,
    };
  }
}

/**
 * No active provider, or the provider has not completed connect
 */
export class NotConnectedError extends WalletError {
  constructor(provider?: WalletProviderKind) {
    super(
      provider ? `Wallet not connected (${provider})` : "Wallet not connected",
      ErrorCode.NOT_CONNECTED,
      provider,
    );
    this.name = "NotConnectedError";
  }
}

/**
 * A local-key operation was attempted on another provider variant
 */
export class NoLocalAccountError extends WalletError {
  constructor(provider: WalletProviderKind) {
    super(`No local account is held by the ${provider} provider`, ErrorCode.NO_LOCAL_ACCOUNT, provider);
    this.name = "NoLocalAccountError";
  }
}

/**
 * Capability not available with the current provider set
 */
export class UnsupportedOnPlatformError extends WalletError {
  constructor(operation: string, provider?: WalletProviderKind) {
    super(
      provider ? `${operation} is not supported by the ${provider} provider` : `${operation} is not supported`,
      ErrorCode.UNSUPPORTED_ON_PLATFORM,
      provider,
    );
    this.name = "UnsupportedOnPlatformError";
  }
}

/**
 * Network, bridge or signer channel failure
 */
export class TransportFailureError extends WalletError {
  constructor(message: string, provider?: WalletProviderKind, details?: unknown) {
    super(redactSensitiveInfo(message), ErrorCode.TRANSPORT_FAILURE, provider, details);
    this.name = "TransportFailureError";
  }
}

export class InvalidParamsError extends WalletError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCode.INVALID_PARAMS, undefined, details);
    this.name = "InvalidParamsError";
  }
}

/**
 * Map any thrown value to a stable code for reporting over a process boundary.
 */
export function formatWalletErrorCode(err: unknown, fallback: ErrorCode = ErrorCode.UNKNOWN): ErrorCode {
  if (err instanceof WalletError) return err.code;
  if (err instanceof KeystoreError) {
    if (err.code === "INCORRECT_PASSWORD") return ErrorCode.INCORRECT_PASSWORD;
    if (err.code === "TRANSPORT_FAILURE") return ErrorCode.TRANSPORT_FAILURE;
    return fallback;
  }

  const message = err instanceof Error ? err.message : String(err ?? "");
  const normalized = message.toLowerCase();

  if (normalized.includes("not connected")) return ErrorCode.NOT_CONNECTED;
  if (normalized.includes("not supported") || normalized.includes("unsupported")) {
    return ErrorCode.UNSUPPORTED_ON_PLATFORM;
  }
  if (
    normalized.includes("timeout") ||
    normalized.includes("econnrefused") ||
    normalized.includes("fetch failed") ||
    normalized.includes("network")
  ) {
    return ErrorCode.TRANSPORT_FAILURE;
  }
  return fallback;
}
