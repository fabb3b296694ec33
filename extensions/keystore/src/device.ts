import { createHash } from "node:crypto";
import os from "node:os";
import type { KeystoreConfig } from "./config.js";

/**
 * Identifier that stays the same for this user on this machine. Used as the
 * keystore password when the caller supplies none.
 */
export function resolveDeviceIdentifier(config: Pick<KeystoreConfig, "deviceId">): string {
  if (config.deviceId) return config.deviceId;
  const fingerprint = [os.hostname(), os.platform(), os.arch(), os.homedir()].join("|");
  return createHash("sha256").update(fingerprint).digest("hex");
}

export function resolvePassword(
  config: Pick<KeystoreConfig, "deviceId">,
  password: string | undefined,
): string {
  return password && password.length > 0 ? password : resolveDeviceIdentifier(config);
}
