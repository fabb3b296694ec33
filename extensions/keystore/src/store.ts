import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { KeystoreConfig } from "./config.js";
import { KeystoreIoError } from "./errors.js";
import { DEFAULT_LOCK_OPTIONS, withFileLock } from "./lock.js";

export function resolveStorePath(config: Pick<KeystoreConfig, "profile" | "storePath">): string {
  if (config.storePath && config.storePath.trim().length > 0) {
    return config.storePath;
  }
  return path.join(os.homedir(), ".acctkit", "credentials", config.profile, "account.json");
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

export async function readKeystoreFile(target: string): Promise<string | null> {
  try {
    return await fs.readFile(target, "utf8");
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") return null;
    throw new KeystoreIoError("read", err);
  }
}

export async function keystoreFileExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

export async function writeKeystoreFile(target: string, json: string): Promise<void> {
  try {
    await fs.mkdir(path.dirname(target), { recursive: true, mode: 0o700 });
    await withFileLock(target, DEFAULT_LOCK_OPTIONS, async () => {
      await fs.writeFile(target, json, { encoding: "utf8", mode: 0o600 });
    });
  } catch (err) {
    throw new KeystoreIoError("write", err);
  }
}

/** Removes the keystore file. A missing file counts as removed. */
export async function removeKeystoreFile(target: string): Promise<void> {
  try {
    await fs.unlink(target);
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") return;
    throw new KeystoreIoError("delete", err);
  }
}
