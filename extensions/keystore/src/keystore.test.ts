import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { privateKeyToAccount } from "viem/accounts";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { KeystoreConfig } from "./config.js";
import { IncorrectPasswordError, KeystoreError } from "./errors.js";
import { KeystoreManager } from "./keystore.js";

let tmpDir: string;

function makeConfig(overrides?: Partial<KeystoreConfig>): KeystoreConfig {
  return {
    profile: "default",
    storePath: path.join(tmpDir, "account.json"),
    deviceId: "test-device",
    scrypt: { n: 1024, r: 1, p: 1, dklen: 32 },
    ...overrides,
  };
}

const TEST_KEY = `0x${"11".repeat(32)}` as const;
const OTHER_KEY = `0x${"22".repeat(32)}` as const;

beforeEach(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "acctkit-keystore-test-"));
});

afterEach(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

describe("KeystoreManager: encrypt / decrypt", () => {
  it("decrypts to the original key with the same password", async () => {
    const manager = new KeystoreManager(makeConfig());
    const json = await manager.encrypt(TEST_KEY, "test-password");

    await expect(manager.decrypt(json, "test-password")).resolves.toBe(TEST_KEY);
  });

  it("round-trips keys for several passwords", async () => {
    const manager = new KeystoreManager(makeConfig());
    for (const [key, password] of [
      [TEST_KEY, "a"],
      [OTHER_KEY, "pässwörd ✓"],
    ] as const) {
      const json = await manager.encrypt(key, password);
      await expect(manager.decrypt(json, password)).resolves.toBe(key);
    }
  });

  it("rejects a wrong password with IncorrectPasswordError", async () => {
    const manager = new KeystoreManager(makeConfig());
    const json = await manager.encrypt(TEST_KEY, "test-password");

    await expect(manager.decrypt(json, "wrong-password")).rejects.toBeInstanceOf(
      IncorrectPasswordError,
    );
  });

  it("embeds the scrypt parameters in the document", async () => {
    const manager = new KeystoreManager(makeConfig());
    const doc = JSON.parse(await manager.encrypt(TEST_KEY, "test-password"));
    const crypto = doc.Crypto ?? doc.crypto;

    expect(doc.version).toBe(3);
    expect(crypto.kdf).toBe("scrypt");
    expect(crypto.kdfparams.n).toBe(1024);
    expect(crypto.kdfparams.r).toBe(1);
    expect(crypto.kdfparams.p).toBe(1);
    expect(crypto.kdfparams.dklen).toBe(32);
  });

  it("refuses to encrypt something that is not a private key", async () => {
    const manager = new KeystoreManager(makeConfig());
    await expect(manager.encrypt("0x1234", "test-password")).rejects.toBeInstanceOf(KeystoreError);
  });

  it("export encrypts with the device identifier when no password is given", async () => {
    const manager = new KeystoreManager(makeConfig({ deviceId: "device-1234" }));
    const json = await manager.export(TEST_KEY, "");

    await expect(manager.decrypt(json, "device-1234")).resolves.toBe(TEST_KEY);
  });

  it("refuses documents that are not v3 keystores", async () => {
    const manager = new KeystoreManager(makeConfig());
    await expect(manager.decrypt(JSON.stringify({ hello: 1 }), "x")).rejects.toThrow(
      "not a v3 keystore",
    );
  });
});

describe("KeystoreManager: unlockOrCreate", () => {
  it("wraps a raw key without touching the file system", async () => {
    const config = makeConfig();
    const manager = new KeystoreManager(config);

    const outcome = await manager.unlockOrCreate(1, undefined, TEST_KEY);

    expect(outcome.created).toBe(false);
    expect(outcome.account.address).toBe(privateKeyToAccount(TEST_KEY).address);
    expect(outcome.chainId).toBe(1);
    expect(await manager.hasStoredAccount()).toBe(false);
  });

  it("creates and persists a key when none exists, then unlocks the same key", async () => {
    const manager = new KeystoreManager(makeConfig());

    const first = await manager.unlockOrCreate(1, "test-password");
    expect(first.created).toBe(true);
    expect(await manager.hasStoredAccount()).toBe(true);

    const raw = await fs.readFile(manager.getPath(), "utf8");
    expect(raw).not.toContain(first.privateKey.slice(2));

    const second = await manager.unlockOrCreate(1, "test-password");
    expect(second.created).toBe(false);
    expect(second.account.address).toBe(first.account.address);
    expect(second.privateKey).toBe(first.privateKey);
  });

  it("reports a wrong password distinctly", async () => {
    const manager = new KeystoreManager(makeConfig());
    await manager.unlockOrCreate(1, "test-password");

    await expect(manager.unlockOrCreate(1, "not-it")).rejects.toBeInstanceOf(IncorrectPasswordError);
  });

  it("falls back to the device identifier when no password is given", async () => {
    const manager = new KeystoreManager(makeConfig({ deviceId: "device-1234" }));
    const created = await manager.unlockOrCreate(5, "");

    const viaDeviceId = await manager.unlockOrCreate(5, "device-1234");
    expect(viaDeviceId.account.address).toBe(created.account.address);

    const raw = await fs.readFile(manager.getPath(), "utf8");
    await expect(manager.decrypt(raw, "device-1234")).resolves.toBe(created.privateKey);
  });

  it("binds the requested chain id to the returned account", async () => {
    const manager = new KeystoreManager(makeConfig());
    const outcome = await manager.unlockOrCreate(8453, "test-password");
    expect(outcome.chainId).toBe(8453);
  });

  it("regenerate overwrites the stored key", async () => {
    const manager = new KeystoreManager(makeConfig());
    const original = await manager.unlockOrCreate(1, "test-password");
    const replaced = await manager.regenerate(1, "test-password");

    const unlocked = await manager.unlockOrCreate(1, "test-password");
    expect(unlocked.privateKey).toBe(replaced.privateKey);
    expect(unlocked.privateKey).not.toBe(original.privateKey);
  });
});

describe("KeystoreManager: delete", () => {
  it("removes the keystore file and reports success", async () => {
    const manager = new KeystoreManager(makeConfig());
    await manager.unlockOrCreate(1, "test-password");

    await expect(manager.delete()).resolves.toBe(true);
    expect(await manager.hasStoredAccount()).toBe(false);
  });

  it("treats a missing file as deleted", async () => {
    const manager = new KeystoreManager(makeConfig());
    await expect(manager.delete()).resolves.toBe(true);
  });

  it("returns false instead of throwing when removal fails", async () => {
    const blocker = path.join(tmpDir, "not-a-directory");
    await fs.writeFile(blocker, "x", "utf8");
    const manager = new KeystoreManager(
      makeConfig({ storePath: path.join(blocker, "account.json") }),
    );

    await expect(manager.delete()).resolves.toBe(false);
  });
});
