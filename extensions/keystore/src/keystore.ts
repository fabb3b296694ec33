import { decryptKeystoreJson, encryptKeystoreJson, isKeystoreJson } from "ethers";
import { isHex, type Hex } from "viem";
import { generatePrivateKey, privateKeyToAccount, type PrivateKeyAccount } from "viem/accounts";
import type { KeystoreConfig } from "./config.js";
import { resolvePassword } from "./device.js";
import { IncorrectPasswordError, KeystoreError, describeError, redactSensitiveInfo } from "./errors.js";
import { createSubsystemLogger, type KeystoreLogger } from "./logger.js";
import {
  readKeystoreFile,
  keystoreFileExists,
  removeKeystoreFile,
  resolveStorePath,
  writeKeystoreFile,
} from "./store.js";

/** The in-memory credential of the local-key provider. Never shared. */
export type LocalAccount = {
  account: PrivateKeyAccount;
  privateKey: Hex;
  chainId: number;
};

export type UnlockOutcome = LocalAccount & {
  /** True when a fresh key was generated and persisted by this call. */
  created: boolean;
};

const PRIVATE_KEY_PATTERN = /^0x[0-9a-fA-F]{64}$/;

function assertPrivateKey(value: string): Hex {
  if (!isHex(value) || !PRIVATE_KEY_PATTERN.test(value)) {
    throw new KeystoreError("private key must be 32 bytes of 0x-prefixed hex", "INVALID_KEYSTORE");
  }
  return value;
}

function toLocalAccount(privateKey: Hex, chainId: number): LocalAccount {
  return { account: privateKeyToAccount(privateKey), privateKey, chainId };
}

/**
 * Owns the single per-profile keystore file.
 *
 * Lifecycle: created on first local-account use, overwritten only by
 * {@link KeystoreManager.regenerate}, removed only by {@link KeystoreManager.delete}.
 */
export class KeystoreManager {
  private readonly logger: KeystoreLogger;

  constructor(
    private readonly config: KeystoreConfig,
    logger?: KeystoreLogger,
  ) {
    this.logger = logger ?? createSubsystemLogger("keystore");
  }

  getPath(): string {
    return resolveStorePath(this.config);
  }

  async hasStoredAccount(): Promise<boolean> {
    return keystoreFileExists(this.getPath());
  }

  /**
   * Resolve the local account.
   *
   * 1. `rawKey` given: wrap it, no file I/O.
   * 2. keystore file present: decrypt it with `password` (device identifier when empty).
   * 3. otherwise: generate a key, persist it encrypted, return it.
   */
  async unlockOrCreate(chainId: number, password?: string, rawKey?: string): Promise<UnlockOutcome> {
    if (rawKey !== undefined) {
      return { ...toLocalAccount(assertPrivateKey(rawKey), chainId), created: false };
    }

    const secret = resolvePassword(this.config, password);
    const target = this.getPath();
    const existing = await readKeystoreFile(target);

    if (existing !== null) {
      const privateKey = await this.decrypt(existing, secret);
      this.logger.debug("unlocked local account from keystore");
      return { ...toLocalAccount(privateKey, chainId), created: false };
    }

    const privateKey = generatePrivateKey();
    await writeKeystoreFile(target, await this.encrypt(privateKey, secret));
    this.logger.info("generated new local account keystore");
    return { ...toLocalAccount(privateKey, chainId), created: true };
  }

  /** Replace the stored key with a freshly generated one. */
  async regenerate(chainId: number, password?: string): Promise<LocalAccount> {
    const privateKey = generatePrivateKey();
    const secret = resolvePassword(this.config, password);
    await writeKeystoreFile(this.getPath(), await this.encrypt(privateKey, secret));
    this.logger.info("regenerated local account keystore");
    return toLocalAccount(privateKey, chainId);
  }

  /**
   * Encrypt a private key into a self-describing Web3 Secret Storage (v3)
   * document. The scrypt parameters are embedded in the output.
   */
  async encrypt(privateKey: string, password: string): Promise<string> {
    const key = assertPrivateKey(privateKey);
    const { n, r, p } = this.config.scrypt;
    return encryptKeystoreJson(
      { address: privateKeyToAccount(key).address, privateKey: key },
      password,
      { scrypt: { N: n, r, p } },
    );
  }

  /** Encrypt a held key for handing to the user. Empty password falls back to the device identifier. */
  async export(privateKey: string, password?: string): Promise<string> {
    return this.encrypt(privateKey, resolvePassword(this.config, password));
  }

  async decrypt(json: string, password: string): Promise<Hex> {
    if (!isKeystoreJson(json)) {
      throw new KeystoreError("keystore file is not a v3 keystore document", "INVALID_KEYSTORE");
    }
    try {
      const decrypted = await decryptKeystoreJson(json, password);
      return assertPrivateKey(decrypted.privateKey);
    } catch (err) {
      this.logger.warn(`keystore decryption failed: ${redactSensitiveInfo(describeError(err))}`);
      throw new IncorrectPasswordError(err);
    }
  }

  /** Best-effort removal of the keystore file. Never throws. */
  async delete(): Promise<boolean> {
    try {
      await removeKeystoreFile(this.getPath());
      this.logger.info("deleted local account keystore");
      return true;
    } catch (err) {
      this.logger.warn(`error deleting keystore: ${describeError(err)}`);
      return false;
    }
  }
}
