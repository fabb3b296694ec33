/**
 * @acctkit/keystore
 *
 * Local encrypted account keystore backing the local-key wallet provider.
 */

export {
  DEFAULT_KEYSTORE_CONFIG,
  DEFAULT_SCRYPT_PARAMS,
  resolveKeystoreConfig,
  type KeystoreConfig,
  type ScryptParams,
} from "./config.js";
export { resolveDeviceIdentifier, resolvePassword } from "./device.js";
export {
  IncorrectPasswordError,
  KeystoreError,
  KeystoreIoError,
  describeError,
  redactSensitiveInfo,
  type KeystoreErrorCode,
} from "./errors.js";
export { KeystoreManager, type LocalAccount, type UnlockOutcome } from "./keystore.js";
export { createSubsystemLogger, type KeystoreLogger } from "./logger.js";
export { resolveStorePath } from "./store.js";
