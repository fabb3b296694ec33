/**
 * @acctkit/identity
 *
 * Sign-In-With-Ethereum login and verification over a wallet session.
 */

export { WalletAuth, type WalletAuthOptions } from "./auth.js";
export { CHALLENGE_STATEMENT, CHALLENGE_TTL_MS, CHALLENGE_VERSION, renderChallenge } from "./challenge.js";
export {
  EXPIRED_CHALLENGE_RETENTION_MS,
  OPEN_REGISTRY,
  SiweSession,
  type SiweSessionOptions,
} from "./siwe-session.js";
export {
  LoginPayloadDataSchema,
  LoginPayloadSchema,
  type Clock,
  type LoginPayload,
  type LoginPayloadData,
  type UserRegistry,
  type VerifyFailureReason,
  type VerifyResult,
} from "./types.js";
