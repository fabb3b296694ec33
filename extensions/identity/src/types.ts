/**
 * Sign-in types. The transport shape keeps the snake_case field names the
 * bridge host exchanges.
 */

import { Type, type Static } from "@sinclair/typebox";
import type { Address } from "viem";

export const LoginPayloadDataSchema = Type.Object({
  domain: Type.String(),
  address: Type.String(),
  statement: Type.Optional(Type.String()),
  uri: Type.String(),
  version: Type.String(),
  chain_id: Type.String(),
  nonce: Type.String(),
  issued_at: Type.String(),
  expiration_time: Type.Optional(Type.String()),
  invalid_before: Type.Optional(Type.String()),
  resources: Type.Optional(Type.Array(Type.String())),
});

export const LoginPayloadSchema = Type.Object({
  signature: Type.String(),
  payload: LoginPayloadDataSchema,
});

export type LoginPayloadData = Static<typeof LoginPayloadDataSchema>;

/** Signature plus every challenge field, as signed. */
export type LoginPayload = Static<typeof LoginPayloadSchema>;

export type VerifyFailureReason = "invalid-user" | "invalid-signature" | "invalid-session" | "expired";

export type VerifyResult = { ok: true; address: Address } | { ok: false; reason: VerifyFailureReason };

/** Decides whether an address may sign in at all. */
export interface UserRegistry {
  isRegistered(address: Address): Promise<boolean>;
}

export type Clock = () => Date;
