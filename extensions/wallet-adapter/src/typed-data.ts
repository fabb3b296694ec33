/**
 * EIP-712 payload handling for external signers.
 *
 * Remote signers reject native numeric and array JSON in the `message` slot,
 * so typed data sent over `eth_signTypedData_v4` is normalized first:
 * a base64 `message.uid` becomes hex and every other `message` field becomes a
 * string. Nothing outside `message` is touched.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import {
  bytesToHex,
  getTypesForEIP712Domain,
  isAddress,
  isHex,
  type TypedDataDefinition,
  type TypedDataDomain,
} from "viem";
import { InvalidParamsError } from "./types/error.js";

/** Typed data with a runtime-described schema. */
export type TypedDataPayload = TypedDataDefinition<Record<string, unknown>, string>;

const TypedDataJsonSchema = Type.Object({
  types: Type.Record(
    Type.String(),
    Type.Array(Type.Object({ name: Type.String(), type: Type.String() })),
  ),
  primaryType: Type.String(),
  domain: Type.Optional(
    Type.Object({
      name: Type.Optional(Type.String()),
      version: Type.Optional(Type.String()),
      chainId: Type.Optional(Type.Union([Type.Number(), Type.String()])),
      verifyingContract: Type.Optional(Type.String()),
      salt: Type.Optional(Type.String()),
    }),
  ),
  message: Type.Record(Type.String(), Type.Unknown()),
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}

/**
 * Serialize typed data to JSON. Bigints become decimal strings and the
 * `EIP712Domain` type is derived from the domain when absent.
 */
export function serializeTypedData(payload: TypedDataPayload): string {
  const domain = payload.domain ?? {};
  const types =
    "EIP712Domain" in payload.types
      ? payload.types
      : { EIP712Domain: getTypesForEIP712Domain({ domain }), ...payload.types };

  return JSON.stringify(
    {
      types,
      domain,
      primaryType: payload.primaryType,
      message: payload.message,
    },
    jsonReplacer,
  );
}

const BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

function uidToHex(value: unknown): string {
  if (typeof value !== "string") return stringifyField(value);
  if (!BASE64.test(value)) throw new InvalidParamsError("message.uid must be base64");
  return bytesToHex(Buffer.from(value, "base64"));
}

function stringifyField(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "bigint" || typeof value === "boolean") {
    return String(value);
  }
  return JSON.stringify(value, jsonReplacer);
}

/**
 * Apply the remote-signer transform to serialized typed data.
 */
export function normalizeTypedDataJson(json: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    throw new InvalidParamsError("typed data is not valid JSON", err);
  }
  if (!isRecord(parsed)) throw new InvalidParamsError("typed data must be a JSON object");
  if (!isRecord(parsed.message)) return JSON.stringify(parsed);

  const message: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed.message)) {
    message[key] = key === "uid" ? uidToHex(value) : stringifyField(value);
  }
  return JSON.stringify({ ...parsed, message });
}

type TypedDataJsonDomain = NonNullable<Static<typeof TypedDataJsonSchema>["domain"]>;

function toChainId(value: number | string): number | bigint {
  if (typeof value === "number") return value;
  if (/^(\d+|0x[0-9a-fA-F]+)$/.test(value)) return BigInt(value);
  throw new InvalidParamsError("domain.chainId must be an integer");
}

function toDomain(raw: TypedDataJsonDomain): TypedDataDomain {
  const { verifyingContract, salt } = raw;
  if (verifyingContract !== undefined && !isAddress(verifyingContract, { strict: false })) {
    throw new InvalidParamsError("domain.verifyingContract must be an address");
  }
  if (salt !== undefined && !isHex(salt)) {
    throw new InvalidParamsError("domain.salt must be hex");
  }
  return {
    ...(raw.name !== undefined ? { name: raw.name } : {}),
    ...(raw.version !== undefined ? { version: raw.version } : {}),
    ...(raw.chainId !== undefined ? { chainId: toChainId(raw.chainId) } : {}),
    ...(verifyingContract !== undefined ? { verifyingContract } : {}),
    ...(salt !== undefined ? { salt } : {}),
  };
}

/**
 * Parse `eth_signTypedData_v4` JSON back into a signable payload.
 */
export function parseTypedDataJson(json: string): TypedDataPayload {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    throw new InvalidParamsError("typed data is not valid JSON", err);
  }
  if (!Value.Check(TypedDataJsonSchema, parsed)) {
    throw new InvalidParamsError("typed data does not match the EIP-712 shape");
  }
  return {
    types: parsed.types,
    primaryType: parsed.primaryType,
    domain: parsed.domain ? toDomain(parsed.domain) : undefined,
    message: parsed.message,
  };
}
