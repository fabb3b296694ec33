/**
 * JSON-RPC helpers shared by the provider variants.
 */

import {
  getAddress,
  hexToBigInt,
  http,
  isAddress,
  isHash,
  isHex,
  numberToHex,
  type Address,
  type Hash,
  type Hex,
  type Transport,
} from "viem";
import { InvalidParamsError, TransportFailureError } from "./types/error.js";
import type { WalletProviderKind } from "./types/provider.js";
import type { OutgoingTransaction } from "./types/transaction.js";

/** Builds the transport used to reach a node. */
export type RpcTransportFactory = (rpcUrl: string) => Transport;

export const defaultTransportFactory: RpcTransportFactory = (rpcUrl) =>
  http(rpcUrl, { retryCount: 0 });

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse an `eth_chainId` answer. Accepts 0x-hex, decimal strings and numbers.
 */
export function parseChainId(value: unknown): number {
  if (typeof value === "number" && Number.isInteger(value) && value > 0) return value;
  if (typeof value === "string" && value.length > 0) {
    const parsed = isHex(value) ? Number(hexToBigInt(value)) : Number(value);
    if (Number.isSafeInteger(parsed) && parsed > 0) return parsed;
  }
  throw new TransportFailureError(`invalid chain id: ${String(value)}`);
}

/**
 * First entry of an `eth_accounts` / `eth_requestAccounts` answer, checksummed.
 */
export function firstAddress(value: unknown): Address | undefined {
  if (!Array.isArray(value)) return undefined;
  const [first] = value;
  return typeof first === "string" && isAddress(first, { strict: false }) ? getAddress(first) : undefined;
}

export function expectHex(value: unknown, method: string, provider?: WalletProviderKind): Hex {
  if (typeof value === "string" && isHex(value)) return value;
  throw new TransportFailureError(`${method} returned a non-hex result`, provider);
}

export function expectHash(value: unknown, method: string, provider?: WalletProviderKind): Hash {
  if (typeof value === "string" && isHash(value)) return value;
  throw new TransportFailureError(`${method} returned an invalid transaction hash`, provider);
}

export function expectAddress(value: unknown, field: string): Address {
  if (typeof value === "string" && isAddress(value, { strict: false })) return getAddress(value);
  throw new InvalidParamsError(`${field} must be an address`);
}

/**
 * Parse a decimal or 0x-hex integer string. Empty means absent.
 */
export function parseQuantity(value: string | undefined, field: string): bigint | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed) || /^0x[0-9a-fA-F]+$/.test(trimmed)) return BigInt(trimmed);
  throw new InvalidParamsError(`${field} must be a decimal or hex integer`);
}

/**
 * Encode a transaction for `eth_sendTransaction`, omitting absent fields.
 */
export function toRpcTransaction(tx: OutgoingTransaction, from: Address): Record<string, string> {
  const rpc: Record<string, string> = { from: tx.from ?? from, to: tx.to };
  if (tx.value !== undefined) rpc.value = numberToHex(tx.value);
  if (tx.data !== undefined) rpc.data = tx.data;
  if (tx.gas !== undefined) rpc.gas = numberToHex(tx.gas);
  if (tx.gasPrice !== undefined) rpc.gasPrice = numberToHex(tx.gasPrice);
  return rpc;
}

/**
 * Decode the first `eth_sendTransaction` parameter.
 */
export function fromRpcTransaction(value: unknown): OutgoingTransaction {
  if (!isRecord(value)) throw new InvalidParamsError("transaction must be an object");

  const text = (key: string): string | undefined => {
    const field = value[key];
    if (field === undefined || field === null) return undefined;
    if (typeof field !== "string") throw new InvalidParamsError(`${key} must be a string`);
    return field;
  };

  const data = text("data") ?? text("input");
  if (data !== undefined && !isHex(data)) throw new InvalidParamsError("data must be hex");
  const from = text("from");

  return {
    to: expectAddress(text("to"), "to"),
    from: from === undefined ? undefined : expectAddress(from, "from"),
    value: parseQuantity(text("value"), "value"),
    data,
    gas: parseQuantity(text("gas") ?? text("gasLimit"), "gas"),
    gasPrice: parseQuantity(text("gasPrice"), "gasPrice"),
  };
}
