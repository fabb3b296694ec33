/**
 * Remote bridge call convention: invoke a route by name with a JSON string
 * array of arguments. Results are validated before they reach callers.
 */

import { describeError } from "@acctkit/keystore";
import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { Address, Hex } from "viem";
import { expectAddress, expectHex, parseChainId } from "../rpc.js";
import { TransportFailureError, WalletError } from "../types/error.js";
import type { WalletConnection } from "../types/provider.js";
import type { CurrencyValue, TransactionRequest, TransactionResult } from "../types/transaction.js";

export const BRIDGE_ROUTES = {
  authLogin: "auth/login",
  authVerify: "auth/verify",
  balance: "wallet/balance",
  getAddress: "wallet/getAddress",
  isConnected: "wallet/isConnected",
  getChainId: "wallet/getChainId",
  transfer: "wallet/transfer",
  sign: "wallet/sign",
  recoverAddress: "wallet/recoverAddress",
  sendRawTransaction: "wallet/sendRawTransaction",
} as const;

export type BridgeRoute = (typeof BRIDGE_ROUTES)[keyof typeof BRIDGE_ROUTES];

export type FundWalletOptions = {
  address: Address;
  chainId: number;
};

/**
 * Host-side bridge process.
 */
export interface BridgeTransport {
  connect(connection: WalletConnection, rpcUrl: string): Promise<string>;
  disconnect(): Promise<void>;
  invokeRoute(route: BridgeRoute, args: string[]): Promise<unknown>;
  exportWallet(password: string): Promise<string>;
  fundWallet(options: FundWalletOptions): Promise<void>;
  switchNetwork(chainId: number): Promise<void>;
}

function dropNulls(_key: string, value: unknown): unknown {
  if (value === null) return undefined;
  return typeof value === "bigint" ? value.toString() : value;
}

/**
 * Encode bridge arguments. Absent values are skipped, primitives are
 * stringified and everything else is JSON without null fields.
 */
export function toJsonStringArray(...args: unknown[]): string[] {
  const encoded: string[] = [];
  for (const arg of args) {
    if (arg === null || arg === undefined) continue;
    if (typeof arg === "string") {
      encoded.push(arg);
    } else if (typeof arg === "number" || typeof arg === "boolean" || typeof arg === "bigint") {
      encoded.push(String(arg));
    } else {
      encoded.push(JSON.stringify(arg, dropNulls));
    }
  }
  return encoded;
}

// ============================================================================
// Result schemas
// ============================================================================

const CurrencyValueSchema = Type.Object({
  name: Type.String(),
  symbol: Type.String(),
  decimals: Type.Number(),
  value: Type.String(),
  displayValue: Type.String(),
});

const TransactionResultSchema = Type.Object({
  receipt: Type.Object({
    from: Type.String(),
    to: Type.String(),
    transactionIndex: Type.Number(),
    gasUsed: Type.String(),
    blockHash: Type.String(),
    transactionHash: Type.String(),
  }),
  id: Type.String(),
});

// ============================================================================
// Router
// ============================================================================

/**
 * Typed access to the bridge routes.
 */
export class BridgeRouter {
  constructor(private readonly transport: BridgeTransport) {}

  async invoke(route: BridgeRoute, ...args: unknown[]): Promise<unknown> {
    try {
      return await this.transport.invokeRoute(route, toJsonStringArray(...args));
    } catch (err) {
      if (err instanceof WalletError) throw err;
      throw new TransportFailureError(`bridge route ${route} failed: ${describeError(err)}`, "bridge", err);
    }
  }

  async invokeChecked<T extends TSchema>(schema: T, route: BridgeRoute, ...args: unknown[]): Promise<Static<T>> {
    const result = await this.invoke(route, ...args);
    if (!Value.Check(schema, result)) {
      throw new TransportFailureError(`bridge route ${route} returned an unexpected result`, "bridge", result);
    }
    return result;
  }

  async getAddress(): Promise<Address> {
    return expectAddress(await this.invokeChecked(Type.String(), BRIDGE_ROUTES.getAddress), "bridge address");
  }

  async isConnected(): Promise<boolean> {
    return this.invokeChecked(Type.Boolean(), BRIDGE_ROUTES.isConnected);
  }

  async getChainId(): Promise<number> {
    return parseChainId(
      await this.invokeChecked(Type.Union([Type.Number(), Type.String()]), BRIDGE_ROUTES.getChainId),
    );
  }

  async getBalance(currency: Address): Promise<CurrencyValue> {
    return this.invokeChecked(CurrencyValueSchema, BRIDGE_ROUTES.balance, currency);
  }

  async transfer(to: string, amount: string, currency: Address): Promise<TransactionResult> {
    return this.invokeChecked(TransactionResultSchema, BRIDGE_ROUTES.transfer, to, amount, currency);
  }

  async sign(message: string): Promise<Hex> {
    return expectHex(await this.invokeChecked(Type.String(), BRIDGE_ROUTES.sign, message), BRIDGE_ROUTES.sign, "bridge");
  }

  async recoverAddress(message: string, signature: string): Promise<Address> {
    const address = await this.invokeChecked(Type.String(), BRIDGE_ROUTES.recoverAddress, message, signature);
    return expectAddress(address, "recovered address");
  }

  async sendRawTransaction(request: TransactionRequest): Promise<TransactionResult> {
    return this.invokeChecked(TransactionResultSchema, BRIDGE_ROUTES.sendRawTransaction, request);
  }
}
