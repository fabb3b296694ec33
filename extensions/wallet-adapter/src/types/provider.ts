/**
 * Wallet provider capability interface.
 * Every account source implements this contract.
 */

import type { LocalAccount } from "@acctkit/keystore";
import type { Address, Hash, Hex } from "viem";
import type { OutgoingTransaction } from "./transaction.js";

// ============================================================================
// Variant tags
// ============================================================================

export const WALLET_PROVIDER_KINDS = [
  "local",
  "metamask",
  "coinbase",
  "injected",
  "walletconnect",
  "magic-link",
  "paper",
  "smart-wallet",
  "hyperplay",
  "bridge",
] as const;

export type WalletProviderKind = (typeof WALLET_PROVIDER_KINDS)[number];

/** Browser-injected signers sharing the EIP-1193 handshake. */
export type InjectedWalletKind = "metamask" | "coinbase" | "injected" | "hyperplay";

/** Email / social login signers. */
export type IdentityWalletKind = "magic-link" | "paper";

export function isWalletProviderKind(value: unknown): value is WalletProviderKind {
  return typeof value === "string" && WALLET_PROVIDER_KINDS.some((kind) => kind === value);
}

// ============================================================================
// Connection
// ============================================================================

/**
 * Connection parameters. Frozen by the session once passed to connect.
 */
export type WalletConnection = Readonly<{
  provider: WalletProviderKind;
  chainId: number;
  /** Keystore password for the local variant; empty falls back to the device identifier. */
  password?: string;
  /** Login email for identity-linked variants. */
  email?: string;
  /** Signer kind controlling a smart account. Defaults to "local". */
  personalWallet?: WalletProviderKind;
  /** Import a raw key into the local variant instead of using the keystore file. */
  privateKey?: Hex;
}>;

// ============================================================================
// Request channel
// ============================================================================

export type RpcRequest = {
  method: string;
  params?: readonly unknown[];
};

/**
 * Minimal EIP-1193 request channel held by every external variant.
 */
export interface Eip1193Channel {
  request(args: RpcRequest): Promise<unknown>;
}

// ============================================================================
// Capability set
// ============================================================================

export interface WalletProvider {
  /** Establish the account and return its address. */
  connect(connection: WalletConnection, rpcUrl: string): Promise<Address>;
  /** Release held resources. Idempotent. */
  disconnect(): Promise<void>;

  getAddress(): Promise<Address>;
  /** Differs from {@link getAddress} only for smart accounts. */
  getSignerAddress(): Promise<Address>;

  getProvider(): WalletProviderKind;
  getSignerProvider(): WalletProviderKind;

  /** Never throws; internal failure reports false. */
  isConnected(): Promise<boolean>;

  /** The raw local credential. Only the local variant ever returns one. */
  getLocalAccount(): LocalAccount | undefined;

  /** Provider-neutral JSON-RPC. */
  request(args: RpcRequest): Promise<unknown>;

  sendTransaction(tx: OutgoingTransaction): Promise<Hash>;
}
