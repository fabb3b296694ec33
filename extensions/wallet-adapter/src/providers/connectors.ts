/**
 * Handshake collaborators for the external variants. The core only sees these
 * interfaces; the concrete protocols live with the host application.
 */

import type { Address, Hash } from "viem";
import type { Eip1193Channel, WalletProvider } from "../types/provider.js";
import type { OutgoingTransaction } from "../types/transaction.js";

export type ChainTarget = {
  chainId: number;
  rpcUrl: string;
};

export interface WalletConnectConnector {
  connect(target: ChainTarget): Promise<{ accounts: readonly string[]; channel: Eip1193Channel }>;
  disconnect?(): Promise<void>;
}

export interface IdentityConnector {
  login(options: ChainTarget & { email: string }): Promise<{ address: string; channel: Eip1193Channel }>;
  logout?(): Promise<void>;
}

/**
 * Smart-account backend. Resolves the contract account controlled by a
 * signer and submits transactions on its behalf.
 */
export interface SmartAccountBackend {
  resolveAccount(options: ChainTarget & { signerAddress: Address; signer: WalletProvider }): Promise<Address>;
  sendTransaction(options: {
    account: Address;
    signer: WalletProvider;
    transaction: OutgoingTransaction;
  }): Promise<Hash>;
}
