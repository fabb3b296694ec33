/**
 * Remote bridge provider
 *
 * Every capability is a named route on the host bridge. Selected once at
 * connect time; callers reach bridge-only features through {@link getRouter}.
 */

import { describeError, type LocalAccount } from "@acctkit/keystore";
import { hexToString, isHash, isHex, numberToHex, type Address, type Hash } from "viem";
import { BridgeRouter, type BridgeTransport, type FundWalletOptions } from "../bridge/routes.js";
import { expectAddress } from "../rpc.js";
import {
  InvalidParamsError,
  NotConnectedError,
  TransportFailureError,
  UnsupportedOnPlatformError,
  WalletError,
} from "../types/error.js";
import type { RpcRequest, WalletConnection, WalletProvider, WalletProviderKind } from "../types/provider.js";
import type { OutgoingTransaction } from "../types/transaction.js";

export class BridgeWalletProvider implements WalletProvider {
  private address: Address | null = null;
  private readonly router: BridgeRouter;

  constructor(private readonly transport: BridgeTransport) {
    this.router = new BridgeRouter(transport);
  }

  async connect(connection: WalletConnection, rpcUrl: string): Promise<Address> {
    const address = await this.call("connect", () => this.transport.connect(connection, rpcUrl));
    this.address = expectAddress(address, "bridge address");
    return this.address;
  }

  async disconnect(): Promise<void> {
    if (!this.address) return;
    this.address = null;
    await this.call("disconnect", () => this.transport.disconnect());
  }

  async getAddress(): Promise<Address> {
    return this.requireAddress();
  }

  async getSignerAddress(): Promise<Address> {
    return this.requireAddress();
  }

  getProvider(): WalletProviderKind {
    return "bridge";
  }

  getSignerProvider(): WalletProviderKind {
    return "bridge";
  }

  async isConnected(): Promise<boolean> {
    if (!this.address) return false;
    try {
      return await this.router.isConnected();
    } catch {
      return false;
    }
  }

  getLocalAccount(): LocalAccount | undefined {
    return undefined;
  }

  getRouter(): BridgeRouter {
    return this.router;
  }

  async request({ method, params = [] }: RpcRequest): Promise<unknown> {
    this.requireAddress();
    switch (method) {
      case "personal_sign": {
        const [data] = params;
        if (typeof data !== "string") throw new InvalidParamsError("personal_sign expects a message");
        return this.router.sign(isHex(data) ? hexToString(data) : data);
      }
      case "eth_chainId":
        return numberToHex(await this.router.getChainId());
      case "eth_accounts":
      case "eth_requestAccounts":
        return [await this.router.getAddress()];
      default:
        throw new UnsupportedOnPlatformError(method, "bridge");
    }
  }

  async sendTransaction(tx: OutgoingTransaction): Promise<Hash> {
    const from = this.requireAddress();
    const result = await this.router.sendRawTransaction({
      from: tx.from ?? from,
      to: tx.to,
      data: tx.data,
      value: tx.value?.toString(),
      gasLimit: tx.gas?.toString(),
      gasPrice: tx.gasPrice?.toString(),
    });
    const hash = result.receipt.transactionHash;
    if (!isHash(hash)) {
      throw new TransportFailureError("bridge returned no transaction hash", "bridge");
    }
    return hash;
  }

  async exportWallet(password: string): Promise<string> {
    this.requireAddress();
    return this.call("exportWallet", () => this.transport.exportWallet(password));
  }

  async fundWallet(options: FundWalletOptions): Promise<void> {
    this.requireAddress();
    await this.call("fundWallet", () => this.transport.fundWallet(options));
  }

  async switchNetwork(chainId: number): Promise<void> {
    this.requireAddress();
    await this.call("switchNetwork", () => this.transport.switchNetwork(chainId));
  }

  private requireAddress(): Address {
    if (!this.address) throw new NotConnectedError("bridge");
    return this.address;
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof WalletError) throw err;
      throw new TransportFailureError(`bridge ${operation} failed: ${describeError(err)}`, "bridge", err);
    }
  }
}
