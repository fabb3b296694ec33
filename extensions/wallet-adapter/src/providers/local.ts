/**
 * Local-key provider
 *
 * The only variant that holds key material. Signing happens in-process with
 * viem; other RPC goes to the node through the configured transport.
 */

import { describeError, type KeystoreManager, type LocalAccount } from "@acctkit/keystore";
import {
  createWalletClient,
  isAddress,
  isAddressEqual,
  isHex,
  numberToHex,
  type Address,
  type Chain,
  type EIP1193RequestFn,
  type Hash,
} from "viem";
import { toViemChain } from "../config/chains.js";
import { defaultTransportFactory, fromRpcTransaction, type RpcTransportFactory } from "../rpc.js";
import {
  InvalidParamsError,
  NotConnectedError,
  TransportFailureError,
  WalletError,
} from "../types/error.js";
import type { RpcRequest, WalletConnection, WalletProvider, WalletProviderKind } from "../types/provider.js";
import type { OutgoingTransaction } from "../types/transaction.js";
import { parseTypedDataJson } from "../typed-data.js";

type LocalState = {
  local: LocalAccount;
  chain: Chain;
  rpcUrl: string;
  forward: EIP1193RequestFn;
};

export class LocalWalletProvider implements WalletProvider {
  private state: LocalState | null = null;

  constructor(
    private readonly keystore: KeystoreManager,
    private readonly transportFactory: RpcTransportFactory = defaultTransportFactory,
  ) {}

  async connect(connection: WalletConnection, rpcUrl: string): Promise<Address> {
    const { account, privateKey, chainId } = await this.keystore.unlockOrCreate(
      connection.chainId,
      connection.password,
      connection.privateKey,
    );
    const chain = toViemChain(chainId, rpcUrl);
    this.state = {
      local: { account, privateKey, chainId },
      chain,
      rpcUrl,
      forward: this.transportFactory(rpcUrl)({ chain }).request,
    };
    return account.address;
  }

  async disconnect(): Promise<void> {
    this.state = null;
  }

  async getAddress(): Promise<Address> {
    return this.requireState().local.account.address;
  }

  async getSignerAddress(): Promise<Address> {
    return this.requireState().local.account.address;
  }

  getProvider(): WalletProviderKind {
    return "local";
  }

  getSignerProvider(): WalletProviderKind {
    return "local";
  }

  async isConnected(): Promise<boolean> {
    return this.state !== null;
  }

  getLocalAccount(): LocalAccount | undefined {
    return this.state?.local;
  }

  async request({ method, params = [] }: RpcRequest): Promise<unknown> {
    const { local, forward } = this.requireState();
    const { account } = local;

    switch (method) {
      case "eth_accounts":
      case "eth_requestAccounts":
        return [account.address];

      case "eth_chainId":
        return numberToHex(local.chainId);

      case "personal_sign": {
        const [data, address] = params;
        this.assertSigner(address);
        if (typeof data !== "string") throw new InvalidParamsError("personal_sign expects a message");
        return account.signMessage({ message: isHex(data) ? { raw: data } : data });
      }

      case "eth_signTypedData_v4": {
        const [address, json] = params;
        this.assertSigner(address);
        if (typeof json !== "string") {
          throw new InvalidParamsError("eth_signTypedData_v4 expects JSON typed data");
        }
        return account.signTypedData(parseTypedDataJson(json));
      }

      case "eth_sendTransaction":
        return this.sendTransaction(fromRpcTransaction(params[0]));

      default:
        try {
          return await forward({ method, params });
        } catch (err) {
          throw new TransportFailureError(`${method} failed: ${describeError(err)}`, "local", err);
        }
    }
  }

  async sendTransaction(tx: OutgoingTransaction): Promise<Hash> {
    const { local, chain, rpcUrl } = this.requireState();
    if (tx.from && !isAddressEqual(tx.from, local.account.address)) {
      throw new InvalidParamsError("transaction sender is not the local account");
    }

    const client = createWalletClient({
      account: local.account,
      chain,
      transport: this.transportFactory(rpcUrl),
    });
    try {
      return await client.sendTransaction({
        to: tx.to,
        value: tx.value,
        data: tx.data,
        gas: tx.gas,
        gasPrice: tx.gasPrice,
      });
    } catch (err) {
      if (err instanceof WalletError) throw err;
      throw new TransportFailureError(`sendTransaction failed: ${describeError(err)}`, "local", err);
    }
  }

  private assertSigner(address: unknown): void {
    const { account } = this.requireState().local;
    if (typeof address !== "string" || !isAddress(address, { strict: false })) {
      throw new InvalidParamsError("signer address is missing");
    }
    if (!isAddressEqual(address, account.address)) {
      throw new InvalidParamsError("signer address does not match the local account");
    }
  }

  private requireState(): LocalState {
    if (!this.state) throw new NotConnectedError("local");
    return this.state;
  }
}
