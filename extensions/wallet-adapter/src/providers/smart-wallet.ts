import type { LocalAccount } from "@acctkit/keystore";
import type { Address, Hash } from "viem";
import { fromRpcTransaction } from "../rpc.js";
import { NotConnectedError } from "../types/error.js";
import type {
  RpcRequest,
  WalletConnection,
  WalletProvider,
  WalletProviderKind,
} from "../types/provider.js";
import type { OutgoingTransaction } from "../types/transaction.js";
import type { SmartAccountBackend } from "./connectors.js";

/**
 * Delegated smart account. The account address is a contract resolved by the
 * backend; signatures come from the wrapped personal provider.
 */
export class SmartWalletProvider implements WalletProvider {
  private account: Address | null = null;

  constructor(
    private readonly personal: WalletProvider,
    private readonly backend: SmartAccountBackend,
  ) {}

  async connect(connection: WalletConnection, rpcUrl: string): Promise<Address> {
    const personalKind = connection.personalWallet ?? "local";
    const signerAddress = await this.personal.connect({ ...connection, provider: personalKind }, rpcUrl);
    try {
      this.account = await this.backend.resolveAccount({
        signerAddress,
        signer: this.personal,
        chainId: connection.chainId,
        rpcUrl,
      });
    } catch (err) {
      await this.personal.disconnect();
      throw err;
    }
    return this.account;
  }

  async disconnect(): Promise<void> {
    this.account = null;
    await this.personal.disconnect();
  }

  async getAddress(): Promise<Address> {
    if (!this.account) throw new NotConnectedError("smart-wallet");
    return this.account;
  }

  async getSignerAddress(): Promise<Address> {
    if (!this.account) throw new NotConnectedError("smart-wallet");
    return this.personal.getAddress();
  }

  getProvider(): WalletProviderKind {
    return "smart-wallet";
  }

  getSignerProvider(): WalletProviderKind {
    return this.personal.getProvider();
  }

  async isConnected(): Promise<boolean> {
    if (!this.account) return false;
    try {
      return await this.personal.isConnected();
    } catch {
      return false;
    }
  }

  /** The controlling key is not exported through the smart account. */
  getLocalAccount(): LocalAccount | undefined {
    return undefined;
  }

  /** Key of a local personal signer, for structured signing only. */
  getSignerAccount(): LocalAccount | undefined {
    return this.personal.getLocalAccount();
  }

  /** Account queries and transactions use the smart account; everything else goes to the signer. */
  async request(args: RpcRequest): Promise<unknown> {
    const account = await this.getAddress();
    switch (args.method) {
      case "eth_accounts":
      case "eth_requestAccounts":
        return [account];
      case "eth_sendTransaction":
        return this.sendTransaction(fromRpcTransaction(args.params?.[0]));
      default:
        return this.personal.request(args);
    }
  }

  async sendTransaction(tx: OutgoingTransaction): Promise<Hash> {
    const account = await this.getAddress();
    return this.backend.sendTransaction({ account, signer: this.personal, transaction: tx });
  }
}
