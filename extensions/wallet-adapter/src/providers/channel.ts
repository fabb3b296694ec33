import { describeError, type LocalAccount } from "@acctkit/keystore";
import type { Address, Hash } from "viem";
import { expectHash, toRpcTransaction } from "../rpc.js";
import { NotConnectedError, TransportFailureError, WalletError } from "../types/error.js";
import type {
  Eip1193Channel,
  RpcRequest,
  WalletConnection,
  WalletProvider,
  WalletProviderKind,
} from "../types/provider.js";
import type { OutgoingTransaction } from "../types/transaction.js";

type ChannelState = {
  address: Address;
  channel: Eip1193Channel;
};

/**
 * Base for variants whose signer lives elsewhere. Holds only an address and a
 * request channel, never key material.
 */
export abstract class ChannelWalletProvider implements WalletProvider {
  private state: ChannelState | null = null;

  protected constructor(protected readonly kind: WalletProviderKind) {}

  abstract connect(connection: WalletConnection, rpcUrl: string): Promise<Address>;

  /** Variant-specific teardown of the handshake collaborator. */
  protected async release(): Promise<void> {}

  protected bind(address: Address, channel: Eip1193Channel): Address {
    this.state = { address, channel };
    return address;
  }

  async disconnect(): Promise<void> {
    if (!this.state) return;
    this.state = null;
    await this.release();
  }

  async getAddress(): Promise<Address> {
    return this.requireState().address;
  }

  async getSignerAddress(): Promise<Address> {
    return this.requireState().address;
  }

  getProvider(): WalletProviderKind {
    return this.kind;
  }

  getSignerProvider(): WalletProviderKind {
    return this.kind;
  }

  async isConnected(): Promise<boolean> {
    return this.state !== null;
  }

  getLocalAccount(): LocalAccount | undefined {
    return undefined;
  }

  async request(args: RpcRequest): Promise<unknown> {
    const { channel } = this.requireState();
    return forwardRequest(channel, args, this.kind);
  }

  async sendTransaction(tx: OutgoingTransaction): Promise<Hash> {
    const { address } = this.requireState();
    const result = await this.request({
      method: "eth_sendTransaction",
      params: [toRpcTransaction(tx, address)],
    });
    return expectHash(result, "eth_sendTransaction", this.kind);
  }

  protected requireState(): ChannelState {
    if (!this.state) throw new NotConnectedError(this.kind);
    return this.state;
  }
}

/**
 * Send a request over a channel. Failures that are not already wallet errors
 * become transport failures.
 */
export async function forwardRequest(
  channel: Eip1193Channel,
  args: RpcRequest,
  provider: WalletProviderKind,
): Promise<unknown> {
  try {
    return await channel.request(args);
  } catch (err) {
    if (err instanceof WalletError) throw err;
    throw new TransportFailureError(`${args.method} failed: ${describeError(err)}`, provider, err);
  }
}
