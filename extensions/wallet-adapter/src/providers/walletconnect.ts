import type { Address } from "viem";
import { firstAddress } from "../rpc.js";
import { TransportFailureError } from "../types/error.js";
import type { WalletConnection } from "../types/provider.js";
import { ChannelWalletProvider } from "./channel.js";
import type { WalletConnectConnector } from "./connectors.js";

/** External wallet paired over WalletConnect. */
export class WalletConnectProvider extends ChannelWalletProvider {
  constructor(private readonly connector: WalletConnectConnector) {
    super("walletconnect");
  }

  async connect(connection: WalletConnection, rpcUrl: string): Promise<Address> {
    const session = await this.connector.connect({ chainId: connection.chainId, rpcUrl });
    const address = firstAddress(session.accounts);
    if (!address) {
      throw new TransportFailureError("wallet session returned no accounts", this.kind);
    }
    return this.bind(address, session.channel);
  }

  protected override async release(): Promise<void> {
    await this.connector.disconnect?.();
  }
}
