import type { Address } from "viem";
import { expectAddress } from "../rpc.js";
import { InvalidParamsError } from "../types/error.js";
import type { IdentityWalletKind, WalletConnection } from "../types/provider.js";
import { ChannelWalletProvider } from "./channel.js";
import type { IdentityConnector } from "./connectors.js";

/** Email / social login signer (Magic Link, Paper). */
export class IdentityWalletProvider extends ChannelWalletProvider {
  constructor(
    kind: IdentityWalletKind,
    private readonly connector: IdentityConnector,
  ) {
    super(kind);
  }

  async connect(connection: WalletConnection, rpcUrl: string): Promise<Address> {
    const email = connection.email?.trim();
    if (!email) {
      throw new InvalidParamsError(`${this.kind} login requires an email`);
    }
    const login = await this.connector.login({ email, chainId: connection.chainId, rpcUrl });
    return this.bind(expectAddress(login.address, "address"), login.channel);
  }

  protected override async release(): Promise<void> {
    await this.connector.logout?.();
  }
}
