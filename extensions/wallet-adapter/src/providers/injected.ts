import { numberToHex, type Address } from "viem";
import { firstAddress, parseChainId } from "../rpc.js";
import { TransportFailureError } from "../types/error.js";
import type { Eip1193Channel, InjectedWalletKind, WalletConnection } from "../types/provider.js";
import { ChannelWalletProvider, forwardRequest } from "./channel.js";

/**
 * Browser-injected signer (MetaMask, Coinbase Wallet, HyperPlay, any EIP-1193
 * provider). The handshake asks for accounts, then moves the signer to the
 * requested chain when it sits elsewhere.
 */
export class InjectedWalletProvider extends ChannelWalletProvider {
  constructor(
    kind: InjectedWalletKind,
    private readonly channel: Eip1193Channel,
  ) {
    super(kind);
  }

  async connect(connection: WalletConnection, _rpcUrl: string): Promise<Address> {
    const accounts = await forwardRequest(this.channel, { method: "eth_requestAccounts" }, this.kind);
    const address = firstAddress(accounts);
    if (!address) {
      throw new TransportFailureError("signer returned no accounts", this.kind);
    }

    const current = parseChainId(
      await forwardRequest(this.channel, { method: "eth_chainId" }, this.kind),
    );
    if (current !== connection.chainId) {
      await forwardRequest(
        this.channel,
        {
          method: "wallet_switchEthereumChain",
          params: [{ chainId: numberToHex(connection.chainId) }],
        },
        this.kind,
      );
    }

    return this.bind(address, this.channel);
  }
}
