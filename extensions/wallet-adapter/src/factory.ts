/**
 * Wallet provider factory
 * Picks the variant for a connection once, at connect time.
 */

import type { KeystoreManager } from "@acctkit/keystore";
import type { BridgeTransport } from "./bridge/routes.js";
import { BridgeWalletProvider } from "./providers/bridge.js";
import type {
  IdentityConnector,
  SmartAccountBackend,
  WalletConnectConnector,
} from "./providers/connectors.js";
import { IdentityWalletProvider } from "./providers/identity.js";
import { InjectedWalletProvider } from "./providers/injected.js";
import { LocalWalletProvider } from "./providers/local.js";
import { SmartWalletProvider } from "./providers/smart-wallet.js";
import { WalletConnectProvider } from "./providers/walletconnect.js";
import type { RpcTransportFactory } from "./rpc.js";
import { InvalidParamsError, UnsupportedOnPlatformError } from "./types/error.js";
import type {
  Eip1193Channel,
  IdentityWalletKind,
  InjectedWalletKind,
  WalletConnection,
  WalletProvider,
  WalletProviderKind,
} from "./types/provider.js";

// ============================================================================
// Connectors
// ============================================================================

/**
 * Collaborators available in this deployment. A variant whose collaborator
 * is missing is unsupported here.
 */
export type WalletConnectors = {
  keystore?: KeystoreManager;
  /** Node transport for the local variant. */
  transport?: RpcTransportFactory;
  injected?: Partial<Record<InjectedWalletKind, Eip1193Channel>>;
  walletConnect?: WalletConnectConnector;
  identity?: Partial<Record<IdentityWalletKind, IdentityConnector>>;
  smartAccount?: SmartAccountBackend;
  bridge?: BridgeTransport;
};

export type WalletProviderFactory = (
  connection: WalletConnection,
  connectors: WalletConnectors,
) => WalletProvider;

// ============================================================================
// Factory
// ============================================================================

function createPersonalProvider(
  kind: WalletProviderKind,
  connection: WalletConnection,
  connectors: WalletConnectors,
): WalletProvider {
  if (kind === "smart-wallet" || kind === "bridge") {
    throw new InvalidParamsError(`${kind} cannot control a smart account`);
  }
  return createWalletProvider({ ...connection, provider: kind }, connectors);
}

export const createWalletProvider: WalletProviderFactory = (connection, connectors) => {
  const kind = connection.provider;

  switch (kind) {
    case "local": {
      if (!connectors.keystore) throw new UnsupportedOnPlatformError("local accounts");
      return new LocalWalletProvider(connectors.keystore, connectors.transport);
    }
    case "metamask":
    case "coinbase":
    case "injected":
    case "hyperplay": {
      const channel = connectors.injected?.[kind];
      if (!channel) throw new UnsupportedOnPlatformError("connect", kind);
      return new InjectedWalletProvider(kind, channel);
    }
    case "walletconnect": {
      if (!connectors.walletConnect) throw new UnsupportedOnPlatformError("connect", kind);
      return new WalletConnectProvider(connectors.walletConnect);
    }
    case "magic-link":
    case "paper": {
      const connector = connectors.identity?.[kind];
      if (!connector) throw new UnsupportedOnPlatformError("connect", kind);
      return new IdentityWalletProvider(kind, connector);
    }
    case "smart-wallet": {
      if (!connectors.smartAccount) throw new UnsupportedOnPlatformError("connect", kind);
      const personal = createPersonalProvider(connection.personalWallet ?? "local", connection, connectors);
      return new SmartWalletProvider(personal, connectors.smartAccount);
    }
    case "bridge": {
      if (!connectors.bridge) throw new UnsupportedOnPlatformError("connect", kind);
      return new BridgeWalletProvider(connectors.bridge);
    }
  }
};
