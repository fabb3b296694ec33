export { ChannelWalletProvider } from "./channel.js";
export type {
  ChainTarget,
  IdentityConnector,
  SmartAccountBackend,
  WalletConnectConnector,
} from "./connectors.js";
export { BridgeWalletProvider } from "./bridge.js";
export { IdentityWalletProvider } from "./identity.js";
export { InjectedWalletProvider } from "./injected.js";
export { LocalWalletProvider } from "./local.js";
export { SmartWalletProvider } from "./smart-wallet.js";
export { WalletConnectProvider } from "./walletconnect.js";
