/**
 * Type exports
 */

export type { EvmChainId, ChainInfo } from "./chain.js";

export type {
  WalletProviderKind,
  InjectedWalletKind,
  IdentityWalletKind,
  WalletConnection,
  RpcRequest,
  Eip1193Channel,
  WalletProvider,
} from "./provider.js";
export { WALLET_PROVIDER_KINDS, isWalletProviderKind } from "./provider.js";

export type {
  OutgoingTransaction,
  TransactionRequest,
  TransactionReceiptFields,
  TransactionResult,
  CurrencyValue,
} from "./transaction.js";
export { NATIVE_TOKEN_ADDRESS } from "./transaction.js";

export {
  ErrorCode,
  WalletError,
  NotConnectedError,
  NoLocalAccountError,
  UnsupportedOnPlatformError,
  TransportFailureError,
  InvalidParamsError,
  formatWalletErrorCode,
} from "./error.js";
