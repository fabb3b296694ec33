/**
 * @acctkit/wallet-adapter
 *
 * Wallet provider variants behind one capability contract, the session that
 * holds the active one, signing and transaction dispatch.
 */

// ==================== Types ====================

export type {
  EvmChainId,
  ChainInfo,
  WalletProviderKind,
  InjectedWalletKind,
  IdentityWalletKind,
  WalletConnection,
  RpcRequest,
  Eip1193Channel,
  WalletProvider,
  OutgoingTransaction,
  TransactionRequest,
  TransactionReceiptFields,
  TransactionResult,
  CurrencyValue,
} from "./types/index.js";
export {
  WALLET_PROVIDER_KINDS,
  isWalletProviderKind,
  NATIVE_TOKEN_ADDRESS,
  ErrorCode,
  WalletError,
  NotConnectedError,
  NoLocalAccountError,
  UnsupportedOnPlatformError,
  TransportFailureError,
  InvalidParamsError,
  formatWalletErrorCode,
} from "./types/index.js";

// ==================== Config ====================

export { EVM_CHAINS, getChainInfo, toViemChain } from "./config/chains.js";
export {
  DEFAULT_CONFIG,
  loadConfigFromEnv,
  resolveConfig,
  resolveRpcUrl,
  type WalletAdapterConfig,
} from "./config.js";
export { createSubsystemLogger, type SubsystemLogger } from "./logger.js";

// ==================== Providers ====================

export * from "./providers/index.js";
export { createWalletProvider, type WalletConnectors, type WalletProviderFactory } from "./factory.js";
export {
  defaultTransportFactory,
  parseChainId,
  type RpcTransportFactory,
} from "./rpc.js";

// ==================== Bridge ====================

export {
  BRIDGE_ROUTES,
  BridgeRouter,
  toJsonStringArray,
  type BridgeRoute,
  type BridgeTransport,
  type FundWalletOptions,
} from "./bridge/routes.js";

// ==================== Session ====================

export {
  WalletSession,
  type ChainReader,
  type ChainReaderFactory,
  type FundOptions,
  type ReceiptLike,
  type WalletSessionOptions,
} from "./session.js";

// ==================== Signing / dispatch ====================

export { recoverAddress, sign, signTypedData } from "./signing.js";
export {
  normalizeTypedDataJson,
  parseTypedDataJson,
  serializeTypedData,
  type TypedDataPayload,
} from "./typed-data.js";
export {
  TransactionDispatcher,
  isNativeCurrency,
  toTransactionResult,
  type TokenGateway,
  type TransactionDispatcherOptions,
} from "./dispatcher.js";
