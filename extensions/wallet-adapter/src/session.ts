/**
 * Wallet session
 *
 * Owns the single active provider plus chain/RPC configuration. Every higher
 * operation (auth, signing, dispatch) reads the provider through a session
 * handle; there is no process-wide default.
 *
 * Concurrent connect() calls on one session are not serialized. Callers that
 * may race must serialize them.
 */

import { describeError, KeystoreManager } from "@acctkit/keystore";
import { createPublicClient, type Address, type Chain, type Hash } from "viem";
import { BridgeRouter } from "./bridge/routes.js";
import { resolveConfig, resolveRpcUrl, type WalletAdapterConfig } from "./config.js";
import { toViemChain } from "./config/chains.js";
import { createWalletProvider, type WalletConnectors, type WalletProviderFactory } from "./factory.js";
import { createSubsystemLogger, type SubsystemLogger } from "./logger.js";
import { BridgeWalletProvider } from "./providers/bridge.js";
import { defaultTransportFactory, parseChainId } from "./rpc.js";
import {
  InvalidParamsError,
  NoLocalAccountError,
  NotConnectedError,
  UnsupportedOnPlatformError,
} from "./types/error.js";
import type { RpcRequest, WalletConnection, WalletProvider } from "./types/provider.js";

// ============================================================================
// Chain reader
// ============================================================================

/** Receipt fields the session layer consumes. */
export type ReceiptLike = {
  from: Address;
  to: Address | null;
  transactionIndex: number;
  gasUsed: bigint;
  blockHash: Hash;
  transactionHash: Hash;
  status: "success" | "reverted";
};

/**
 * Read-only node access. A viem public client satisfies it.
 */
export interface ChainReader {
  waitForTransactionReceipt(args: { hash: Hash }): Promise<ReceiptLike>;
  getBalance(args: { address: Address }): Promise<bigint>;
}

export type ChainReaderFactory = (chain: Chain, rpcUrl: string) => ChainReader;

// ============================================================================
// Session
// ============================================================================

export type WalletSessionOptions = {
  config?: WalletAdapterConfig;
  connectors?: WalletConnectors;
  createProvider?: WalletProviderFactory;
  chainReader?: ChainReaderFactory;
  logger?: SubsystemLogger;
};

/** Swapped wholesale on connect/disconnect, never mutated. */
type ActiveProvider = Readonly<{
  provider: WalletProvider;
  connection: WalletConnection;
  chain: Chain;
  rpcUrl: string;
  router: BridgeRouter | undefined;
}>;

export type FundOptions = {
  chainId?: number;
  address?: Address;
};

export class WalletSession {
  readonly config: WalletAdapterConfig;
  private readonly connectors: WalletConnectors;
  private readonly createProvider: WalletProviderFactory;
  private readonly chainReaderFactory: ChainReaderFactory;
  private readonly logger: SubsystemLogger;
  private active: ActiveProvider | null = null;
  private reader: { key: string; reader: ChainReader } | null = null;

  constructor(options: WalletSessionOptions = {}) {
    this.config = options.config ?? resolveConfig();
    this.connectors = {
      ...options.connectors,
      keystore: options.connectors?.keystore ?? new KeystoreManager(this.config.keystore),
    };
    this.createProvider = options.createProvider ?? createWalletProvider;
    this.chainReaderFactory =
      options.chainReader ??
      ((chain, rpcUrl) =>
        createPublicClient({
          chain,
          transport: (this.connectors.transport ?? defaultTransportFactory)(rpcUrl),
        }));
    this.logger = options.logger ?? createSubsystemLogger("wallet-session");
  }

  /**
   * Replace the active provider. The previous one is disconnected before the
   * new one becomes active; if the new connect fails the session stays
   * disconnected.
   */
  async connect(connection: WalletConnection): Promise<Address> {
    if (!Number.isSafeInteger(connection.chainId) || connection.chainId <= 0) {
      throw new InvalidParamsError("chainId must be a positive integer");
    }
    const frozen: WalletConnection = Object.freeze({ ...connection });

    try {
      await this.disconnect();
    } catch (err) {
      this.logger.warn(`previous wallet did not disconnect cleanly: ${describeError(err)}`);
    }

    const rpcUrl = resolveRpcUrl(this.config, frozen.chainId);
    const provider = this.createProvider(frozen, this.connectors);
    const address = await provider.connect(frozen, rpcUrl);

    this.active = Object.freeze({
      provider,
      connection: frozen,
      chain: toViemChain(frozen.chainId, rpcUrl),
      rpcUrl,
      router: provider instanceof BridgeWalletProvider ? provider.getRouter() : undefined,
    });
    this.logger.info(`connected ${provider.getProvider()} wallet on chain ${frozen.chainId}`);
    return address;
  }

  async disconnect(): Promise<void> {
    const previous = this.active;
    if (!previous) return;
    this.active = null;
    this.reader = null;
    await previous.provider.disconnect();
    this.logger.debug(`disconnected ${previous.provider.getProvider()} wallet`);
  }

  getActiveProvider(): WalletProvider {
    return this.requireActive().provider;
  }

  /** Never throws. */
  async isConnected(): Promise<boolean> {
    const active = this.active;
    if (!active) return false;
    try {
      return await active.provider.isConnected();
    } catch (err) {
      this.logger.debug(`isConnected check failed: ${describeError(err)}`);
      return false;
    }
  }

  async getAddress(): Promise<Address> {
    return this.getActiveProvider().getAddress();
  }

  async getSignerAddress(): Promise<Address> {
    return this.getActiveProvider().getSignerAddress();
  }

  /** Chain id as reported by the active signer. */
  async getChainId(): Promise<number> {
    return parseChainId(await this.request({ method: "eth_chainId" }));
  }

  async request(args: RpcRequest): Promise<unknown> {
    return this.getActiveProvider().request(args);
  }

  /** Bridge routes, when the active provider is the remote bridge. */
  getRouter(): BridgeRouter | undefined {
    return this.active?.router;
  }

  getConnection(): WalletConnection {
    return this.requireActive().connection;
  }

  getChain(): Chain {
    return this.requireActive().chain;
  }

  getRpcUrl(): string {
    return this.requireActive().rpcUrl;
  }

  getChainReader(): ChainReader {
    const { chain, rpcUrl } = this.requireActive();
    const key = `${chain.id}:${rpcUrl}`;
    let cached = this.reader;
    if (!cached || cached.key !== key) {
      cached = { key, reader: this.chainReaderFactory(chain, rpcUrl) };
      this.reader = cached;
    }
    return cached.reader;
  }

  // ==================== Local account ====================

  /**
   * Encrypted export of the local key. Empty password falls back to the
   * device identifier.
   */
  async exportLocalWallet(password = ""): Promise<string> {
    const { provider } = this.requireActive();
    if (provider instanceof BridgeWalletProvider) {
      return provider.exportWallet(password);
    }
    const local = provider.getLocalAccount();
    const keystore = this.connectors.keystore;
    if (!local || !keystore) {
      throw new NoLocalAccountError(provider.getProvider());
    }
    return keystore.export(local.privateKey, password);
  }

  // ==================== Bridge only ====================

  async switchNetwork(chainId: number): Promise<void> {
    const active = this.requireActive();
    if (!(active.provider instanceof BridgeWalletProvider)) {
      throw new UnsupportedOnPlatformError("switchNetwork", active.provider.getProvider());
    }
    await active.provider.switchNetwork(chainId);
    const rpcUrl = resolveRpcUrl(this.config, chainId);
    this.active = Object.freeze({
      ...active,
      connection: Object.freeze({ ...active.connection, chainId }),
      chain: toViemChain(chainId, rpcUrl),
      rpcUrl,
    });
    this.reader = null;
  }

  async fundWallet(options: FundOptions = {}): Promise<void> {
    const active = this.requireActive();
    if (!(active.provider instanceof BridgeWalletProvider)) {
      throw new UnsupportedOnPlatformError("fundWallet", active.provider.getProvider());
    }
    await active.provider.fundWallet({
      chainId: options.chainId ?? active.connection.chainId,
      address: options.address ?? (await active.provider.getAddress()),
    });
  }

  private requireActive(): ActiveProvider {
    if (!this.active) throw new NotConnectedError();
    return this.active;
  }
}
