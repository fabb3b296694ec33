import { resolveKeystoreConfig, type KeystoreConfig } from "@acctkit/keystore";
import { getChainInfo } from "./config/chains.js";
import { InvalidParamsError } from "./types/error.js";

export type WalletAdapterConfig = {
  /** Chain used when a connection does not name one. */
  chainId: number;
  /** RPC endpoint; defaults to the chain table entry. */
  rpcUrl?: string;
  keystore: KeystoreConfig;
};

export const DEFAULT_CONFIG: WalletAdapterConfig = {
  chainId: 1,
  keystore: resolveKeystoreConfig(),
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
}

export function resolveConfig(raw?: Record<string, unknown>): WalletAdapterConfig {
  if (!raw) return { ...DEFAULT_CONFIG };

  const chainId =
    typeof raw.chainId === "number" && Number.isInteger(raw.chainId) && raw.chainId > 0
      ? raw.chainId
      : DEFAULT_CONFIG.chainId;
  const rpcUrl = typeof raw.rpcUrl === "string" && isHttpUrl(raw.rpcUrl) ? raw.rpcUrl : undefined;

  return {
    chainId,
    rpcUrl,
    keystore: resolveKeystoreConfig(isRecord(raw.keystore) ? raw.keystore : undefined),
  };
}

/**
 * Read configuration from ACCTKIT_* environment variables.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): WalletAdapterConfig {
  const chainId = env.ACCTKIT_CHAIN_ID ? Number.parseInt(env.ACCTKIT_CHAIN_ID, 10) : undefined;
  const keystore: Record<string, unknown> = {};
  if (env.ACCTKIT_PROFILE) keystore.profile = env.ACCTKIT_PROFILE;
  if (env.ACCTKIT_KEYSTORE_PATH) keystore.storePath = env.ACCTKIT_KEYSTORE_PATH;
  if (env.ACCTKIT_DEVICE_ID) keystore.deviceId = env.ACCTKIT_DEVICE_ID;

  return resolveConfig({
    chainId,
    rpcUrl: env.ACCTKIT_RPC_URL,
    keystore,
  });
}

/**
 * RPC endpoint for a chain: the configured URL when it targets the default
 * chain, else the chain table entry.
 */
export function resolveRpcUrl(config: WalletAdapterConfig, chainId: number): string {
  if (config.rpcUrl && chainId === config.chainId) return config.rpcUrl;
  const info = getChainInfo(chainId);
  if (info) return info.rpcUrl;
  if (config.rpcUrl) return config.rpcUrl;
  throw new InvalidParamsError(`No RPC endpoint known for chain ${chainId}`);
}
