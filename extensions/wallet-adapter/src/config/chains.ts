/**
 * Chain configuration constants
 */

import type { Chain } from "viem";
import type { ChainInfo, EvmChainId } from "../types/chain.js";

/**
 * EVM chain table
 */
export const EVM_CHAINS: Record<EvmChainId, ChainInfo> = {
  // Ethereum
  1: {
    id: 1,
    name: "Ethereum",
    symbol: "ETH",
    decimals: 18,
    explorerUrl: "https://etherscan.io",
    rpcUrl: "https://eth.llamarpc.com",
  },
  // Sepolia (Testnet)
  11155111: {
    id: 11155111,
    name: "Sepolia",
    symbol: "ETH",
    decimals: 18,
    explorerUrl: "https://sepolia.etherscan.io",
    rpcUrl: "https://rpc.sepolia.org",
  },
  // Base
  8453: {
    id: 8453,
    name: "Base",
    symbol: "ETH",
    decimals: 18,
    explorerUrl: "https://basescan.org",
    rpcUrl: "https://mainnet.base.org",
  },
  // Base Sepolia (Testnet)
  84532: {
    id: 84532,
    name: "Base Sepolia",
    symbol: "ETH",
    decimals: 18,
    explorerUrl: "https://sepolia.basescan.org",
    rpcUrl: "https://sepolia.base.org",
  },
  // Optimism
  10: {
    id: 10,
    name: "Optimism",
    symbol: "ETH",
    decimals: 18,
    explorerUrl: "https://optimistic.etherscan.io",
    rpcUrl: "https://mainnet.optimism.io",
  },
  // Arbitrum
  42161: {
    id: 42161,
    name: "Arbitrum One",
    symbol: "ETH",
    decimals: 18,
    explorerUrl: "https://arbiscan.io",
    rpcUrl: "https://arb1.arbitrum.io/rpc",
  },
  // Polygon
  137: {
    id: 137,
    name: "Polygon",
    symbol: "MATIC",
    decimals: 18,
    explorerUrl: "https://polygonscan.com",
    rpcUrl: "https://polygon-rpc.com",
  },
  // Polygon Amoy (Testnet)
  80002: {
    id: 80002,
    name: "Polygon Amoy",
    symbol: "MATIC",
    decimals: 18,
    explorerUrl: "https://amoy.polygonscan.com",
    rpcUrl: "https://rpc-amoy.polygon.technology",
  },
};

/**
 * Look up chain metadata by id
 */
export function getChainInfo(chainId: EvmChainId): ChainInfo | undefined {
  return EVM_CHAINS[chainId];
}

/**
 * Build a viem Chain for any chain id. Unknown chains get generic native
 * currency metadata and the given RPC endpoint.
 */
export function toViemChain(chainId: number, rpcUrl: string): Chain {
  const info = getChainInfo(chainId);
  return {
    id: chainId,
    name: info?.name ?? `Chain ${chainId}`,
    nativeCurrency: {
      name: info?.symbol ?? "ETH",
      symbol: info?.symbol ?? "ETH",
      decimals: info?.decimals ?? 18,
    },
    rpcUrls: {
      default: { http: [rpcUrl] },
    },
    ...(info
      ? { blockExplorers: { default: { name: "Explorer", url: info.explorerUrl } } }
      : {}),
  };
}
