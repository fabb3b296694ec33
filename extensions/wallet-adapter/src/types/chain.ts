/**
 * Chain type definitions
 */

/**
 * EVM chain id
 */
export type EvmChainId =
  | 1 // Ethereum Mainnet
  | 11155111 // Sepolia
  | 8453 // Base Mainnet
  | 84532 // Base Sepolia
  | 10 // Optimism Mainnet
  | 42161 // Arbitrum One
  | 137 // Polygon Mainnet
  | 80002 // Polygon Amoy
  | number; // any other chain

/**
 * Chain metadata
 */
export interface ChainInfo {
  id: EvmChainId;
  name: string;
  symbol: string;
  decimals: number;
  explorerUrl: string;
  rpcUrl: string;
}
