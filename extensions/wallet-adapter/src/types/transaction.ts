/**
 * Transaction related types
 */

import type { Address, Hex } from "viem";

/** Sentinel currency address that selects the chain's native token. */
export const NATIVE_TOKEN_ADDRESS: Address = "0xEeeeeEeeeEeEeeEeEeEeeEEEeeeeEeeeeeeeEEeE";

/**
 * Transaction handed to a provider for signing and submission.
 */
export interface OutgoingTransaction {
  to: Address;
  from?: Address;
  /** Amount in wei */
  value?: bigint;
  data?: Hex;
  /** Gas limit */
  gas?: bigint;
  gasPrice?: bigint;
}

/**
 * Caller-supplied raw transaction. Decimal or 0x-hex strings; nothing is estimated.
 */
export interface TransactionRequest {
  from?: string;
  to: string;
  data?: string;
  value?: string;
  gasLimit?: string;
  gasPrice?: string;
}

export interface TransactionReceiptFields {
  from: string;
  to: string;
  /** -1 when unknown */
  transactionIndex: number;
  /** "-1" when unknown */
  gasUsed: string;
  blockHash: string;
  transactionHash: string;
}

/**
 * Normalized receipt. `id` is "1" for success, "0" for a revert, "-1" without a receipt.
 */
export interface TransactionResult {
  receipt: TransactionReceiptFields;
  id: string;
}

export interface CurrencyValue {
  name: string;
  symbol: string;
  decimals: number;
  /** Base units, decimal string */
  value: string;
  /** Formatted amount */
  displayValue: string;
}
