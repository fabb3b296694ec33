/**
 * Transaction dispatch
 *
 * Value transfer and raw transaction submission. Both wait for the receipt
 * before returning; there is no pending result type.
 */

import { formatUnits, isAddress, isAddressEqual, isHex, parseEther, type Address, type Hex } from "viem";
import { expectAddress, parseQuantity } from "./rpc.js";
import type { ReceiptLike, WalletSession } from "./session.js";
import { InvalidParamsError, UnsupportedOnPlatformError } from "./types/error.js";
import {
  NATIVE_TOKEN_ADDRESS,
  type CurrencyValue,
  type OutgoingTransaction,
  type TransactionRequest,
  type TransactionResult,
} from "./types/transaction.js";

/**
 * Token-contract collaborator. Results are passed through unchanged.
 */
export interface TokenGateway {
  transfer(args: {
    session: WalletSession;
    token: Address;
    to: Address;
    amount: string;
  }): Promise<TransactionResult>;
  balanceOf(args: { session: WalletSession; token: Address; owner: Address }): Promise<CurrencyValue>;
}

export type TransactionDispatcherOptions = {
  tokenGateway?: TokenGateway;
};

const DECIMAL_AMOUNT = /^\d+(\.\d+)?$/;

/**
 * Normalize a receipt. A missing receipt yields the sentinel values.
 */
export function toTransactionResult(receipt?: ReceiptLike | null): TransactionResult {
  if (!receipt) {
    return {
      receipt: {
        from: "",
        to: "",
        transactionIndex: -1,
        gasUsed: "-1",
        blockHash: "",
        transactionHash: "",
      },
      id: "-1",
    };
  }
  return {
    receipt: {
      from: receipt.from,
      to: receipt.to ?? "",
      transactionIndex: receipt.transactionIndex,
      gasUsed: receipt.gasUsed.toString(),
      blockHash: receipt.blockHash,
      transactionHash: receipt.transactionHash,
    },
    id: receipt.status === "success" ? "1" : "0",
  };
}

export function isNativeCurrency(currency: string): boolean {
  return isAddress(currency, { strict: false }) && isAddressEqual(currency, NATIVE_TOKEN_ADDRESS);
}

export class TransactionDispatcher {
  private readonly tokenGateway?: TokenGateway;

  constructor(
    private readonly session: WalletSession,
    options: TransactionDispatcherOptions = {},
  ) {
    this.tokenGateway = options.tokenGateway;
  }

  /**
   * Send `amount` (decimal, in whole units) of `currency` to `to`.
   */
  async transfer(to: string, amount: string, currency: string = NATIVE_TOKEN_ADDRESS): Promise<TransactionResult> {
    const provider = this.session.getActiveProvider();
    const recipient = expectAddress(to, "to");
    const token = expectAddress(currency, "currency");
    if (!DECIMAL_AMOUNT.test(amount.trim())) {
      throw new InvalidParamsError("amount must be a non-negative decimal");
    }

    const router = this.session.getRouter();
    if (router) {
      return router.transfer(recipient, amount.trim(), token);
    }

    if (!isNativeCurrency(token)) {
      if (!this.tokenGateway) throw new UnsupportedOnPlatformError("token transfer", provider.getProvider());
      return this.tokenGateway.transfer({ session: this.session, token, to: recipient, amount: amount.trim() });
    }

    return this.submit({
      from: await provider.getAddress(),
      to: recipient,
      value: parseEther(amount.trim()),
    });
  }

  /**
   * Submit caller-built transaction fields as given. Nothing is estimated.
   */
  async sendRawTransaction(request: TransactionRequest): Promise<TransactionResult> {
    this.session.getActiveProvider(); // throws when idle
    const router = this.session.getRouter();
    if (router) {
      return router.sendRawTransaction(request);
    }
    return this.submit(toOutgoingTransaction(request));
  }

  async getBalance(currency: string = NATIVE_TOKEN_ADDRESS): Promise<CurrencyValue> {
    const provider = this.session.getActiveProvider();
    const token = expectAddress(currency, "currency");

    const router = this.session.getRouter();
    if (router) {
      return router.getBalance(token);
    }

    const owner = await provider.getAddress();
    if (!isNativeCurrency(token)) {
      if (!this.tokenGateway) throw new UnsupportedOnPlatformError("token balance", provider.getProvider());
      return this.tokenGateway.balanceOf({ session: this.session, token, owner });
    }

    const balance = await this.session.getChainReader().getBalance({ address: owner });
    const { name, symbol, decimals } = this.session.getChain().nativeCurrency;
    return {
      name,
      symbol,
      decimals,
      value: balance.toString(),
      displayValue: formatUnits(balance, decimals),
    };
  }

  private async submit(tx: OutgoingTransaction): Promise<TransactionResult> {
    const hash = await this.session.getActiveProvider().sendTransaction(tx);
    const receipt = await this.session.getChainReader().waitForTransactionReceipt({ hash });
    return toTransactionResult(receipt);
  }
}

function toOutgoingTransaction(request: TransactionRequest): OutgoingTransaction {
  const data = request.data?.trim();
  let hexData: Hex | undefined;
  if (data) {
    if (!isHex(data)) throw new InvalidParamsError("data must be hex");
    hexData = data;
  }
  return {
    to: expectAddress(request.to, "to"),
    from: request.from ? expectAddress(request.from, "from") : undefined,
    data: hexData,
    value: parseQuantity(request.value, "value"),
    gas: parseQuantity(request.gasLimit, "gasLimit"),
    gasPrice: parseQuantity(request.gasPrice, "gasPrice"),
  };
}
