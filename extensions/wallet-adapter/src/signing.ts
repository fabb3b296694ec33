/**
 * Message and typed-data signing through the active provider.
 */

import type { LocalAccount } from "@acctkit/keystore";
import { getAddress, recoverMessageAddress, stringToHex, type Address, type Hex } from "viem";
import { SmartWalletProvider } from "./providers/smart-wallet.js";
import { expectHex } from "./rpc.js";
import type { WalletSession } from "./session.js";
import { normalizeTypedDataJson, serializeTypedData, type TypedDataPayload } from "./typed-data.js";
import type { WalletProvider } from "./types/provider.js";

/**
 * Personal-message signature bound to the session's signer address.
 */
export async function sign(session: WalletSession, message: string): Promise<Hex> {
  const provider = session.getActiveProvider();
  const signer = await provider.getSignerAddress();
  const result = await provider.request({
    method: "personal_sign",
    params: [stringToHex(message), signer],
  });
  return expectHex(result, "personal_sign", provider.getProvider());
}

function localSigner(provider: WalletProvider): LocalAccount | undefined {
  if (provider.getSignerProvider() !== "local") return undefined;
  if (provider instanceof SmartWalletProvider) return provider.getSignerAccount();
  return provider.getLocalAccount();
}

/**
 * EIP-712 signature. Local keys (including one controlling a smart account) sign the structured payload directly; every
 * other signer receives normalized JSON over `eth_signTypedData_v4`.
 */
export async function signTypedData(session: WalletSession, payload: TypedDataPayload): Promise<Hex> {
  const provider = session.getActiveProvider();

  const local = localSigner(provider);
  if (local) {
    return local.account.signTypedData(payload);
  }

  const signer = await provider.getSignerAddress();
  const json = normalizeTypedDataJson(serializeTypedData(payload));
  const result = await provider.request({
    method: "eth_signTypedData_v4",
    params: [signer, json],
  });
  return expectHex(result, "eth_signTypedData_v4", provider.getProvider());
}

/**
 * EIP-191 personal-message recovery. Checksummed.
 */
export async function recoverAddress(message: string, signature: Hex): Promise<Address> {
  return getAddress(await recoverMessageAddress({ message, signature }));
}
