/**
 * EIP-4361 challenge rendering. Login and verify both go through
 * {@link renderChallenge} so a payload renders byte-identical on each side.
 */

import { describeError } from "@acctkit/keystore";
import { InvalidParamsError } from "@acctkit/wallet-adapter";
import { SiweMessage } from "siwe";
import { getAddress, isAddress } from "viem";
import type { LoginPayloadData } from "./types.js";

export const CHALLENGE_STATEMENT = "Please ensure that the domain above matches the URL of the current website.";
export const CHALLENGE_VERSION = "1";
export const CHALLENGE_TTL_MS = 5 * 60_000;

function describeSiweError(err: unknown): string {
  if (typeof err === "object" && err !== null && "type" in err && typeof err.type === "string") {
    return err.type;
  }
  return describeError(err);
}

export function parseTimestamp(value: string, field: string): Date {
  const parsed = new Date(value);
  if (Number.isNaN(parsed.getTime())) {
    throw new InvalidParamsError(`${field} must be an ISO-8601 timestamp`);
  }
  return parsed;
}

/**
 * Canonical human-readable form. The address is rendered checksummed; an
 * empty statement or resource list is left out of the message rather than
 * rendered as an empty section.
 */
export function renderChallenge(data: LoginPayloadData): string {
  if (!isAddress(data.address, { strict: false })) {
    throw new InvalidParamsError("payload.address must be an address");
  }
  if (!/^\d+$/.test(data.chain_id)) {
    throw new InvalidParamsError("payload.chain_id must be a decimal chain id");
  }
  parseTimestamp(data.issued_at, "payload.issued_at");
  if (data.expiration_time !== undefined) parseTimestamp(data.expiration_time, "payload.expiration_time");
  if (data.invalid_before !== undefined) parseTimestamp(data.invalid_before, "payload.invalid_before");

  try {
    return new SiweMessage({
      domain: data.domain,
      address: getAddress(data.address),
      statement: data.statement || undefined,
      uri: data.uri,
      version: data.version,
      chainId: Number(data.chain_id),
      nonce: data.nonce,
      issuedAt: data.issued_at,
      expirationTime: data.expiration_time,
      notBefore: data.invalid_before,
      resources: data.resources && data.resources.length > 0 ? data.resources : undefined,
    }).prepareMessage();
  } catch (err) {
    throw new InvalidParamsError(`invalid sign-in challenge: ${describeSiweError(err)}`, err);
  }
}
