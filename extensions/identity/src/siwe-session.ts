/**
 * Verifier-side sign-in state: issued challenges keyed by nonce, the user
 * registry and the clock. In memory only; one instance per verifier.
 */

import { generateNonce } from "siwe";
import type { Address } from "viem";
import type { Clock, UserRegistry } from "./types.js";

type PendingChallenge = {
  message: string;
  expiresAt: number | undefined;
};

/** How long an expired challenge is kept so late verifications still report expiry. */
export const EXPIRED_CHALLENGE_RETENTION_MS = 5 * 60_000;

export type SiweSessionOptions = {
  registry?: UserRegistry;
  clock?: Clock;
  expiredRetentionMs?: number;
};

/** Accepts every address. */
export const OPEN_REGISTRY: UserRegistry = {
  isRegistered: async () => true,
};

export class SiweSession {
  private readonly pending = new Map<string, PendingChallenge>();
  private readonly registry: UserRegistry;
  private readonly clock: Clock;
  private readonly expiredRetentionMs: number;

  constructor(options: SiweSessionOptions = {}) {
    this.registry = options.registry ?? OPEN_REGISTRY;
    this.clock = options.clock ?? (() => new Date());
    this.expiredRetentionMs = options.expiredRetentionMs ?? EXPIRED_CHALLENGE_RETENTION_MS;
  }

  now(): Date {
    return this.clock();
  }

  /** Fresh single-use nonce, not yet tied to a challenge. */
  createNonce(): string {
    let nonce = generateNonce();
    while (this.pending.has(nonce)) nonce = generateNonce();
    return nonce;
  }

  /** Record the rendered challenge issued under `nonce`. */
  remember(nonce: string, message: string, expiresAt?: Date): void {
    this.prune();
    this.pending.set(nonce, { message, expiresAt: expiresAt?.getTime() });
  }

  /** True when `message` is exactly the challenge stored for `nonce`. */
  matches(nonce: string, message: string): boolean {
    return this.pending.get(nonce)?.message === message;
  }

  consume(nonce: string): void {
    this.pending.delete(nonce);
  }

  hasPending(nonce: string): boolean {
    return this.pending.has(nonce);
  }

  async isRegistered(address: Address): Promise<boolean> {
    return this.registry.isRegistered(address);
  }

  private prune(): void {
    const now = this.clock().getTime();
    for (const [nonce, challenge] of this.pending) {
      if (challenge.expiresAt !== undefined && challenge.expiresAt + this.expiredRetentionMs <= now) {
        this.pending.delete(nonce);
      }
    }
  }
}
