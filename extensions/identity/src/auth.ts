/**
 * Sign-in challenge / response
 *
 * login() runs on the account owner's side and produces a signed payload;
 * verify() runs on the relying side against its own SiweSession. The two only
 * share the transported {@link LoginPayload}.
 */

import { describeError } from "@acctkit/keystore";
import {
  BRIDGE_ROUTES,
  InvalidParamsError,
  TransportFailureError,
  sign,
  type WalletSession,
} from "@acctkit/wallet-adapter";
import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { getAddress, isAddress, isHex, verifyMessage, type Address } from "viem";
import {
  CHALLENGE_STATEMENT,
  CHALLENGE_TTL_MS,
  CHALLENGE_VERSION,
  parseTimestamp,
  renderChallenge,
} from "./challenge.js";
import { createSubsystemLogger, type IdentityLogger } from "./logger.js";
import { SiweSession } from "./siwe-session.js";
import {
  LoginPayloadSchema,
  type LoginPayload,
  type LoginPayloadData,
  type VerifyFailureReason,
  type VerifyResult,
} from "./types.js";

/** Answers of the bridge `auth/verify` route other than an address. */
const BRIDGE_VERIFY_FAILURES = new Map<string, VerifyFailureReason>([
  ["Invalid User", "invalid-user"],
  ["Invalid Signature", "invalid-signature"],
  ["Invalid Session", "invalid-session"],
  ["Expired", "expired"],
]);

export type WalletAuthOptions = {
  siwe?: SiweSession;
  logger?: IdentityLogger;
};

export class WalletAuth {
  readonly siwe: SiweSession;
  private readonly logger: IdentityLogger;

  constructor(
    private readonly session: WalletSession,
    options: WalletAuthOptions = {},
  ) {
    this.siwe = options.siwe ?? new SiweSession();
    this.logger = options.logger ?? createSubsystemLogger("identity");
  }

  /**
   * Build, sign and record a challenge for `domain`.
   */
  async login(domain: string): Promise<LoginPayload> {
    const trimmed = domain.trim();
    if (!trimmed) throw new InvalidParamsError("domain is required");

    const router = this.session.getRouter();
    if (router) {
      return router.invokeChecked(LoginPayloadSchema, BRIDGE_ROUTES.authLogin, trimmed);
    }

    const address = await this.session.getSignerAddress();
    const chainId = await this.session.getChainId();
    const issuedAt = this.siwe.now();
    const expiresAt = new Date(issuedAt.getTime() + CHALLENGE_TTL_MS);
    const nonce = this.siwe.createNonce();

    const payload: LoginPayloadData = {
      domain: trimmed,
      address,
      statement: CHALLENGE_STATEMENT,
      uri: `https://${trimmed}`,
      version: CHALLENGE_VERSION,
      chain_id: String(chainId),
      nonce,
      issued_at: issuedAt.toISOString(),
      expiration_time: expiresAt.toISOString(),
      invalid_before: issuedAt.toISOString(),
      resources: [],
    };

    const message = renderChallenge(payload);
    const signature = await sign(this.session, message);
    this.siwe.remember(nonce, message, expiresAt);
    this.logger.debug(`issued sign-in challenge for ${trimmed} on chain ${chainId}`);

    return { signature, payload };
  }

  /**
   * Check, in order: registered user, signature, stored challenge, time
   * window. The first failing check decides the result. Fields that cannot
   * render into a challenge were not what the wallet signed. A payload that
   * is not shaped like a login payload throws instead.
   */
  async verify(payload: unknown): Promise<VerifyResult> {
    if (!Value.Check(LoginPayloadSchema, payload)) {
      throw new InvalidParamsError("malformed login payload");
    }

    const router = this.session.getRouter();
    if (router) {
      const answer = await router.invokeChecked(Type.String(), BRIDGE_ROUTES.authVerify, payload);
      return fromBridgeAnswer(answer);
    }

    const { signature, payload: data } = payload;
    if (!isAddress(data.address, { strict: false })) {
      return { ok: false, reason: "invalid-user" };
    }
    const claimed = getAddress(data.address);

    if (!(await this.siwe.isRegistered(claimed))) {
      return { ok: false, reason: "invalid-user" };
    }

    const message = this.tryRender(data);
    if (message === undefined) {
      return { ok: false, reason: "invalid-signature" };
    }

    if (!(await this.isSignatureValid(claimed, message, signature))) {
      return { ok: false, reason: "invalid-signature" };
    }

    if (!this.siwe.matches(data.nonce, message)) {
      return { ok: false, reason: "invalid-session" };
    }

    const now = this.siwe.now().getTime();
    const notBefore = data.invalid_before ? parseTimestamp(data.invalid_before, "payload.invalid_before") : undefined;
    const expiresAt = data.expiration_time
      ? parseTimestamp(data.expiration_time, "payload.expiration_time")
      : undefined;
    if (expiresAt && now >= expiresAt.getTime()) {
      this.siwe.consume(data.nonce);
      return { ok: false, reason: "expired" };
    }
    if (notBefore && now < notBefore.getTime()) {
      return { ok: false, reason: "expired" };
    }

    this.siwe.consume(data.nonce);
    this.logger.info(`verified sign-in for ${claimed}`);
    return { ok: true, address: claimed };
  }

  private tryRender(data: LoginPayloadData): string | undefined {
    try {
      return renderChallenge(data);
    } catch (err) {
      this.logger.debug(`unrenderable sign-in payload: ${describeError(err)}`);
      return undefined;
    }
  }

  private async isSignatureValid(address: Address, message: string, signature: string): Promise<boolean> {
    if (!isHex(signature)) return false;
    try {
      return await verifyMessage({ address, message, signature });
    } catch (err) {
      this.logger.debug(`signature check failed: ${describeError(err)}`);
      return false;
    }
  }
}

function fromBridgeAnswer(answer: string): VerifyResult {
  const reason = BRIDGE_VERIFY_FAILURES.get(answer);
  if (reason) return { ok: false, reason };
  if (isAddress(answer, { strict: false })) return { ok: true, address: getAddress(answer) };
  throw new TransportFailureError("bridge auth/verify returned an unexpected answer", "bridge");
}
