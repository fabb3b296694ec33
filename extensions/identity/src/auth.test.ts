import { KeystoreManager } from "@acctkit/keystore";
import {
  BRIDGE_ROUTES,
  InvalidParamsError,
  NotConnectedError,
  TransportFailureError,
  WalletSession,
  recoverAddress,
  type BridgeRoute,
  type BridgeTransport,
} from "@acctkit/wallet-adapter";
import { custom } from "viem";
import { privateKeyToAccount } from "viem/accounts";
import { describe, expect, it } from "vitest";
import { WalletAuth } from "./auth.js";
import { CHALLENGE_STATEMENT, renderChallenge } from "./challenge.js";
import { SiweSession } from "./siwe-session.js";
import type { LoginPayload } from "./types.js";

const TEST_KEY = `0x${"11".repeat(32)}` as const;
const LOCAL_ADDRESS = privateKeyToAccount(TEST_KEY).address;
const ISSUED_AT = new Date("2026-01-01T00:00:00.000Z");

describe("WalletAuth.login", () => {
  it("issues a signed challenge for the domain", async () => {
    const { auth } = await setup();

    const { payload, signature } = await auth.login("example.com");

    expect(payload).toEqual({
      domain: "example.com",
      address: LOCAL_ADDRESS,
      statement: CHALLENGE_STATEMENT,
      uri: "https://example.com",
      version: "1",
      chain_id: "1",
      nonce: payload.nonce,
      issued_at: "2026-01-01T00:00:00.000Z",
      expiration_time: "2026-01-01T00:05:00.000Z",
      invalid_before: "2026-01-01T00:00:00.000Z",
      resources: [],
    });
    expect(payload.nonce).toMatch(/^[a-zA-Z0-9]{8,}$/);
    expect(await recoverAddress(renderChallenge(payload), signature)).toBe(LOCAL_ADDRESS);
  });

  it("renders the EIP-4361 text", async () => {
    const { auth } = await setup();

    const { payload } = await auth.login("example.com");
    const message = renderChallenge(payload);

    expect(message.startsWith(`example.com wants you to sign in with your Ethereum account:\n${LOCAL_ADDRESS}\n`)).toBe(
      true,
    );
    expect(message).toContain(`\nNonce: ${payload.nonce}\n`);
    expect(message).toContain("\nChain ID: 1\n");
    expect(message).toContain("\nExpiration Time: 2026-01-01T00:05:00.000Z");
    expect(message).not.toContain("Resources:");
  });

  it("uses a fresh nonce for every challenge", async () => {
    const { auth } = await setup();

    const first = await auth.login("example.com");
    const second = await auth.login("example.com");

    expect(first.payload.nonce).not.toBe(second.payload.nonce);
  });

  it("requires a domain and an active wallet", async () => {
    const { auth } = await setup();
    await expect(auth.login("  ")).rejects.toBeInstanceOf(InvalidParamsError);

    const idle = new WalletAuth(new WalletSession());
    await expect(idle.login("example.com")).rejects.toBeInstanceOf(NotConnectedError);
  });
});

describe("WalletAuth.verify", () => {
  it("authenticates a fresh payload and consumes its nonce", async () => {
    const { auth } = await setup();
    const login = await auth.login("example.com");

    expect(await auth.verify(login)).toEqual({ ok: true, address: LOCAL_ADDRESS });
    expect(await auth.verify(login)).toEqual({ ok: false, reason: "invalid-session" });
  });

  it("rejects an unregistered address before anything else", async () => {
    const { auth, clock } = await setup({ registry: { isRegistered: async () => false } });
    const login = await auth.login("example.com");
    clock.set(new Date("2026-01-01T01:00:00.000Z"));

    expect(await auth.verify({ ...login, signature: "0x1234" })).toEqual({ ok: false, reason: "invalid-user" });
  });

  it("rejects a tampered payload as an invalid signature", async () => {
    const { auth } = await setup();
    const login = await auth.login("example.com");

    const tampered: LoginPayload = { ...login, payload: { ...login.payload, statement: "Sign in to something else" } };

    expect(await auth.verify(tampered)).toEqual({ ok: false, reason: "invalid-signature" });
    expect(await auth.verify({ ...login, signature: "0x1234" })).toEqual({ ok: false, reason: "invalid-signature" });
    expect(await auth.verify({ ...login, signature: "not hex" })).toEqual({ ok: false, reason: "invalid-signature" });
  });

  it("checks the signature before freshness", async () => {
    const { auth, clock } = await setup();
    const login = await auth.login("example.com");
    clock.set(new Date("2026-01-01T01:00:00.000Z"));

    expect(await auth.verify({ ...login, signature: "0x1234" })).toEqual({ ok: false, reason: "invalid-signature" });
  });

  it("checks the stored challenge before freshness", async () => {
    const { auth } = await setup();
    const login = await auth.login("example.com");
    const otherClock = fixedClock(new Date("2026-01-01T01:00:00.000Z"));
    const otherVerifier = new WalletAuth(new WalletSession(), { siwe: new SiweSession({ clock: otherClock.now }) });

    expect(await otherVerifier.verify(login)).toEqual({ ok: false, reason: "invalid-session" });
  });

  it("expires exactly at the expiration time", async () => {
    const { auth, clock } = await setup();
    const login = await auth.login("example.com");

    clock.set(new Date("2026-01-01T00:05:00.000Z"));
    expect(await auth.verify(login)).toEqual({ ok: false, reason: "expired" });

    clock.set(new Date("2026-01-01T00:04:59.999Z"));
    expect(await auth.verify(login)).toEqual({ ok: false, reason: "invalid-session" });
  });

  it("accepts a payload until just before expiration", async () => {
    const { auth, clock } = await setup();
    const login = await auth.login("example.com");

    clock.set(new Date("2026-01-01T00:04:59.999Z"));
    expect(await auth.verify(login)).toEqual({ ok: true, address: LOCAL_ADDRESS });
  });

  it("treats a payload before its not-before time as expired without consuming it", async () => {
    const { auth, clock } = await setup();
    const login = await auth.login("example.com");

    clock.set(new Date("2025-12-31T23:59:59.000Z"));
    expect(await auth.verify(login)).toEqual({ ok: false, reason: "expired" });

    clock.set(ISSUED_AT);
    expect(await auth.verify(login)).toEqual({ ok: true, address: LOCAL_ADDRESS });
  });

  it("throws for payloads that are not login payloads", async () => {
    const { auth } = await setup();

    await expect(auth.verify(null)).rejects.toBeInstanceOf(InvalidParamsError);
    await expect(auth.verify({ signature: "0x1234" })).rejects.toBeInstanceOf(InvalidParamsError);
  });

  it("reports fields that cannot render into a challenge as an invalid signature", async () => {
    const { auth } = await setup();
    const login = await auth.login("example.com");

    expect(await auth.verify({ ...login, payload: { ...login.payload, chain_id: "one" } })).toEqual({
      ok: false,
      reason: "invalid-signature",
    });
    expect(await auth.verify({ ...login, payload: { ...login.payload, nonce: "abc" } })).toEqual({
      ok: false,
      reason: "invalid-signature",
    });
    expect(await auth.verify({ ...login, payload: { ...login.payload, issued_at: "yesterday" } })).toEqual({
      ok: false,
      reason: "invalid-signature",
    });
  });

  it("reports an address that does not parse as an invalid user", async () => {
    const { auth } = await setup();
    const login = await auth.login("example.com");

    expect(await auth.verify({ ...login, payload: { ...login.payload, address: "0x01" } })).toEqual({
      ok: false,
      reason: "invalid-user",
    });
  });

  it("accepts the claimed address in lower case", async () => {
    const { auth } = await setup();
    const login = await auth.login("example.com");
    const lowered: LoginPayload = {
      ...login,
      payload: { ...login.payload, address: login.payload.address.toLowerCase() },
    };

    expect(await auth.verify(lowered)).toEqual({ ok: true, address: LOCAL_ADDRESS });
  });

  it("still reports expiry after later challenges are issued", async () => {
    const { auth, clock } = await setup();
    const first = await auth.login("example.com");

    clock.set(new Date("2026-01-01T00:06:00.000Z"));
    await auth.login("example.com");

    expect(await auth.verify(first)).toEqual({ ok: false, reason: "expired" });
  });
});

describe("WalletAuth over the bridge", () => {
  const bridgePayload: LoginPayload = {
    signature: `0x${"cd".repeat(65)}`,
    payload: {
      domain: "example.com",
      address: LOCAL_ADDRESS,
      uri: "https://example.com",
      version: "1",
      chain_id: "1",
      nonce: "abcdefgh1234",
      issued_at: "2026-01-01T00:00:00.000Z",
    },
  };

  it("asks the bridge to log in", async () => {
    const bridge = new FakeBridge({ [BRIDGE_ROUTES.authLogin]: bridgePayload });
    const auth = await bridgeAuth(bridge);

    expect(await auth.login("example.com")).toEqual(bridgePayload);
    expect(bridge.calls).toEqual([{ route: BRIDGE_ROUTES.authLogin, args: ["example.com"] }]);
  });

  it.each([
    ["Invalid User", "invalid-user"],
    ["Invalid Signature", "invalid-signature"],
    ["Invalid Session", "invalid-session"],
    ["Expired", "expired"],
  ] as const)("maps the %s answer", async (answer, reason) => {
    const auth = await bridgeAuth(new FakeBridge({ [BRIDGE_ROUTES.authVerify]: answer }));

    expect(await auth.verify(bridgePayload)).toEqual({ ok: false, reason });
  });

  it("maps an address answer to success", async () => {
    const bridge = new FakeBridge({ [BRIDGE_ROUTES.authVerify]: LOCAL_ADDRESS.toLowerCase() });
    const auth = await bridgeAuth(bridge);

    expect(await auth.verify(bridgePayload)).toEqual({ ok: true, address: LOCAL_ADDRESS });
    expect(bridge.calls[0]?.args).toEqual([JSON.stringify(bridgePayload)]);
  });

  it("rejects any other answer", async () => {
    const auth = await bridgeAuth(new FakeBridge({ [BRIDGE_ROUTES.authVerify]: "OK" }));

    await expect(auth.verify(bridgePayload)).rejects.toBeInstanceOf(TransportFailureError);
  });
});

// ============================================================================
// Helpers
// ============================================================================

function fixedClock(start: Date) {
  let current = start;
  return {
    now: () => current,
    set: (next: Date) => {
      current = next;
    },
  };
}

async function setup(options: { registry?: { isRegistered: () => Promise<boolean> } } = {}) {
  const clock = fixedClock(ISSUED_AT);
  const session = new WalletSession({
    connectors: {
      keystore: new KeystoreManager({
        profile: "test",
        storePath: "/nonexistent/acctkit-test/keystore.json",
        deviceId: "test-device",
        scrypt: { n: 1024, r: 1, p: 1, dklen: 32 },
      }),
      transport: () =>
        custom(
          {
            request: async () => {
              throw new Error("offline");
            },
          },
          { retryCount: 0 },
        ),
    },
  });
  await session.connect({ provider: "local", chainId: 1, privateKey: TEST_KEY });
  const auth = new WalletAuth(session, {
    siwe: new SiweSession({ clock: clock.now, registry: options.registry }),
  });
  return { auth, session, clock };
}

async function bridgeAuth(bridge: FakeBridge): Promise<WalletAuth> {
  const session = new WalletSession({ connectors: { bridge } });
  await session.connect({ provider: "bridge", chainId: 1 });
  return new WalletAuth(session);
}

class FakeBridge implements BridgeTransport {
  readonly calls: Array<{ route: BridgeRoute; args: string[] }> = [];

  constructor(private readonly routes: Partial<Record<BridgeRoute, unknown>>) {}

  async connect(): Promise<string> {
    return LOCAL_ADDRESS;
  }

  async disconnect(): Promise<void> {}

  async invokeRoute(route: BridgeRoute, args: string[]): Promise<unknown> {
    this.calls.push({ route, args });
    if (!(route in this.routes)) throw new Error(`no handler for ${route}`);
    return this.routes[route];
  }

  async exportWallet(): Promise<string> {
    return "{}";
  }

  async fundWallet(): Promise<void> {}

  async switchNetwork(): Promise<void> {}
}
