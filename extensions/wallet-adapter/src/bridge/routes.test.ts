import { describe, expect, it } from "vitest";
import { TransportFailureError } from "../types/error.js";
import { BRIDGE_ROUTES, BridgeRouter, toJsonStringArray, type BridgeRoute, type BridgeTransport } from "./routes.js";

describe("toJsonStringArray", () => {
  it("skips absent values and stringifies primitives", () => {
    expect(toJsonStringArray("a", 1, true, 5n, null, undefined)).toEqual(["a", "1", "true", "5"]);
  });

  it("encodes objects as JSON without null fields", () => {
    expect(toJsonStringArray({ a: 1, b: null, c: { d: null, e: 2n } }, [1, 2])).toEqual([
      '{"a":1,"c":{"e":"2"}}',
      "[1,2]",
    ]);
  });

  it("returns an empty list for no arguments", () => {
    expect(toJsonStringArray()).toEqual([]);
  });
});

describe("BridgeRouter", () => {
  it("invokes routes with encoded arguments", async () => {
    const transport = new StaticTransport({ [BRIDGE_ROUTES.recoverAddress]: "0x9999999999999999999999999999999999999999" });
    const router = new BridgeRouter(transport);

    const address = await router.recoverAddress("hello", "0xabcd");

    expect(address).toBe("0x9999999999999999999999999999999999999999");
    expect(transport.calls).toEqual([{ route: BRIDGE_ROUTES.recoverAddress, args: ["hello", "0xabcd"] }]);
  });

  it("accepts decimal and hex chain ids", async () => {
    expect(await new BridgeRouter(new StaticTransport({ [BRIDGE_ROUTES.getChainId]: "0x2105" })).getChainId()).toBe(8453);
    expect(await new BridgeRouter(new StaticTransport({ [BRIDGE_ROUTES.getChainId]: 10 })).getChainId()).toBe(10);
  });

  it("rejects results that do not match the route schema", async () => {
    const router = new BridgeRouter(new StaticTransport({ [BRIDGE_ROUTES.isConnected]: "yes" }));

    await expect(router.isConnected()).rejects.toBeInstanceOf(TransportFailureError);
  });

  it("wraps transport failures", async () => {
    const router = new BridgeRouter(new StaticTransport({}));

    await expect(router.getAddress()).rejects.toThrow("bridge route wallet/getAddress failed: no handler for wallet/getAddress");
  });
});

class StaticTransport implements BridgeTransport {
  readonly calls: Array<{ route: BridgeRoute; args: string[] }> = [];

  constructor(private readonly routes: Partial<Record<BridgeRoute, unknown>>) {}

  async connect(): Promise<string> {
    return "0x9999999999999999999999999999999999999999";
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
