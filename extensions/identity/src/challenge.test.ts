import { InvalidParamsError } from "@acctkit/wallet-adapter";
import { describe, expect, it } from "vitest";
import { renderChallenge } from "./challenge.js";
import type { LoginPayloadData } from "./types.js";

const DATA: LoginPayloadData = {
  domain: "example.com",
  address: "0x0000000000000000000000000000000000000001",
  statement: "Sign in to the example app.",
  uri: "https://example.com",
  version: "1",
  chain_id: "8453",
  nonce: "abcdefgh1234",
  issued_at: "2026-01-01T00:00:00.000Z",
};

describe("renderChallenge", () => {
  it("renders the canonical message", () => {
    expect(renderChallenge(DATA)).toBe(
      [
        "example.com wants you to sign in with your Ethereum account:",
        "0x0000000000000000000000000000000000000001",
        "",
        "Sign in to the example app.",
        "",
        "URI: https://example.com",
        "Version: 1",
        "Chain ID: 8453",
        "Nonce: abcdefgh1234",
        "Issued At: 2026-01-01T00:00:00.000Z",
      ].join("\n"),
    );
  });

  it("lists resources only when there are some", () => {
    expect(renderChallenge({ ...DATA, resources: [] })).not.toContain("Resources:");
    expect(renderChallenge({ ...DATA, resources: ["https://example.com/terms"] })).toContain(
      "\nResources:\n- https://example.com/terms",
    );
  });

  it("renders the address checksummed", () => {
    const lines = renderChallenge({ ...DATA, address: "0xcd2a3d9f938e13cd947ec05abc7fe734df8dd826" }).split("\n");

    expect(lines[1]).toBe("0xCD2a3d9F938E13CD947Ec05AbC7FE734Df8DD826");
  });

  it("renders identical text for identical fields", () => {
    expect(renderChallenge({ ...DATA })).toBe(renderChallenge(DATA));
  });

  it("rejects malformed fields", () => {
    expect(() => renderChallenge({ ...DATA, address: "0x01" })).toThrow(InvalidParamsError);
    expect(() => renderChallenge({ ...DATA, chain_id: "0x1" })).toThrow(InvalidParamsError);
    expect(() => renderChallenge({ ...DATA, issued_at: "yesterday" })).toThrow(InvalidParamsError);
  });
});
