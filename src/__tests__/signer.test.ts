import { describe, it, expect } from "vitest";
import { vcxSign } from "../signer.js";
import { VirgoCXUsageError } from "../errors.js";

describe("vcxSign", () => {
  it("hashes the values in sorted key order with the secret injected", () => {
    // apiKey < apiSecret < symbol → md5("test-key" + "test-secret" + "BTC/CAD")
    expect(vcxSign({ apiKey: "test-key", symbol: "BTC/CAD" }, "test-secret"))
      .toBe("d4f0fcb427b49ba4293799a8b4c15131");
  });

  it("does not depend on insertion order", () => {
    const a = vcxSign({ b: "2", a: "1" }, "s");
    const b = vcxSign({ a: "1", b: "2" }, "s");
    expect(a).toBe(b);
    expect(a).toBe("0e7843e326dfff9edcf6b6ebe4c7e15d"); // md5("1s2")
  });

  it("uses an apiSecret already present in the payload", () => {
    expect(vcxSign({ apiSecret: "x", a: 1 })).toBe("38684612f0c6bb6dfa16da92f4a6878f"); // md5("1x")
  });

  it("prefers the payload's apiSecret over the fallback", () => {
    expect(vcxSign({ apiSecret: "x", a: 1 }, "other")).toBe("38684612f0c6bb6dfa16da92f4a6878f");
  });

  it("does not modify the caller's payload", () => {
    const payload = { apiKey: "test-key" };
    vcxSign(payload, "test-secret");
    expect(payload).toEqual({ apiKey: "test-key" });
  });

  it("throws a usage error when no secret is available", () => {
    expect(() => vcxSign({ apiKey: "test-key" })).toThrow(VirgoCXUsageError);
    expect(() => vcxSign({ apiKey: "test-key" })).toThrow("API secret is required");
  });

  it("returns lowercase hex of md5 length", () => {
    expect(vcxSign({}, "test-secret")).toMatch(/^[0-9a-f]{32}$/);
  });
});
