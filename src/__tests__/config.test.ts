import { describe, it, expect } from "vitest";
import { loadConfig } from "../config.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({})).toEqual({
      apiKey: undefined,
      apiSecret: undefined,
      baseUrl: "https://3.98.238.66/api",
      verifyTls: false,
      autoConvert: false,
      logLevel: "info",
    });
  });

  it("reads credentials and flags", () => {
    const config = loadConfig({
      VIRGOCX_API_KEY: "test-key",
      VIRGOCX_API_SECRET: "test-secret",
      VIRGOCX_API_URL: "https://api.test/api",
      VIRGOCX_VERIFY_TLS: "true",
      VIRGOCX_AUTO_CONVERT: "1",
      LOG_LEVEL: "debug",
    });

    expect(config).toEqual({
      apiKey: "test-key",
      apiSecret: "test-secret",
      baseUrl: "https://api.test/api",
      verifyTls: true,
      autoConvert: true,
      logLevel: "debug",
    });
  });

  it("treats empty credentials as unset", () => {
    expect(loadConfig({ VIRGOCX_API_KEY: "" }).apiKey).toBeUndefined();
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ VIRGOCX_VERIFY_TLS: "yes" })).toThrow(/^Invalid configuration: VIRGOCX_VERIFY_TLS/);
    expect(() => loadConfig({ VIRGOCX_API_URL: "not a url" })).toThrow(/VIRGOCX_API_URL/);
  });
});
