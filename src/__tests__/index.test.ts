import { describe, it, expect } from "vitest";
import * as lib from "../index.js";

describe("package entry", () => {
  it("exposes the client, signer, formatter and error classes", () => {
    expect(typeof lib.VirgoCXClient).toBe("function");
    expect(typeof lib.vcxSign).toBe("function");
    expect(typeof lib.formatResult).toBe("function");
    expect(typeof lib.resultFormatter).toBe("function");
    expect(lib.sharedSymbolCache).toBeInstanceOf(lib.SymbolInfoCache);
    expect(new lib.VirgoCXCacheMissError("BTC/CAD")).toBeInstanceOf(lib.VirgoCXError);
  });

  it("exposes the enums with their wire codes", () => {
    expect(lib.OrderStatus.OPEN).toBe(1);
    expect(lib.OrderDirection.SELL).toBe(2);
    expect(lib.OrderType.QUICK_TRADE).toBe(3);
    expect(lib.KLineType.FOUR_HOUR).toBe(240);
  });
});
