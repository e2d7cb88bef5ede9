import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { VirgoCXClient } from "../client.js";
import { buildServer } from "../mcp.js";
import { SymbolInfoCache } from "../symbol-info.js";

const mockFetch = vi.fn();

function respond(routes: Record<string, unknown>) {
  mockFetch.mockImplementation(async (url: string) => {
    const path = new URL(url).pathname.replace(/^\/api/, "");
    if (!(path in routes)) return { status: 404, text: async () => "not found" };
    return { status: 200, text: async () => JSON.stringify({ code: 0, data: routes[path] }) };
  });
}

function requestTo(path: string): URL {
  const call = mockFetch.mock.calls.find(([url]) => new URL(url).pathname === `/api${path}`);
  if (!call) throw new Error(`no request to ${path}`);
  return new URL(call[0]);
}

describe("MCP tools", () => {
  let mcp: Client;

  async function connect(autoConvert: boolean) {
    const client = new VirgoCXClient({
      apiKey: "test-key",
      apiSecret: "test-secret",
      baseUrl: "https://api.test/api",
      verifyTls: true,
      fetch: mockFetch,
      symbolCache: new SymbolInfoCache(),
    });
    const server = buildServer(client, { autoConvert });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    mcp = new Client({ name: "test-client", version: "0.0.0" });
    await Promise.all([server.connect(serverTransport), mcp.connect(clientTransport)]);
  }

  beforeEach(async () => {
    mockFetch.mockReset();
    await connect(false);
  });

  afterEach(async () => {
    await mcp.close();
  });

  it("registers one tool per client operation", async () => {
    const { tools } = await mcp.listTools();
    expect(tools.map((t) => t.name).sort()).toEqual([
      "cancel_order",
      "get_account",
      "get_discount",
      "get_kline",
      "get_ticker",
      "get_tickers",
      "place_order",
      "query_orders",
      "query_trades",
    ]);
  });

  it("get_kline maps the period name to its code", async () => {
    respond({ "/market/history/kline": [{ open: 1, close: 2 }] });

    const result = await mcp.callTool({ name: "get_kline", arguments: { symbol: "BTC/CAD", period: "HOUR" } });

    expect(requestTo("/market/history/kline").searchParams.get("period")).toBe("60");
    expect(result).toMatchObject({
      content: [{ type: "text", text: JSON.stringify([{ open: 1, close: 2 }], null, 2) }],
    });
  });

  it("query_orders maps the status name to its code", async () => {
    respond({ "/member/queryOrder": [] });

    await mcp.callTool({ name: "query_orders", arguments: { symbol: "BTC/CAD", status: "OPEN" } });

    expect(requestTo("/member/queryOrder").searchParams.get("status")).toBe("1");
  });

  it("get_discount returns a list for a single symbol", async () => {
    respond({ "/member/discountPrice": { symbol: "BTC/CAD", askPrice: "1" } });

    const result = await mcp.callTool({ name: "get_discount", arguments: { symbol: "BTC/CAD" } });

    expect(result).toMatchObject({
      content: [{ type: "text", text: JSON.stringify([{ symbol: "BTC/CAD", askPrice: "1" }], null, 2) }],
    });
  });

  it("reports client errors as tool errors", async () => {
    const result = await mcp.callTool({
      name: "place_order",
      arguments: { symbol: "BTC/CAD", category: "LIMIT", direction: "BUY", price: 40, total: 100 },
    });

    expect(result).toMatchObject({
      isError: true,
      content: [{ type: "text", text: "Error: Quantity is required for limit orders" }],
    });
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it("reports API error codes as tool errors", async () => {
    mockFetch.mockResolvedValueOnce({
      status: 200,
      text: async () => JSON.stringify({ code: 2001, msg: "order not found" }),
    });

    const result = await mcp.callTool({ name: "cancel_order", arguments: { orderId: "42" } });

    expect(result).toMatchObject({
      isError: true,
      content: [{ type: "text", text: "Error: Request failed with error code 2001: order not found" }],
    });
  });

  it("place_order converts by default when auto-convert is configured", async () => {
    await mcp.close();
    await connect(true);
    respond({
      "/market/tickers": [{ symbol: "BTC/CAD", priceDecimals: 2, qtyDecimals: 6, minTotal: 10 }],
      "/member/addOrder": { id: 7 },
    });

    const result = await mcp.callTool({
      name: "place_order",
      arguments: { symbol: "BTC/CAD", category: "LIMIT", direction: "BUY", price: 40, total: 100 },
    });

    expect(result).toMatchObject({
      content: [{ type: "text", text: `Order placed successfully!\n${JSON.stringify({ id: 7 }, null, 2)}` }],
    });
  });
});
