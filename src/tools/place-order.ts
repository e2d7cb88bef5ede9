import { z } from "zod";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { VirgoCXClient } from "../client.js";
import { OrderDirection, OrderType } from "../enums.js";
import { errorResult } from "./respond.js";

export function registerPlaceOrder(server: McpServer, client: VirgoCXClient, autoConvert: boolean) {
  server.tool(
    "place_order",
    "Place an order. Returns order details on success. IMPORTANT: Verify order parameters carefully before calling.",
    {
      symbol: z.string().describe("Trading symbol, e.g. BTC/CAD"),
      category: z.enum(["LIMIT", "MARKET", "QUICK_TRADE"]).describe("Order type"),
      direction: z.enum(["BUY", "SELL"]).describe("Order side"),
      price: z.number().positive().optional().describe("Limit price in fiat. Required for LIMIT orders"),
      qty: z.number().positive().optional()
        .describe("Quantity of the crypto asset. Required for LIMIT orders and non-limit SELL orders"),
      total: z.number().positive().optional().describe("Order value in fiat. Required for non-limit BUY orders"),
      convert: z.boolean().optional()
        .describe("Derive a missing qty (LIMIT: total / price) or total (non-limit BUY: qty x market ask price)"),
    },
    async (params) => {
      try {
        const data = await client.placeOrder({
          symbol: params.symbol,
          category: OrderType[params.category],
          direction: OrderDirection[params.direction],
          price: params.price,
          qty: params.qty,
          total: params.total,
          convert: params.convert ?? autoConvert,
        });
        return {
          content: [{ type: "text" as const, text: `Order placed successfully!\n${JSON.stringify(data, null, 2)}` }],
        };
      } catch (err) {
        return errorResult(err);
      }
    }
  );
}
