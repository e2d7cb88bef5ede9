import { z } from "zod";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { VirgoCXClient } from "../client.js";
import { OrderStatus } from "../enums.js";
import { errorResult, jsonResult } from "./respond.js";

export function registerQueryOrders(server: McpServer, client: VirgoCXClient) {
  server.tool(
    "query_orders",
    "List your orders for a symbol, optionally restricted to one status",
    {
      symbol: z.string().describe("Trading symbol, e.g. BTC/CAD"),
      status: z.enum(["CANCELED", "PLACED", "OPEN", "MATCHING", "COMPLETED"]).optional()
        .describe("Only return orders in this status"),
    },
    async ({ symbol, status }) => {
      try {
        return jsonResult(await client.queryOrders(symbol, status === undefined ? undefined : OrderStatus[status]));
      } catch (err) {
        return errorResult(err);
      }
    }
  );
}
