import { z } from "zod";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { VirgoCXClient } from "../client.js";
import { errorResult, jsonResult } from "./respond.js";

export function registerQueryTrades(server: McpServer, client: VirgoCXClient) {
  server.tool(
    "query_trades",
    "List your completed trades for a symbol",
    {
      symbol: z.string().describe("Trading symbol, e.g. BTC/CAD"),
    },
    async ({ symbol }) => {
      try {
        return jsonResult(await client.queryTrades(symbol));
      } catch (err) {
        return errorResult(err);
      }
    }
  );
}
