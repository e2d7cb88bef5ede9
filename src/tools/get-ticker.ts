import { z } from "zod";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { VirgoCXClient } from "../client.js";
import { errorResult, jsonResult } from "./respond.js";

export function registerGetTicker(server: McpServer, client: VirgoCXClient) {
  server.tool(
    "get_ticker",
    "Get the merged market ticker for a symbol",
    {
      symbol: z.string().describe("Trading symbol, e.g. BTC/CAD"),
    },
    async ({ symbol }) => {
      try {
        return jsonResult(await client.ticker(symbol));
      } catch (err) {
        return errorResult(err);
      }
    }
  );
}
