import { z } from "zod";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { VirgoCXClient } from "../client.js";
import { errorResult, jsonResult } from "./respond.js";

export function registerGetDiscount(server: McpServer, client: VirgoCXClient) {
  server.tool(
    "get_discount",
    "Get discounted bid/ask prices for one symbol, or for all symbols when none is given",
    {
      symbol: z.string().optional().describe("Trading symbol, e.g. BTC/CAD"),
    },
    async ({ symbol }) => {
      try {
        return jsonResult(await client.getDiscount(symbol));
      } catch (err) {
        return errorResult(err);
      }
    }
  );
}
