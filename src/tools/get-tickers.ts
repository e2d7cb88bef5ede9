import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { VirgoCXClient } from "../client.js";
import { errorResult, jsonResult } from "./respond.js";

export function registerGetTickers(server: McpServer, client: VirgoCXClient) {
  server.tool(
    "get_tickers",
    "Get tickers for every listed symbol, including price/quantity decimals and minimum order total",
    async () => {
      try {
        return jsonResult(await client.tickers());
      } catch (err) {
        return errorResult(err);
      }
    }
  );
}
