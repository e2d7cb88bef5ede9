import { z } from "zod";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { VirgoCXClient } from "../client.js";
import { KLineType } from "../enums.js";
import { errorResult, jsonResult } from "./respond.js";

export function registerGetKline(server: McpServer, client: VirgoCXClient) {
  server.tool(
    "get_kline",
    "Get historical kline/candlestick data for a symbol",
    {
      symbol: z.string().describe("Trading symbol, e.g. BTC/CAD"),
      period: z
        .enum(["MINUTE", "FIVE_MINUTE", "TEN_MINUTE", "THIRTY_MINUTE", "HOUR", "FOUR_HOUR", "DAY", "FIVE_DAY", "WEEK", "MONTH"])
        .describe("Aggregation period of each kline"),
    },
    async ({ symbol, period }) => {
      try {
        return jsonResult(await client.kline(symbol, KLineType[period]));
      } catch (err) {
        return errorResult(err);
      }
    }
  );
}
