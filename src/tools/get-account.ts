import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { VirgoCXClient } from "../client.js";
import { errorResult, jsonResult } from "./respond.js";

export function registerGetAccount(server: McpServer, client: VirgoCXClient) {
  server.tool(
    "get_account",
    "Query account balances",
    async () => {
      try {
        return jsonResult(await client.accountInfo());
      } catch (err) {
        return errorResult(err);
      }
    }
  );
}
