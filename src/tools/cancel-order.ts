import { z } from "zod";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { VirgoCXClient } from "../client.js";
import { errorResult } from "./respond.js";

export function registerCancelOrder(server: McpServer, client: VirgoCXClient) {
  server.tool(
    "cancel_order",
    "Cancel an open order by its ID",
    {
      orderId: z.string().describe("VirgoCX order ID"),
    },
    async ({ orderId }) => {
      try {
        const data = await client.cancelOrder(orderId);
        return { content: [{ type: "text" as const, text: `Order cancelled.\n${JSON.stringify(data, null, 2)}` }] };
      } catch (err) {
        return errorResult(err);
      }
    }
  );
}
