import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { VirgoCXClient } from "./client.js";
import type { ServerConfig } from "./config.js";
import { registerGetKline } from "./tools/get-kline.js";
import { registerGetTicker } from "./tools/get-ticker.js";
import { registerGetTickers } from "./tools/get-tickers.js";
import { registerGetAccount } from "./tools/get-account.js";
import { registerQueryOrders } from "./tools/query-orders.js";
import { registerQueryTrades } from "./tools/query-trades.js";
import { registerGetDiscount } from "./tools/get-discount.js";
import { registerPlaceOrder } from "./tools/place-order.js";
import { registerCancelOrder } from "./tools/cancel-order.js";

/** Registers one MCP tool per client operation. */
export function buildServer(client: VirgoCXClient, config: Pick<ServerConfig, "autoConvert">): McpServer {
  const server = new McpServer({
    name: "virgocx-mcp",
    version: "0.1.0",
  });

  // Market data tools
  registerGetKline(server, client);
  registerGetTicker(server, client);
  registerGetTickers(server, client);

  // Account read tools
  registerGetAccount(server, client);
  registerQueryOrders(server, client);
  registerQueryTrades(server, client);
  registerGetDiscount(server, client);

  // Trading tools
  registerPlaceOrder(server, client, config.autoConvert);
  registerCancelOrder(server, client);

  return server;
}
