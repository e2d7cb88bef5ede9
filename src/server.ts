#!/usr/bin/env node
import "dotenv/config";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { VirgoCXClient } from "./client.js";
import { loadConfig } from "./config.js";
import logger, { setLogLevel } from "./logger.js";
import { buildServer } from "./mcp.js";

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const client = await VirgoCXClient.create({
    apiKey: config.apiKey,
    apiSecret: config.apiSecret,
    baseUrl: config.baseUrl,
    verifyTls: config.verifyTls,
  });

  const server = buildServer(client, config);
  await server.connect(new StdioServerTransport());
  logger.info(`virgocx-mcp connected (${config.baseUrl})`);
}

main().catch((err: unknown) => {
  logger.error("virgocx-mcp failed to start", { error: err instanceof Error ? err.message : String(err) });
  process.exit(1);
});
