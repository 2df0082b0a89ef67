#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import dotenv from "dotenv";
import { DwdClient } from "./client.js";
import { loadConfig } from "./config.js";
import { createLogger, errorMessage } from "./logger.js";
import { createServer } from "./server.js";
import { createHttpTransport } from "./transport.js";

dotenv.config();

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);

  const transport = createHttpTransport({
    baseUrl: config.baseUrl,
    timeoutMs: config.timeoutMs,
    logger,
  });
  const server = createServer(new DwdClient(transport, logger), logger);

  await server.connect(new StdioServerTransport());
  logger.info("DWD MCP server running on stdio transport.", { baseUrl: config.baseUrl });
}

main().catch((error) => {
  console.error("Fatal server error:", errorMessage(error));
  process.exit(1);
});
