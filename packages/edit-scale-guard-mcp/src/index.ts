#!/usr/bin/env tsx
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createLogger, loadConfig, openRetryTokenStore } from "edit-scale-guard-core";
import { SERVER_NAME, SERVER_VERSION, createGuardServer } from "./server.js";

async function main(): Promise<void> {
  const { config, notes } = await loadConfig();
  const logger = createLogger({ level: config.logLevel, tag: config.logTag });
  for (const note of notes) logger.warn("config_note", { note });

  const store = await openRetryTokenStore(config.cacheDir, config.retryWindowSeconds, { logger });
  const server = createGuardServer({ config, store });
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`[${SERVER_NAME}] MCP server running on stdio (v${SERVER_VERSION})`);
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
