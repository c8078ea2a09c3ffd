#!/usr/bin/env node
/**
 * Senso MCP Server entry point
 *
 * Started by the MCP host with SENSO_API_KEY in its environment (or in a
 * .env file next to the working directory).
 */

// Must run before the logger reads LOG_LEVEL
import 'dotenv/config';
import { loadConfig } from './config.js';
import { logger } from './logger.js';
import { SensoServer } from './server.js';

async function main() {
  const config = loadConfig();
  const server = new SensoServer(config);
  await server.run();
}

main().catch((error) => {
  logger.fatal({
    action: 'fatal_error',
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined
  }, 'Fatal error starting MCP server');
  process.exit(1);
});
