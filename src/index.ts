#!/usr/bin/env node
/**
 * ticktick-task-mcp - TickTick MCP Server
 *
 * Exposes TickTick projects and tasks to MCP clients through a small,
 * normalized tool surface.
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { getHelpMessage, getVersion, parseArgs } from './cli/parser.js';
import { ConfigLoader } from './config/loader.js';
import { createServer, createToolContext } from './server.js';
import { cliLogger } from './utils/logger.js';
import { SERVER_NAME, VERSION } from './version.js';

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));

  if (options.help || options.version) {
    console.log(options.help ? getHelpMessage() : getVersion());
    return;
  }

  const config = ConfigLoader.fromEnv(process.env);
  const server = createServer(createToolContext(config));
  const transport = new StdioServerTransport();
  await server.connect(transport);

  cliLogger.info(
    { inboxProjectId: config.inboxProjectId, baseUrl: config.ticktick.baseUrl },
    `${SERVER_NAME} v${VERSION} started in stdio mode`
  );
}

main().catch((error: unknown) => {
  cliLogger.fatal({ err: error }, `Failed to start ${SERVER_NAME}`);
  process.exit(1);
});
