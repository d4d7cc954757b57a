/**
 * CLI Parser
 *
 * The server only speaks stdio; the command line just answers --help and
 * --version. Everything else is configured through the environment.
 */

import { SERVER_NAME, VERSION } from '../version.js';

export interface CLIOptions {
  /** Show help message */
  help: boolean;
  /** Show version */
  version: boolean;
}

function hasFlag(args: string[], longFlag: string, shortFlag?: string): boolean {
  return args.includes(longFlag) || (shortFlag ? args.includes(shortFlag) : false);
}

/**
 * Parse command line arguments
 * @param args - Command line arguments (without node and script path)
 */
export function parseArgs(args: string[]): CLIOptions {
  return {
    help: hasFlag(args, '--help', '-h'),
    version: hasFlag(args, '--version', '-v'),
  };
}

export function getHelpMessage(): string {
  return `
${SERVER_NAME} - TickTick task management for MCP agents

Usage:
  ${SERVER_NAME} [options]

Runs an MCP server over stdio.

Options:
  --help, -h             Show this help message
  --version, -v          Show version

Environment Variables:
  TICKTICK_API_TOKEN         TickTick Open API token (required)
  TICKTICK_INBOX_PROJECT_ID  Project used when a task is created without one
                             (default: inbox, empty to disable)
  TICKTICK_API_BASE_URL      API base URL (default: https://api.ticktick.com/open/v1)
  TICKTICK_TIMEOUT_MS        Per-request timeout in ms (default: 30000)
  LOG_LEVEL                  trace, debug, info, warn, error, fatal or silent
`.trim();
}

export function getVersion(): string {
  return VERSION;
}
