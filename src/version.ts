/**
 * Version information
 *
 * Single source of truth for version number.
 * Keep in sync with package.json
 */

export const VERSION = '0.1.0';
export const SERVER_NAME = 'ticktick-task-mcp';
