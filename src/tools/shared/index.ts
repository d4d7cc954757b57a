/**
 * Shared Tool Definitions
 */

export { defineTool, type SharedToolDefinition } from './types.js';
export * from './task-tools.js';
export * from './project-tools.js';
