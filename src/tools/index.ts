/**
 * Tools Module
 *
 * Exports tool definitions, handlers and response helpers.
 *
 * ## Usage
 *
 * ```typescript
 * import { createToolResponse, createErrorFromCatch } from './tools/index.js';
 *
 * // In a tool handler:
 * return createToolResponse({ tasks, count: tasks.length });
 *
 * // Error handling:
 * catch (error) {
 *   return createErrorFromCatch('Failed to search tasks', error);
 * }
 * ```
 */

export type { ToolContext } from './types.js';

export { createToolResponse, createErrorFromCatch } from './registry.js';

export * from './shared/index.js';
export * from './tasks/index.js';
export * from './projects/index.js';
