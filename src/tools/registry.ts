/**
 * Tool Registry
 *
 * Helper functions for tool response creation.
 * Re-exports from mcp-response.ts for convenience.
 */

export {
  createResponse as createToolResponse,
  createErrorFromCatch,
} from '../utils/mcp-response.js';
