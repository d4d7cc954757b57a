/**
 * Shared Tool Definition Types
 *
 * One definition per tool: name, description, input schema and hints.
 * src/server.ts registers these with the MCP server.
 */

import type { z } from 'zod';
import type { ToolAnnotations } from '@modelcontextprotocol/sdk/types.js';

export interface SharedToolDefinition<TShape extends z.ZodRawShape = z.ZodRawShape> {
  /** Unique tool name */
  name: string;
  /** Human-readable description shown to the agent */
  description: string;
  /** Zod shape for input validation */
  shape: TShape;
  annotations: ToolAnnotations;
}

/**
 * Create a shared tool definition
 */
export function defineTool<TShape extends z.ZodRawShape>(
  name: string,
  description: string,
  shape: TShape,
  annotations: ToolAnnotations
): SharedToolDefinition<TShape> {
  return { name, description, shape, annotations };
}
