/**
 * MCP server assembly
 *
 * Wires the TickTick client into the services and registers every tool.
 * Kept apart from index.ts so tests can build a server around a fake API.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import type { ServerConfig } from './types/config.js';
import type { TickTickApi } from './types/ticktick.js';
import { TickTickClient } from './integrations/ticktick-client.js';
import { ProjectService } from './integrations/project-service.js';
import { TaskSearchEngine } from './integrations/task-search.js';
import { TaskUpdater } from './integrations/task-updater.js';
import type { ToolContext } from './tools/index.js';
import {
  completeTaskTool,
  createProjectTool,
  createTaskTool,
  deleteProjectTool,
  getProjectTasksTool,
  getTaskTool,
  listProjectsTool,
  searchTasksTool,
  updateTaskTool,
  handleCompleteTask,
  handleCreateProject,
  handleCreateTask,
  handleDeleteProject,
  handleGetProjectTasks,
  handleGetTask,
  handleListProjects,
  handleSearchTasks,
  handleUpdateTask,
} from './tools/index.js';
import { mcpLogger } from './utils/logger.js';
import { SERVER_NAME, VERSION } from './version.js';

/**
 * Build the services the tool handlers share.
 *
 * The inbox default is threaded in from configuration here; nothing below
 * reads the environment.
 */
export function createToolContext(
  config: ServerConfig,
  api: TickTickApi = new TickTickClient(config.ticktick)
): ToolContext {
  const projects = new ProjectService(api, { inboxProjectId: config.inboxProjectId });
  return {
    projects,
    search: new TaskSearchEngine(projects),
    updater: new TaskUpdater(api, { inboxProjectId: config.inboxProjectId }),
  };
}

export function createServer(ctx: ToolContext): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: VERSION });

  // ============================================
  // Project Tools
  // ============================================

  server.tool(
    listProjectsTool.name,
    listProjectsTool.description,
    listProjectsTool.shape,
    listProjectsTool.annotations,
    async () => handleListProjects(ctx)
  );

  server.tool(
    getProjectTasksTool.name,
    getProjectTasksTool.description,
    getProjectTasksTool.shape,
    getProjectTasksTool.annotations,
    async (args) => handleGetProjectTasks(ctx, args)
  );

  server.tool(
    createProjectTool.name,
    createProjectTool.description,
    createProjectTool.shape,
    createProjectTool.annotations,
    async (args) => handleCreateProject(ctx, args)
  );

  server.tool(
    deleteProjectTool.name,
    deleteProjectTool.description,
    deleteProjectTool.shape,
    deleteProjectTool.annotations,
    async (args) => handleDeleteProject(ctx, args)
  );

  // ============================================
  // Task Tools
  // ============================================

  server.tool(
    getTaskTool.name,
    getTaskTool.description,
    getTaskTool.shape,
    getTaskTool.annotations,
    async (args) => handleGetTask(ctx, args)
  );

  server.tool(
    createTaskTool.name,
    createTaskTool.description,
    createTaskTool.shape,
    createTaskTool.annotations,
    async (args) => handleCreateTask(ctx, args)
  );

  server.tool(
    updateTaskTool.name,
    updateTaskTool.description,
    updateTaskTool.shape,
    updateTaskTool.annotations,
    async (args) => handleUpdateTask(ctx, args)
  );

  server.tool(
    completeTaskTool.name,
    completeTaskTool.description,
    completeTaskTool.shape,
    completeTaskTool.annotations,
    async (args) => handleCompleteTask(ctx, args)
  );

  server.tool(
    searchTasksTool.name,
    searchTasksTool.description,
    searchTasksTool.shape,
    searchTasksTool.annotations,
    async (args) => handleSearchTasks(ctx, args)
  );

  mcpLogger.debug({ tools: 9 }, 'Tools registered');
  return server;
}
