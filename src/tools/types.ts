/**
 * Tool Types
 *
 * Context shared by the MCP tool handlers.
 */

import type { ProjectService } from '../integrations/project-service.js';
import type { TaskSearchEngine } from '../integrations/task-search.js';
import type { TaskUpdater } from '../integrations/task-updater.js';

/**
 * Services handed to every handler so none of them touch global state
 */
export interface ToolContext {
  projects: ProjectService;
  search: TaskSearchEngine;
  updater: TaskUpdater;
}
