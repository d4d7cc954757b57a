/**
 * Project Tool Definitions
 */

import { z } from 'zod';
import { VIEW_MODES } from '../../types/task.js';
import { defineTool } from './types.js';

/**
 * ticktick_list_projects tool
 */
export const listProjectsTool = defineTool(
  'ticktick_list_projects',
  "List all TickTick projects (lists) with id, name, color, viewMode and isClosed. Use a project's id wherever a projectId is required.",
  {},
  { readOnlyHint: true, destructiveHint: false }
);

/**
 * ticktick_get_project_tasks tool
 */
export const getProjectTasksTool = defineTool(
  'ticktick_get_project_tasks',
  'Get all active (uncompleted) tasks in a project. The TickTick API does not return completed tasks.',
  {
    projectId: z.string().min(1).describe('The project ID. Call ticktick_list_projects first to get this.'),
  },
  { readOnlyHint: true, destructiveHint: false }
);

/**
 * ticktick_create_project tool
 */
export const createProjectTool = defineTool(
  'ticktick_create_project',
  'Create a new TickTick project (list).',
  {
    name: z.string().min(1).describe('Project name'),
    color: z.string().optional().describe('Hex color like "#F18181"'),
    viewMode: z.enum(VIEW_MODES).optional().describe('How the project is displayed'),
  },
  { destructiveHint: false }
);

/**
 * ticktick_delete_project tool
 */
export const deleteProjectTool = defineTool(
  'ticktick_delete_project',
  'Permanently delete a TickTick project and ALL its tasks. This cannot be undone.',
  {
    projectId: z.string().min(1).describe('The project ID to delete'),
  },
  { destructiveHint: true }
);
