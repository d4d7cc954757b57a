/**
 * Task Tool Definitions
 */

import { z } from 'zod';
import { PRIORITIES } from '../../types/task.js';
import { defineTool } from './types.js';

const DATE_FORMATS =
  'Accepts "2025-03-15" (all-day), "2025-03-15T14:00" or "2025-03-15T14:00:00" (UTC), or ISO 8601 with an offset';

const subtaskSchema = z.object({
  title: z.string().describe('Subtask title'),
  isCompleted: z.boolean().optional().describe('Whether the subtask is checked (default false)'),
});

/**
 * ticktick_get_task tool
 */
export const getTaskTool = defineTool(
  'ticktick_get_task',
  'Get full details of a single task. Both projectId and taskId are required because the TickTick API scopes tasks under projects.',
  {
    projectId: z.string().min(1).describe('The project this task belongs to'),
    taskId: z.string().min(1).describe('The task ID'),
  },
  { readOnlyHint: true, destructiveHint: false }
);

/**
 * ticktick_create_task tool
 */
export const createTaskTool = defineTool(
  'ticktick_create_task',
  'Create a new task. isAllDay is inferred from the date format: a plain date makes an all-day task, a date-time makes a timed task.',
  {
    title: z.string().min(1).describe('Task title'),
    projectId: z
      .string()
      .optional()
      .describe('Project to create the task in. Defaults to the Inbox when configured. Call ticktick_list_projects to get IDs.'),
    content: z
      .string()
      .optional()
      .describe('Task notes. Backslashes and literal \\n may break TickTick sync; prefer plain text.'),
    priority: z.enum(PRIORITIES).optional().describe('Priority (default "none")'),
    dueDate: z.string().optional().describe(`Due date. ${DATE_FORMATS}`),
    startDate: z.string().optional().describe(`Start date. ${DATE_FORMATS}. Must use the same format as dueDate.`),
    subtasks: z.array(subtaskSchema).optional().describe('Checklist items in order'),
  },
  { destructiveHint: false }
);

/**
 * ticktick_update_task tool
 */
export const updateTaskTool = defineTool(
  'ticktick_update_task',
  'Update an existing task. Only include fields you want to change; everything else is kept as it is. The current task is fetched, merged with your changes and written back as a whole, so a concurrent edit made elsewhere in between is overwritten.',
  {
    taskId: z.string().min(1).describe('The task ID to update'),
    projectId: z.string().min(1).describe('The project this task belongs to'),
    title: z.string().min(1).optional().describe('New title'),
    content: z.string().optional().describe('New notes'),
    priority: z.enum(PRIORITIES).optional().describe('New priority'),
    dueDate: z.string().nullable().optional().describe(`New due date, or null to clear it. ${DATE_FORMATS}`),
    startDate: z.string().nullable().optional().describe(`New start date, or null to clear it. ${DATE_FORMATS}`),
    subtasks: z.array(subtaskSchema).optional().describe('Replacement checklist; omit to keep the current one'),
    isCompleted: z
      .boolean()
      .optional()
      .describe('Not supported: use ticktick_complete_task. Completed tasks cannot be reopened through the TickTick API.'),
  },
  { destructiveHint: false, idempotentHint: true }
);

/**
 * ticktick_complete_task tool
 */
export const completeTaskTool = defineTool(
  'ticktick_complete_task',
  'Mark a task as completed. This is one-way: the TickTick API provides no way to uncomplete a task.',
  {
    taskId: z.string().min(1).describe('The task ID to complete'),
    projectId: z.string().min(1).describe('The project this task belongs to'),
  },
  { destructiveHint: false }
);

/**
 * ticktick_search_tasks tool
 */
export const searchTasksTool = defineTool(
  'ticktick_search_tasks',
  'Search active tasks across projects. All filters are optional and combine with AND. TickTick has no server-side search, so tasks are fetched per project and filtered locally. Completed tasks are never returned.',
  {
    query: z.string().optional().describe('Case-insensitive substring of the task title'),
    projectId: z.string().optional().describe('Only search this project'),
    priority: z.enum(PRIORITIES).optional().describe('Only tasks with this priority'),
    dateFrom: z
      .string()
      .optional()
      .describe('Only tasks due on or after this date. Tasks without a due date are excluded.'),
    dateTo: z
      .string()
      .optional()
      .describe('Only tasks due on or before this date (a plain date includes the whole day). Tasks without a due date are excluded.'),
  },
  { readOnlyHint: true, destructiveHint: false }
);
