/**
 * Task Tool Handlers
 *
 * Business logic for task-related MCP tools, decoupled from server
 * registration so they can be tested with a plain context object.
 */

import type { Priority, SubTaskInput } from '../../types/task.js';
import type { ToolContext } from '../types.js';
import { createToolResponse, createErrorFromCatch } from '../registry.js';

export interface GetTaskInput {
  projectId: string;
  taskId: string;
}

export interface CreateTaskInput {
  title: string;
  projectId?: string;
  content?: string;
  priority?: Priority;
  dueDate?: string;
  startDate?: string;
  subtasks?: SubTaskInput[];
}

export interface UpdateTaskInput {
  taskId: string;
  projectId: string;
  title?: string;
  content?: string;
  priority?: Priority;
  dueDate?: string | null;
  startDate?: string | null;
  subtasks?: SubTaskInput[];
  /** Accepted only so the caller gets an explicit refusal */
  isCompleted?: boolean;
}

export interface CompleteTaskInput {
  taskId: string;
  projectId: string;
}

export interface SearchTasksInput {
  query?: string;
  projectId?: string;
  priority?: Priority;
  dateFrom?: string;
  dateTo?: string;
}

/**
 * ticktick_get_task handler
 */
export async function handleGetTask(ctx: ToolContext, args: GetTaskInput) {
  try {
    const task = await ctx.projects.getTask(args.projectId, args.taskId);
    return createToolResponse({ task });
  } catch (error) {
    return createErrorFromCatch('Failed to get task', error);
  }
}

/**
 * ticktick_create_task handler
 */
export async function handleCreateTask(ctx: ToolContext, args: CreateTaskInput) {
  try {
    const task = await ctx.updater.create(args);
    return createToolResponse({ task });
  } catch (error) {
    return createErrorFromCatch('Failed to create task', error);
  }
}

/**
 * ticktick_update_task handler
 *
 * Fetches the current task, merges the given fields and replaces it.
 */
export async function handleUpdateTask(ctx: ToolContext, args: UpdateTaskInput) {
  const { taskId, projectId, ...patch } = args;

  try {
    const task = await ctx.updater.update(taskId, projectId, patch);
    return createToolResponse({ task });
  } catch (error) {
    return createErrorFromCatch('Failed to update task', error);
  }
}

/**
 * ticktick_complete_task handler
 */
export async function handleCompleteTask(ctx: ToolContext, args: CompleteTaskInput) {
  try {
    await ctx.updater.complete(args.taskId, args.projectId);
    return createToolResponse({
      completed: true,
      taskId: args.taskId,
      projectId: args.projectId,
      message: 'Task completed. This cannot be undone through the TickTick API.',
    });
  } catch (error) {
    return createErrorFromCatch('Failed to complete task', error);
  }
}

/**
 * ticktick_search_tasks handler
 */
export async function handleSearchTasks(ctx: ToolContext, args: SearchTasksInput) {
  try {
    const tasks = await ctx.search.search(args);
    return createToolResponse({ tasks, count: tasks.length });
  } catch (error) {
    return createErrorFromCatch('Failed to search tasks', error);
  }
}
