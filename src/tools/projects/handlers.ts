/**
 * Project Tool Handlers
 */

import type { ViewMode } from '../../types/task.js';
import type { ToolContext } from '../types.js';
import { createToolResponse, createErrorFromCatch } from '../registry.js';

export interface GetProjectTasksInput {
  projectId: string;
}

export interface CreateProjectInput {
  name: string;
  color?: string;
  viewMode?: ViewMode;
}

export interface DeleteProjectInput {
  projectId: string;
}

/**
 * ticktick_list_projects handler
 */
export async function handleListProjects(ctx: ToolContext) {
  try {
    const projects = await ctx.projects.listProjects();
    return createToolResponse({ projects, count: projects.length });
  } catch (error) {
    return createErrorFromCatch('Failed to list projects', error);
  }
}

/**
 * ticktick_get_project_tasks handler
 */
export async function handleGetProjectTasks(ctx: ToolContext, args: GetProjectTasksInput) {
  try {
    const tasks = await ctx.projects.getProjectTasks(args.projectId);
    return createToolResponse({ projectId: args.projectId, tasks, count: tasks.length });
  } catch (error) {
    return createErrorFromCatch('Failed to get project tasks', error);
  }
}

/**
 * ticktick_create_project handler
 */
export async function handleCreateProject(ctx: ToolContext, args: CreateProjectInput) {
  try {
    const project = await ctx.projects.createProject(args);
    return createToolResponse({ project });
  } catch (error) {
    return createErrorFromCatch('Failed to create project', error);
  }
}

/**
 * ticktick_delete_project handler
 */
export async function handleDeleteProject(ctx: ToolContext, args: DeleteProjectInput) {
  try {
    await ctx.projects.deleteProject(args.projectId);
    return createToolResponse({ deleted: true, projectId: args.projectId });
  } catch (error) {
    return createErrorFromCatch('Failed to delete project', error);
  }
}
