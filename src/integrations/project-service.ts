/**
 * Project Service
 * Project reads and writes plus single-task lookups, normalized.
 */

import type { Project, ProjectInput, Task } from '../types/task.js';
import type { TickTickApi } from '../types/ticktick.js';
import { ProjectNotFoundError, TaskNotFoundError } from '../types/errors.js';
import { toAgentProject, toAgentTask, toUpstreamProject } from './task-normalizer.js';

export interface ProjectServiceOptions {
  /** Prepended to project listings; the Open API does not list the inbox itself */
  inboxProjectId: string | null;
}

export class ProjectService {
  constructor(
    private readonly api: TickTickApi,
    private readonly options: ProjectServiceOptions
  ) {}

  async listProjects(): Promise<Project[]> {
    const projects = (await this.api.listProjects()).map(toAgentProject);
    const inboxId = this.options.inboxProjectId;

    if (!inboxId || projects.some((p) => p.id === inboxId)) {
      return projects;
    }

    return [
      { id: inboxId, name: 'Inbox', color: null, viewMode: null, isClosed: false },
      ...projects,
    ];
  }

  /**
   * Active tasks of one project. The Open API does not return completed
   * tasks from this endpoint.
   */
  async getProjectTasks(projectId: string): Promise<Task[]> {
    const data = await this.api.getProjectData(projectId);
    if (!data) {
      throw new ProjectNotFoundError(projectId);
    }
    return (data.tasks ?? []).map(toAgentTask);
  }

  async getTask(projectId: string, taskId: string): Promise<Task> {
    const raw = await this.api.getTask(projectId, taskId);
    if (!raw) {
      throw new TaskNotFoundError(projectId, taskId);
    }
    return toAgentTask(raw);
  }

  async createProject(input: ProjectInput): Promise<Project> {
    return toAgentProject(await this.api.createProject(toUpstreamProject(input)));
  }

  /**
   * Permanently deletes the project and every task in it.
   */
  async deleteProject(projectId: string): Promise<void> {
    const found = await this.api.deleteProject(projectId);
    if (!found) {
      throw new ProjectNotFoundError(projectId);
    }
  }
}
