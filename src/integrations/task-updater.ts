/**
 * Task Updater
 *
 * Task writes against an API that only accepts whole-record replacement.
 * A partial update is a fetch, a local merge, and a replace: two round
 * trips with no version check. If someone else edits the task between the
 * fetch and the replace, their change is overwritten (last writer wins).
 */

import type { Task, TaskInput, TaskPatch } from '../types/task.js';
import type { TickTickApi } from '../types/ticktick.js';
import {
  InvalidTaskInputError,
  TaskNotFoundError,
  UnsupportedOperationError,
} from '../types/errors.js';
import { updaterLogger as log } from '../utils/logger.js';
import { dateToUpstream, isCalendarDate } from '../utils/dates.js';
import { parsePriority } from '../utils/priority.js';
import { toAgentTask, toUpstreamTask } from './task-normalizer.js';

export interface TaskUpdaterOptions {
  /** Used when a task is created without a projectId */
  inboxProjectId: string | null;
}

/**
 * Overlay a patch onto a fetched task. Keys present in the patch win,
 * including `null` dates; keys absent keep the fetched value.
 */
export function mergeTask(current: Task, patch: TaskPatch): Task {
  const merged: Task = { ...current };

  if (patch.title !== undefined) merged.title = patch.title;
  if (patch.content !== undefined) merged.content = patch.content;
  if (patch.priority !== undefined) merged.priority = patch.priority;
  if (patch.startDate !== undefined) merged.startDate = patch.startDate;
  if (patch.dueDate !== undefined) merged.dueDate = patch.dueDate;
  if (patch.subtasks !== undefined) {
    merged.subtasks = patch.subtasks.map((s) => ({
      title: s.title,
      isCompleted: s.isCompleted ?? false,
    }));
  }

  const date = merged.dueDate ?? merged.startDate;
  merged.isAllDay = date !== null && isCalendarDate(date);
  return merged;
}

/**
 * Reject fields that look writable to a caller but are not, and check
 * the patch's own values before any upstream call
 */
function assertWritable(fields: object & TaskPatch): void {
  if ('isCompleted' in fields && fields.isCompleted !== undefined) {
    throw new UnsupportedOperationError(
      'isCompleted cannot be changed through a write. Completion is one-way and there is no reopen.',
      ['Use ticktick_complete_task to complete a task']
    );
  }
  if ('isAllDay' in fields && fields.isAllDay !== undefined) {
    throw new InvalidTaskInputError(
      'isAllDay is derived from the date format and cannot be set directly',
      { field: 'isAllDay' }
    );
  }
  if (fields.title !== undefined && fields.title.trim() === '') {
    throw new InvalidTaskInputError('title cannot be empty', { field: 'title' });
  }
  if (fields.priority !== undefined) {
    parsePriority(fields.priority);
  }
  if (fields.startDate) {
    dateToUpstream(fields.startDate, 'startDate');
  }
  if (fields.dueDate) {
    dateToUpstream(fields.dueDate, 'dueDate');
  }
}

export class TaskUpdater {
  constructor(
    private readonly api: TickTickApi,
    private readonly options: TaskUpdaterOptions
  ) {}

  async create(input: TaskInput): Promise<Task> {
    assertWritable(input);

    const projectId = input.projectId || this.options.inboxProjectId;
    if (!projectId) {
      throw new InvalidTaskInputError(
        'No projectId provided and no inbox project configured. Call ticktick_list_projects to get a project id.',
        { field: 'projectId' }
      );
    }

    const raw = toUpstreamTask({ ...input, projectId });
    const created = await this.api.createTask(raw);
    log.debug({ projectId, taskId: created.id }, 'Task created');
    return toAgentTask(created);
  }

  async update(taskId: string, projectId: string, patch: TaskPatch): Promise<Task> {
    assertWritable(patch);

    const existing = await this.api.getTask(projectId, taskId);
    if (!existing) {
      throw new TaskNotFoundError(projectId, taskId);
    }

    const merged = mergeTask(toAgentTask(existing), patch);
    const replacement = toUpstreamTask(merged, existing);
    const updated = await this.api.updateTask(taskId, replacement);

    log.debug({ projectId, taskId, fields: Object.keys(patch) }, 'Task replaced');
    return toAgentTask(updated);
  }

  /**
   * One-way. The Open API has no uncomplete endpoint.
   */
  async complete(taskId: string, projectId: string): Promise<void> {
    const found = await this.api.completeTask(projectId, taskId);
    if (!found) {
      throw new TaskNotFoundError(projectId, taskId);
    }
    log.debug({ projectId, taskId }, 'Task completed');
  }
}
