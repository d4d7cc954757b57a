/**
 * Normalization Codec
 *
 * Converts raw TickTick task and project records to the agent-facing
 * model and back. Pure functions; no upstream calls.
 */

import type {
  Project,
  ProjectInput,
  SubTask,
  SubTaskInput,
  Task,
  TaskDraft,
  ViewMode,
} from '../types/task.js';
import { VIEW_MODES } from '../types/task.js';
import {
  ITEM_STATUS_COMPLETED,
  ITEM_STATUS_OPEN,
  TASK_STATUS_OPEN,
  type RawChecklistItem,
  type RawProject,
  type RawTask,
} from '../types/ticktick.js';
import { InvalidTaskInputError, MalformedUpstreamRecordError } from '../types/errors.js';
import { dateFromUpstream, dateToUpstream, type UpstreamDate } from '../utils/dates.js';
import { priorityFromUpstream, priorityToUpstream } from '../utils/priority.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function requireIdentity(record: Record<string, unknown>, field: string, kind: string): string {
  const value = record[field];
  if (typeof value !== 'string' || value === '') {
    throw new MalformedUpstreamRecordError(`Upstream ${kind} record is missing ${field}`, {
      field,
      id: optionalString(record.id) ?? null,
    });
  }
  return value;
}

function subtaskFromUpstream(item: unknown): SubTask {
  if (!isRecord(item)) {
    return { title: '', isCompleted: false };
  }
  const status = typeof item.status === 'number' ? item.status : ITEM_STATUS_OPEN;
  return {
    title: optionalString(item.title) ?? '',
    isCompleted: status !== ITEM_STATUS_OPEN,
  };
}

/**
 * Item ids are dropped; upstream assigns fresh ones on write.
 */
function subtaskToUpstream(subtask: SubTaskInput, index: number): RawChecklistItem {
  return {
    title: subtask.title,
    status: subtask.isCompleted ? ITEM_STATUS_COMPLETED : ITEM_STATUS_OPEN,
    sortOrder: index,
  };
}

/**
 * Encode one date field for a write. A value that still reads back the
 * same as the fetched record keeps that record's timestamp and all-day
 * flag untouched, so a task stored at local midnight in its own time zone
 * is not moved by an update that does not change the date.
 */
function dateForWrite(
  field: 'startDate' | 'dueDate',
  value: string | null | undefined,
  existingRaw: RawTask | undefined
): UpstreamDate | null {
  if (!value) {
    return null;
  }

  const current = existingRaw?.[field];
  if (typeof current === 'string' && current !== '') {
    const isAllDay = existingRaw?.isAllDay === true;
    if (dateFromUpstream(current, isAllDay) === value) {
      return { timestamp: current, isAllDay };
    }
  }

  return dateToUpstream(value, field);
}

export function toAgentTask(raw: unknown): Task {
  if (!isRecord(raw)) {
    throw new MalformedUpstreamRecordError('Upstream task record is not an object', { raw });
  }

  const id = requireIdentity(raw, 'id', 'task');
  const projectId = requireIdentity(raw, 'projectId', 'task');
  const isAllDay = raw.isAllDay === true;
  const status = typeof raw.status === 'number' ? raw.status : TASK_STATUS_OPEN;
  const items = Array.isArray(raw.items) ? raw.items : [];

  return {
    id,
    projectId,
    title: optionalString(raw.title) ?? '',
    content: optionalString(raw.content) ?? '',
    priority: priorityFromUpstream(raw.priority),
    startDate: dateFromUpstream(raw.startDate, isAllDay),
    dueDate: dateFromUpstream(raw.dueDate, isAllDay),
    isAllDay,
    isCompleted: status !== TASK_STATUS_OPEN,
    subtasks: items.map(subtaskFromUpstream),
  };
}

/**
 * Build the upstream record for a write.
 *
 * When `existingRaw` is given the result starts from it, so fields this
 * layer does not model (tags, reminders, repeat rules, time zone) survive
 * a full replacement, and unchanged dates keep their stored timestamps.
 * Task status is never written from agent data.
 */
export function toUpstreamTask(task: TaskDraft, existingRaw?: RawTask): RawTask {
  if (typeof task.projectId !== 'string' || task.projectId.trim() === '') {
    throw new InvalidTaskInputError('projectId is required', { field: 'projectId' });
  }
  if (typeof task.title !== 'string' || task.title.trim() === '') {
    throw new InvalidTaskInputError('title is required', { field: 'title' });
  }

  const start = dateForWrite('startDate', task.startDate, existingRaw);
  const due = dateForWrite('dueDate', task.dueDate, existingRaw);
  if (start && due && start.isAllDay !== due.isAllDay) {
    throw new InvalidTaskInputError(
      'startDate and dueDate must both be calendar dates or both be date-times',
      { startDate: task.startDate, dueDate: task.dueDate }
    );
  }

  const raw: RawTask = {
    ...existingRaw,
    projectId: task.projectId,
    title: task.title,
    content: task.content ?? '',
    priority: priorityToUpstream(task.priority ?? 'none'),
    isAllDay: (due ?? start)?.isAllDay ?? false,
    items: (task.subtasks ?? []).map(subtaskToUpstream),
  };

  const id = task.id ?? existingRaw?.id;
  if (id !== undefined) {
    raw.id = id;
  }

  if (start) {
    raw.startDate = start.timestamp;
  } else {
    delete raw.startDate;
  }
  if (due) {
    raw.dueDate = due.timestamp;
  } else {
    delete raw.dueDate;
  }

  return raw;
}

function viewModeFromUpstream(value: unknown): ViewMode | null {
  return VIEW_MODES.find((mode) => mode === value) ?? null;
}

export function toAgentProject(raw: unknown): Project {
  if (!isRecord(raw)) {
    throw new MalformedUpstreamRecordError('Upstream project record is not an object', { raw });
  }

  return {
    id: requireIdentity(raw, 'id', 'project'),
    name: optionalString(raw.name) ?? '',
    color: optionalString(raw.color) ?? null,
    viewMode: viewModeFromUpstream(raw.viewMode),
    isClosed: raw.closed === true,
  };
}

export function toUpstreamProject(input: ProjectInput): RawProject {
  if (input.name.trim() === '') {
    throw new InvalidTaskInputError('Project name is required', { field: 'name' });
  }
  const raw: RawProject = { name: input.name };
  if (input.color !== undefined) {
    raw.color = input.color;
  }
  if (input.viewMode !== undefined) {
    raw.viewMode = input.viewMode;
  }
  return raw;
}
