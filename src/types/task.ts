/**
 * Agent-facing task and project model
 *
 * These are the only shapes tool callers see. Upstream codes (numeric
 * priorities, status integers, checklist item ids) never appear here.
 */

export const PRIORITIES = ['none', 'low', 'medium', 'high'] as const;

export type Priority = (typeof PRIORITIES)[number];

export const VIEW_MODES = ['list', 'kanban', 'timeline'] as const;

export type ViewMode = (typeof VIEW_MODES)[number];

export interface Project {
  id: string;
  name: string;
  color: string | null;
  viewMode: ViewMode | null;
  isClosed: boolean;
}

export interface SubTask {
  title: string;
  isCompleted: boolean;
}

export interface Task {
  id: string;
  projectId: string;
  title: string;
  content: string;
  priority: Priority;
  /** `YYYY-MM-DD` for all-day tasks, `YYYY-MM-DDTHH:mm:ssZ` otherwise */
  startDate: string | null;
  dueDate: string | null;
  /** Derived from the date format; never accepted as input */
  isAllDay: boolean;
  isCompleted: boolean;
  subtasks: SubTask[];
}

/**
 * Fields accepted when writing a task.
 *
 * A full `Task` is assignable to this, which is what the merge path
 * relies on.
 */
export interface TaskDraft {
  id?: string;
  projectId: string;
  title: string;
  content?: string;
  priority?: Priority;
  startDate?: string | null;
  dueDate?: string | null;
  subtasks?: SubTaskInput[];
}

export interface SubTaskInput {
  title: string;
  isCompleted?: boolean;
}

/**
 * Input for task creation. `projectId` falls back to the inbox project.
 */
export type TaskInput = Omit<TaskDraft, 'id' | 'projectId'> & {
  projectId?: string;
};

/**
 * Partial update. `null` on a date clears it.
 */
export interface TaskPatch {
  title?: string;
  content?: string;
  priority?: Priority;
  startDate?: string | null;
  dueDate?: string | null;
  subtasks?: SubTaskInput[];
}

export interface SearchFilter {
  /** Case-insensitive substring of the title */
  query?: string;
  priority?: Priority;
  projectId?: string;
  /** Inclusive lower bound on dueDate */
  dateFrom?: string;
  /** Inclusive upper bound on dueDate */
  dateTo?: string;
}

export interface ProjectInput {
  name: string;
  color?: string;
  viewMode?: ViewMode;
}
