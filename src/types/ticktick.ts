/**
 * TickTick Open API record shapes
 *
 * Only the fields this server reads or writes are typed; everything else
 * is carried through untouched via the index signature so that a
 * full-record replacement does not drop upstream-only data.
 */

/** Task `status`: 0 open, 2 completed */
export const TASK_STATUS_OPEN = 0;
export const TASK_STATUS_COMPLETED = 2;

/** Checklist item `status`: 0 open, 1 completed */
export const ITEM_STATUS_OPEN = 0;
export const ITEM_STATUS_COMPLETED = 1;

export interface RawChecklistItem {
  id?: string;
  title?: string;
  status?: number;
  sortOrder?: number;
  [key: string]: unknown;
}

export interface RawTask {
  id?: string;
  projectId?: string;
  title?: string;
  content?: string;
  priority?: number;
  status?: number;
  isAllDay?: boolean;
  /** `yyyy-MM-dd'T'HH:mm:ssZ`, e.g. `2025-03-15T00:00:00+0000` */
  startDate?: string;
  dueDate?: string;
  timeZone?: string;
  items?: RawChecklistItem[];
  [key: string]: unknown;
}

export interface RawProject {
  id?: string;
  name?: string;
  color?: string;
  viewMode?: string;
  closed?: boolean;
  kind?: string;
  [key: string]: unknown;
}

export interface RawColumn {
  id?: string;
  projectId?: string;
  name?: string;
  sortOrder?: number;
}

/** Response of `GET /project/{id}/data` */
export interface RawProjectData {
  project?: RawProject;
  tasks?: RawTask[];
  columns?: RawColumn[];
}

/**
 * Upstream operations the core depends on.
 *
 * `getTask` and `getProjectData` resolve to `null` when upstream has no
 * such record, and `deleteProject` and `completeTask` resolve to `false`;
 * every other failure rejects.
 */
export interface TickTickApi {
  listProjects(): Promise<RawProject[]>;
  getProjectData(projectId: string): Promise<RawProjectData | null>;
  createProject(data: RawProject): Promise<RawProject>;
  deleteProject(projectId: string): Promise<boolean>;
  getTask(projectId: string, taskId: string): Promise<RawTask | null>;
  createTask(data: RawTask): Promise<RawTask>;
  updateTask(taskId: string, data: RawTask): Promise<RawTask>;
  completeTask(projectId: string, taskId: string): Promise<boolean>;
}
