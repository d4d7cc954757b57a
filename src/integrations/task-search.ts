/**
 * Task Search
 *
 * TickTick has no server-side search, so this walks the active-task
 * universe project by project and applies a conjunctive chain of
 * independent predicates. Completed tasks are never returned by the
 * upstream project listing and therefore never appear in results.
 */

import type { SearchFilter, Task } from '../types/task.js';
import { searchLogger as log } from '../utils/logger.js';
import { parseDate, parseDateBound } from '../utils/dates.js';
import { parsePriority } from '../utils/priority.js';
import type { ProjectService } from './project-service.js';

export type TaskPredicate = (task: Task) => boolean;

function dueEpoch(task: Task): number | null {
  return task.dueDate ? parseDate(task.dueDate)?.epochMs ?? null : null;
}

/**
 * Build the predicate chain for a filter.
 *
 * Each present option contributes one closure; absent options contribute
 * nothing. Validation happens here, before any upstream call.
 */
export function buildPredicates(filter: SearchFilter): TaskPredicate[] {
  const predicates: TaskPredicate[] = [];

  if (filter.query !== undefined && filter.query !== '') {
    const needle = filter.query.toLowerCase();
    predicates.push((task) => task.title.toLowerCase().includes(needle));
  }

  if (filter.priority !== undefined) {
    const priority = parsePriority(filter.priority);
    predicates.push((task) => task.priority === priority);
  }

  if (filter.dateFrom !== undefined) {
    const from = parseDateBound(filter.dateFrom, 'dateFrom', 'start').getTime();
    predicates.push((task) => {
      const due = dueEpoch(task);
      return due !== null && due >= from;
    });
  }

  if (filter.dateTo !== undefined) {
    const to = parseDateBound(filter.dateTo, 'dateTo', 'end').getTime();
    predicates.push((task) => {
      const due = dueEpoch(task);
      return due !== null && due <= to;
    });
  }

  if (filter.projectId !== undefined) {
    const projectId = filter.projectId;
    predicates.push((task) => task.projectId === projectId);
  }

  return predicates;
}

/**
 * Short-circuit AND over the chain; an empty chain matches everything
 */
export function matchesAll(task: Task, predicates: readonly TaskPredicate[]): boolean {
  return predicates.every((predicate) => predicate(task));
}

export class TaskSearchEngine {
  constructor(private readonly projects: ProjectService) {}

  async search(filter: SearchFilter): Promise<Task[]> {
    const predicates = buildPredicates(filter);

    const projectIds = filter.projectId
      ? [filter.projectId]
      : [...new Set((await this.projects.listProjects()).map((p) => p.id))];

    const results: Task[] = [];
    for (const projectId of projectIds) {
      const tasks = await this.projects.getProjectTasks(projectId);
      for (const task of tasks) {
        if (matchesAll(task, predicates)) {
          results.push(task);
        }
      }
    }

    log.debug(
      { projects: projectIds.length, predicates: predicates.length, matched: results.length },
      'Search complete'
    );
    return results;
  }
}
