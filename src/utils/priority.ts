/**
 * Priority Mapper
 * Fixed bijection between the agent's four priority levels and the
 * TickTick integer scale.
 */

import { PRIORITIES, type Priority } from '../types/task.js';
import { InvalidTaskInputError } from '../types/errors.js';
import { priorityLogger as log } from './logger.js';

const PRIORITY_TO_UPSTREAM: Record<Priority, number> = {
  none: 0,
  low: 1,
  medium: 3,
  high: 5,
};

const PRIORITY_FROM_UPSTREAM = new Map<number, Priority>(
  PRIORITIES.map((p) => [PRIORITY_TO_UPSTREAM[p], p])
);

export function isPriority(value: string): value is Priority {
  return (PRIORITIES as readonly string[]).includes(value);
}

export function priorityToUpstream(priority: Priority): number {
  return PRIORITY_TO_UPSTREAM[priority];
}

/**
 * Unknown codes read as `none` with a warning; the rest of the record is
 * still returned.
 */
export function priorityFromUpstream(code: unknown): Priority {
  if (code === undefined || code === null) {
    return 'none';
  }

  const priority = typeof code === 'number' ? PRIORITY_FROM_UPSTREAM.get(code) : undefined;
  if (priority === undefined) {
    log.warn({ code }, 'Unknown upstream priority code, treating as none');
    return 'none';
  }
  return priority;
}

/**
 * Parse a caller-supplied priority string (case-insensitive)
 */
export function parsePriority(value: string): Priority {
  const key = value.trim().toLowerCase();
  if (!isPriority(key)) {
    throw new InvalidTaskInputError(
      `Invalid priority ${JSON.stringify(value)}. Must be one of: ${PRIORITIES.join(', ')}`,
      { field: 'priority', value }
    );
  }
  return key;
}
