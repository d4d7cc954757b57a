/**
 * Error type definitions
 */

export enum ErrorType {
  INVALID_TASK_INPUT = 'InvalidTaskInput',
  INVALID_DATE_FORMAT = 'InvalidDateFormat',
  MALFORMED_UPSTREAM_RECORD = 'MalformedUpstreamRecord',
  TASK_NOT_FOUND = 'TaskNotFound',
  PROJECT_NOT_FOUND = 'ProjectNotFound',
  UPSTREAM_TRANSPORT_ERROR = 'UpstreamTransportError',
  UNSUPPORTED_OPERATION = 'UnsupportedOperation',
  CONFIG_ERROR = 'ConfigError',
  UNEXPECTED = 'Unexpected',
}

/**
 * Serializable form returned to tool callers
 */
export interface TaskLayerErrorInfo {
  type: ErrorType;
  message: string;
  details?: unknown;
  recoverable: boolean;
  suggestions?: string[];
}

interface TaskLayerErrorOptions {
  details?: unknown;
  recoverable?: boolean;
  suggestions?: string[];
  cause?: unknown;
}

export class TaskLayerError extends Error implements TaskLayerErrorInfo {
  type: ErrorType;
  recoverable: boolean;
  details?: unknown;
  suggestions?: string[];

  constructor(type: ErrorType, message: string, options?: TaskLayerErrorOptions) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = type;
    this.type = type;
    this.recoverable = options?.recoverable ?? true;
    this.details = options?.details;
    this.suggestions = options?.suggestions;

    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): TaskLayerErrorInfo {
    return {
      type: this.type,
      message: this.message,
      details: this.details,
      recoverable: this.recoverable,
      suggestions: this.suggestions,
    };
  }
}

export class InvalidTaskInputError extends TaskLayerError {
  constructor(message: string, details?: unknown) {
    super(ErrorType.INVALID_TASK_INPUT, message, { details });
  }
}

export class InvalidDateFormatError extends TaskLayerError {
  readonly field: string;
  readonly value: string;

  constructor(field: string, value: string) {
    super(ErrorType.INVALID_DATE_FORMAT, `Invalid ${field} format: ${JSON.stringify(value)}`, {
      details: { field, value },
      suggestions: [
        'Use a calendar date like 2025-03-15 for all-day tasks',
        'Use a date-time like 2025-03-15T14:00:00 or 2025-03-15T14:00:00+09:00 for timed tasks',
      ],
    });
    this.field = field;
    this.value = value;
  }
}

/**
 * Upstream returned something this layer cannot identify. Not user-recoverable.
 */
export class MalformedUpstreamRecordError extends TaskLayerError {
  constructor(message: string, details?: unknown) {
    super(ErrorType.MALFORMED_UPSTREAM_RECORD, message, { details, recoverable: false });
  }
}

export class TaskNotFoundError extends TaskLayerError {
  constructor(projectId: string, taskId: string) {
    super(ErrorType.TASK_NOT_FOUND, `Task ${taskId} not found in project ${projectId}`, {
      details: { projectId, taskId },
      suggestions: [
        'Check that the projectId is the project the task belongs to',
        'Completed tasks cannot be fetched through the TickTick Open API',
      ],
    });
  }
}

export class ProjectNotFoundError extends TaskLayerError {
  constructor(projectId: string) {
    super(ErrorType.PROJECT_NOT_FOUND, `Project ${projectId} not found`, {
      details: { projectId },
      suggestions: ['Call ticktick_list_projects to get valid project ids'],
    });
  }
}

export class UpstreamTransportError extends TaskLayerError {
  readonly status: number | null;
  readonly method: string;
  readonly path: string;

  constructor(
    method: string,
    path: string,
    status: number | null,
    message: string,
    cause?: unknown
  ) {
    super(ErrorType.UPSTREAM_TRANSPORT_ERROR, message, {
      details: { method, path, status },
      recoverable: status === null || status === 429 || status >= 500,
      suggestions: status === 401 || status === 403 ? ['Check TICKTICK_API_TOKEN'] : undefined,
      cause,
    });
    this.status = status;
    this.method = method;
    this.path = path;
  }
}

export class UnsupportedOperationError extends TaskLayerError {
  constructor(message: string, suggestions?: string[]) {
    super(ErrorType.UNSUPPORTED_OPERATION, message, { recoverable: false, suggestions });
  }
}

export class ConfigError extends TaskLayerError {
  constructor(message: string, details?: unknown) {
    super(ErrorType.CONFIG_ERROR, message, { details, recoverable: false });
  }
}

export class ErrorHandler {
  /**
   * Convert anything thrown into the form sent back to tool callers.
   * Errors from outside this layer are reported as `Unexpected`.
   */
  static handle(error: unknown): TaskLayerErrorInfo {
    if (error instanceof TaskLayerError) {
      return error.toJSON();
    }

    return {
      type: ErrorType.UNEXPECTED,
      message: error instanceof Error ? error.message : String(error),
      recoverable: false,
    };
  }
}
