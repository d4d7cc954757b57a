/**
 * Error Types Unit Tests
 */

import {
  ConfigError,
  ErrorHandler,
  ErrorType,
  InvalidDateFormatError,
  InvalidTaskInputError,
  MalformedUpstreamRecordError,
  ProjectNotFoundError,
  TaskLayerError,
  TaskNotFoundError,
  UnsupportedOperationError,
  UpstreamTransportError,
} from '../../src/types/errors.js';

describe('Error types', () => {
  it('should keep instanceof working for subclasses', () => {
    const error = new TaskNotFoundError('project-1', 'task-a');

    expect(error).toBeInstanceOf(TaskNotFoundError);
    expect(error).toBeInstanceOf(TaskLayerError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('TaskNotFound');
    expect(error.message).toBe('Task task-a not found in project project-1');
  });

  it('should mark user-recoverable errors', () => {
    expect(new InvalidTaskInputError('bad').recoverable).toBe(true);
    expect(new InvalidDateFormatError('dueDate', 'x').recoverable).toBe(true);
    expect(new ProjectNotFoundError('p').recoverable).toBe(true);
    expect(new MalformedUpstreamRecordError('odd').recoverable).toBe(false);
    expect(new UnsupportedOperationError('no').recoverable).toBe(false);
    expect(new ConfigError('missing').recoverable).toBe(false);
  });

  describe('UpstreamTransportError', () => {
    it('should treat network failures, throttling and server errors as recoverable', () => {
      expect(new UpstreamTransportError('GET', '/project', null, 'down').recoverable).toBe(true);
      expect(new UpstreamTransportError('GET', '/project', 429, 'slow').recoverable).toBe(true);
      expect(new UpstreamTransportError('GET', '/project', 503, 'busy').recoverable).toBe(true);
      expect(new UpstreamTransportError('GET', '/project', 400, 'bad').recoverable).toBe(false);
    });

    it('should suggest checking the token on auth failures', () => {
      const error = new UpstreamTransportError('GET', '/project', 401, 'unauthorized');

      expect(error.suggestions).toEqual(['Check TICKTICK_API_TOKEN']);
      expect(error.details).toEqual({ method: 'GET', path: '/project', status: 401 });
    });

    it('should keep the cause', () => {
      const cause = new TypeError('fetch failed');
      const error = new UpstreamTransportError('GET', '/project', null, 'down', cause);

      expect(error.cause).toBe(cause);
    });
  });

  describe('ErrorHandler.handle', () => {
    it('should serialize layer errors', () => {
      const info = ErrorHandler.handle(new ProjectNotFoundError('project-9'));

      expect(info).toEqual({
        type: ErrorType.PROJECT_NOT_FOUND,
        message: 'Project project-9 not found',
        details: { projectId: 'project-9' },
        recoverable: true,
        suggestions: ['Call ticktick_list_projects to get valid project ids'],
      });
    });

    it('should report foreign errors as Unexpected', () => {
      expect(ErrorHandler.handle(new RangeError('boom'))).toEqual({
        type: 'Unexpected',
        message: 'boom',
        recoverable: false,
      });
      expect(ErrorHandler.handle('text').message).toBe('text');
    });
  });
});
