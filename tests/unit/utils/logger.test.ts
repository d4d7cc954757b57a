/**
 * Logger Utility Tests
 */

describe('Logger Utility', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    jest.resetModules();
    process.env = { ...originalEnv };
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  describe('getLogLevel', () => {
    it('should return info as default level', async () => {
      delete process.env.LOG_LEVEL;
      const { logger } = await import('../../../src/utils/logger.js');
      expect(logger.level).toBe('info');
    });

    it.each(['trace', 'debug', 'warn', 'error', 'fatal', 'silent'])(
      'should use LOG_LEVEL=%s from environment',
      async (level) => {
        process.env.LOG_LEVEL = level;
        const { logger } = await import('../../../src/utils/logger.js');
        expect(logger.level).toBe(level);
      }
    );

    it('should handle uppercase LOG_LEVEL', async () => {
      process.env.LOG_LEVEL = 'DEBUG';
      const { logger } = await import('../../../src/utils/logger.js');
      expect(logger.level).toBe('debug');
    });

    it('should fallback to info for invalid LOG_LEVEL', async () => {
      process.env.LOG_LEVEL = 'invalid';
      const { logger } = await import('../../../src/utils/logger.js');
      expect(logger.level).toBe('info');
    });
  });

  describe('createLogger', () => {
    it('should create child logger with component name', async () => {
      const { createLogger } = await import('../../../src/utils/logger.js');
      const childLogger = createLogger('test-component');
      expect(childLogger.bindings()).toEqual(expect.objectContaining({ component: 'test-component' }));
    });
  });

  describe('pre-configured loggers', () => {
    it.each(['mcp', 'http', 'cli', 'priority', 'search', 'updater'])(
      'should bind the %s component',
      async (component) => {
        const loggers = await import('../../../src/utils/logger.js');
        const byComponent = {
          mcp: loggers.mcpLogger,
          http: loggers.httpLogger,
          cli: loggers.cliLogger,
          priority: loggers.priorityLogger,
          search: loggers.searchLogger,
          updater: loggers.updaterLogger,
        };
        const entry = Object.entries(byComponent).find(([name]) => name === component);

        expect(entry?.[1].bindings()).toEqual(expect.objectContaining({ component }));
      }
    );
  });

  describe('production mode', () => {
    it('should build a plain JSON logger when NODE_ENV is not development', async () => {
      process.env.NODE_ENV = 'production';
      process.env.LOG_LEVEL = 'warn';
      const { logger } = await import('../../../src/utils/logger.js');

      expect(logger.level).toBe('warn');
      expect(logger.isLevelEnabled('info')).toBe(false);
    });
  });
});
