/**
 * Config Loader Unit Tests
 */

import { ConfigLoader } from '../../src/config/loader.js';
import { validateEnv } from '../../src/config/validation.js';
import { ConfigError } from '../../src/types/errors.js';

describe('ConfigLoader.fromEnv', () => {
  it('should apply defaults when only the token is set', () => {
    expect(ConfigLoader.fromEnv({ TICKTICK_API_TOKEN: 'test-token' })).toEqual({
      ticktick: {
        apiToken: 'test-token',
        baseUrl: 'https://api.ticktick.com/open/v1',
        timeoutMs: 30000,
      },
      inboxProjectId: 'inbox',
    });
  });

  it('should read every variable', () => {
    const config = ConfigLoader.fromEnv({
      TICKTICK_API_TOKEN: ' test-token ',
      TICKTICK_INBOX_PROJECT_ID: 'inbox12345',
      TICKTICK_API_BASE_URL: 'https://ticktick.test/open/v1/',
      TICKTICK_TIMEOUT_MS: '5000',
    });

    expect(config).toEqual({
      ticktick: {
        apiToken: 'test-token',
        baseUrl: 'https://ticktick.test/open/v1',
        timeoutMs: 5000,
      },
      inboxProjectId: 'inbox12345',
    });
  });

  it('should disable the inbox fallback when the variable is empty', () => {
    const config = ConfigLoader.fromEnv({
      TICKTICK_API_TOKEN: 'test-token',
      TICKTICK_INBOX_PROJECT_ID: '',
    });

    expect(config.inboxProjectId).toBeNull();
  });

  it('should fail without a token', () => {
    expect(() => ConfigLoader.fromEnv({})).toThrow(ConfigError);
    expect(() => ConfigLoader.fromEnv({})).toThrow(
      'Invalid configuration: TICKTICK_API_TOKEN is required'
    );
    expect(() => ConfigLoader.fromEnv({ TICKTICK_API_TOKEN: '   ' })).toThrow(
      'Invalid configuration: TICKTICK_API_TOKEN is required'
    );
  });

  it('should reject a bad timeout or base URL', () => {
    expect(() =>
      ConfigLoader.fromEnv({ TICKTICK_API_TOKEN: 'test-token', TICKTICK_TIMEOUT_MS: '-1' })
    ).toThrow(ConfigError);
    expect(() =>
      ConfigLoader.fromEnv({ TICKTICK_API_TOKEN: 'test-token', TICKTICK_API_BASE_URL: 'not a url' })
    ).toThrow(ConfigError);
  });
});

describe('validateEnv', () => {
  it('should return the zod error on failure', () => {
    const result = validateEnv({});

    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.path).toEqual(['TICKTICK_API_TOKEN']);
  });
});
