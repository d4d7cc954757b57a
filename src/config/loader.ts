/**
 * Configuration loader
 * Builds the server configuration from environment variables
 */

import type { ServerConfig } from '../types/config.js';
import { ConfigError } from '../types/errors.js';
import { validateEnv } from './validation.js';

export class ConfigLoader {
  /**
   * Load configuration from an environment map.
   *
   * The environment is passed in rather than read from `process.env` so
   * callers (and tests) decide where it comes from.
   */
  static fromEnv(env: Record<string, string | undefined>): ServerConfig {
    const result = validateEnv(env);

    if (!result.success || !result.data) {
      const issues = result.error?.issues.map((issue) => issue.message) ?? [];
      throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, { issues });
    }

    const data = result.data;
    return {
      ticktick: {
        apiToken: data.TICKTICK_API_TOKEN,
        baseUrl: data.TICKTICK_API_BASE_URL,
        timeoutMs: data.TICKTICK_TIMEOUT_MS,
      },
      inboxProjectId: data.TICKTICK_INBOX_PROJECT_ID,
    };
  }
}
