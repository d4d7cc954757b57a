/**
 * Configuration type definitions
 */

export interface ServerConfig {
  ticktick: TickTickConfig;
  /** Project used when a task is created without a projectId; null disables the fallback */
  inboxProjectId: string | null;
}

export interface TickTickConfig {
  apiToken: string;
  baseUrl: string;
  timeoutMs: number;
}

export const DEFAULT_BASE_URL = 'https://api.ticktick.com/open/v1';
export const DEFAULT_INBOX_PROJECT_ID = 'inbox';
export const DEFAULT_TIMEOUT_MS = 30000;
