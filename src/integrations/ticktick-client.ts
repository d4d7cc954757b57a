/**
 * TickTick Open API client
 *
 * Thin fetch wrapper that returns raw upstream records. Does not
 * normalize anything; see task-normalizer.ts for that.
 */

import type { TickTickConfig } from '../types/config.js';
import type {
  RawProject,
  RawProjectData,
  RawTask,
  TickTickApi,
} from '../types/ticktick.js';
import { UpstreamTransportError } from '../types/errors.js';
import { httpLogger } from '../utils/logger.js';
import { getErrorMessage } from '../utils/mcp-response.js';
import { retryWithBackoff, type BackoffOptions } from '../utils/retry.js';

export type FetchFn = typeof fetch;

export interface TickTickClientOptions extends TickTickConfig {
  /** Injected for tests; defaults to the global fetch */
  fetch?: FetchFn;
  /** Backoff for GET requests; writes are never retried */
  retry?: BackoffOptions;
}

interface RequestOptions {
  method?: 'GET' | 'POST' | 'DELETE';
  body?: unknown;
  /** Report 404 as `found: false` instead of throwing */
  allowNotFound?: boolean;
}

interface UpstreamResult<T> {
  found: boolean;
  /** Parsed JSON body; null when upstream sent none */
  body: T | null;
}

function isRetryable(error: Error): boolean {
  return (
    error instanceof UpstreamTransportError &&
    (error.status === null || error.status === 429 || error.status >= 500)
  );
}

export class TickTickClient implements TickTickApi {
  private readonly fetchFn: FetchFn;

  constructor(private readonly options: TickTickClientOptions) {
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
  }

  // Projects

  async listProjects(): Promise<RawProject[]> {
    return (await this.request<RawProject[]>('/project')).body ?? [];
  }

  async getProjectData(projectId: string): Promise<RawProjectData | null> {
    const result = await this.request<RawProjectData>(
      `/project/${encodeURIComponent(projectId)}/data`,
      { allowNotFound: true }
    );
    return result.body;
  }

  async createProject(data: RawProject): Promise<RawProject> {
    return this.requireBody(
      (await this.request<RawProject>('/project', { method: 'POST', body: data })).body,
      'POST',
      '/project'
    );
  }

  async deleteProject(projectId: string): Promise<boolean> {
    const result = await this.request(`/project/${encodeURIComponent(projectId)}`, {
      method: 'DELETE',
      allowNotFound: true,
    });
    return result.found;
  }

  // Tasks

  async getTask(projectId: string, taskId: string): Promise<RawTask | null> {
    const result = await this.request<RawTask>(
      `/project/${encodeURIComponent(projectId)}/task/${encodeURIComponent(taskId)}`,
      { allowNotFound: true }
    );
    return result.body;
  }

  async createTask(data: RawTask): Promise<RawTask> {
    return this.requireBody(
      (await this.request<RawTask>('/task', { method: 'POST', body: data })).body,
      'POST',
      '/task'
    );
  }

  async updateTask(taskId: string, data: RawTask): Promise<RawTask> {
    const path = `/task/${encodeURIComponent(taskId)}`;
    return this.requireBody(
      (await this.request<RawTask>(path, { method: 'POST', body: data })).body,
      'POST',
      path
    );
  }

  async completeTask(projectId: string, taskId: string): Promise<boolean> {
    const result = await this.request(
      `/project/${encodeURIComponent(projectId)}/task/${encodeURIComponent(taskId)}/complete`,
      { method: 'POST', allowNotFound: true }
    );
    return result.found;
  }

  private requireBody<T>(body: T | null, method: string, path: string): T {
    if (body === null) {
      throw new UpstreamTransportError(method, path, null, `Empty response from ${method} ${path}`);
    }
    return body;
  }

  private async request<T>(path: string, options: RequestOptions = {}): Promise<UpstreamResult<T>> {
    const method = options.method ?? 'GET';
    const send = (): Promise<UpstreamResult<T>> => this.send<T>(path, method, options);

    if (method !== 'GET') {
      return send();
    }

    return retryWithBackoff(send, {
      ...this.options.retry,
      shouldRetry: isRetryable,
      onRetry: (error, attempt, nextDelay) => {
        httpLogger.warn({ path, attempt, nextDelay, err: error.message }, 'Retrying upstream read');
      },
    });
  }

  private async send<T>(
    path: string,
    method: string,
    options: RequestOptions
  ): Promise<UpstreamResult<T>> {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.options.apiToken}`,
    };
    const init: RequestInit = {
      method,
      headers,
      signal: AbortSignal.timeout(this.options.timeoutMs),
    };
    if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
      init.body = JSON.stringify(options.body);
    }

    const started = Date.now();
    let res: Response;
    try {
      res = await this.fetchFn(`${this.options.baseUrl}${path}`, init);
    } catch (error) {
      throw new UpstreamTransportError(
        method,
        path,
        null,
        `Request to TickTick failed (${method} ${path}): ${getErrorMessage(error)}`,
        error
      );
    }

    httpLogger.debug({ method, path, status: res.status, ms: Date.now() - started }, 'Upstream call');

    if (res.status === 404 && options.allowNotFound) {
      return { found: false, body: null };
    }

    if (!res.ok) {
      const text = await res.text().catch(() => '');
      throw new UpstreamTransportError(
        method,
        path,
        res.status,
        `TickTick API error ${res.status} (${method} ${path})${text ? `: ${text}` : ''}`
      );
    }

    const text = await res.text();
    if (text.trim() === '') {
      return { found: true, body: null };
    }

    try {
      return { found: true, body: JSON.parse(text) as T };
    } catch (error) {
      throw new UpstreamTransportError(
        method,
        path,
        res.status,
        `Invalid JSON from TickTick (${method} ${path})`,
        error
      );
    }
  }
}
