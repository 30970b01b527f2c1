/**
 * Workflow Specification Service
 *
 * Fetches workflow specifications from the workflows API and keeps the last
 * successful response on disk. When the API cannot be reached, the cached copy
 * is used instead.
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import path from 'path';
import { getConfig } from '../config/index.js';
import { MalformedWorkflowResponseError, WorkflowApiError, toError } from '../utils/errors.js';
import { safeUnlink } from '../utils/fs.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger({ service: 'workflow-spec' });

export interface WorkflowSpecServiceOptions {
  baseUrl?: string;
  apiKey?: string;
  cacheDir?: string;
  timeoutMs?: number;
}

export type WorkflowSpecification = Record<string, unknown>;

const HTTP_ERROR_MESSAGES: Record<number, { message: string; code: string }> = {
  401: { message: 'Unauthorized access to workflows API - check API key', code: 'WORKFLOW_API_UNAUTHORIZED' },
  404: { message: 'Workflow or workspace not found', code: 'WORKFLOW_NOT_FOUND' },
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Replace characters that are unsafe in a path segment
 */
export function sanitizePathSegment(segment: string): string {
  return segment.replace(/[^A-Za-z0-9_-]/g, '_');
}

/**
 * Pull the specification out of `{ workflow: { config: "<json>" } }`
 * @throws MalformedWorkflowResponseError
 */
export function extractSpecification(response: unknown): WorkflowSpecification {
  if (!isRecord(response) || !isRecord(response.workflow) || !('config' in response.workflow)) {
    throw new MalformedWorkflowResponseError('Could not find workflow specification in API response');
  }

  let config: unknown;
  try {
    const raw = response.workflow.config;
    if (typeof raw !== 'string') {
      throw new TypeError('config is not a string');
    }
    config = JSON.parse(raw);
  } catch {
    throw new MalformedWorkflowResponseError('Could not decode workflow specification in API response');
  }

  if (!isRecord(config) || !isRecord(config.specification)) {
    throw new MalformedWorkflowResponseError('Workflow specification not found in API response');
  }
  return config.specification;
}

export class WorkflowSpecService {
  private readonly baseUrl?: string;
  private readonly apiKey?: string;
  private readonly cacheDir: string;
  private readonly timeoutMs: number;

  constructor(options: WorkflowSpecServiceOptions = {}) {
    const config = getConfig().workflowsApi;
    this.baseUrl = options.baseUrl ?? config.baseUrl;
    this.apiKey = options.apiKey ?? config.apiKey;
    this.cacheDir = options.cacheDir ?? config.cacheDir;
    this.timeoutMs = options.timeoutMs ?? config.timeoutMs;
  }

  getCacheFilePath(workspaceId: string, workflowId: string): string {
    return path.join(
      this.cacheDir,
      'workflow',
      sanitizePathSegment(workspaceId),
      `${sanitizePathSegment(workflowId)}.json`
    );
  }

  /**
   * Get a workflow specification, falling back to the disk cache on connection failure
   * @throws WorkflowApiError (also when the API is not configured), MalformedWorkflowResponseError
   */
  async getWorkflowSpecification(
    workspaceId: string,
    workflowId: string,
    apiKey?: string
  ): Promise<WorkflowSpecification> {
    const key = apiKey ?? this.apiKey;
    if (!this.baseUrl) {
      throw new WorkflowApiError(
        'Base URL is not configured (WORKFLOWS_API_BASE_URL)',
        undefined,
        undefined,
        'WORKFLOW_API_NOT_CONFIGURED'
      );
    }
    if (!key) {
      throw new WorkflowApiError('API key is not configured (API_KEY)', undefined, undefined, 'WORKFLOW_API_NOT_CONFIGURED');
    }

    const url = new URL(
      `${this.baseUrl.replace(/\/+$/, '')}/${encodeURIComponent(workspaceId)}/workflows/${encodeURIComponent(workflowId)}`
    );
    url.searchParams.set('api_key', key);

    let response: Response;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      response = await fetch(url, { method: 'GET', signal: controller.signal });
    } catch (error) {
      const cause = toError(error);
      logger.warn(
        { workspaceId, workflowId, error: cause.name === 'AbortError' ? 'Request timed out' : cause.message },
        'Could not reach workflows API, trying cached specification'
      );
      const cached = await this.loadCachedResponse(workspaceId, workflowId);
      if (cached === undefined) {
        throw new WorkflowApiError('Could not connect to workflows API', undefined, cause, 'WORKFLOW_API_CONNECTION_ERROR');
      }
      return extractSpecification(cached);
    } finally {
      clearTimeout(timeoutId);
    }

    if (!response.ok) {
      const known = HTTP_ERROR_MESSAGES[response.status];
      if (known) {
        throw new WorkflowApiError(known.message, response.status, undefined, known.code);
      }
      throw new WorkflowApiError(`Unsuccessful request with response code: ${response.status}`, response.status);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new MalformedWorkflowResponseError('Could not decode JSON response from workflows API');
    }

    await this.cacheResponse(workspaceId, workflowId, body);
    return extractSpecification(body);
  }

  private async cacheResponse(workspaceId: string, workflowId: string, body: unknown): Promise<void> {
    const filePath = this.getCacheFilePath(workspaceId, workflowId);
    try {
      await mkdir(path.dirname(filePath), { recursive: true });
      await writeFile(filePath, JSON.stringify(body));
      logger.debug({ workspaceId, workflowId, filePath }, 'Cached workflow response');
    } catch (error) {
      logger.warn({ workspaceId, workflowId, error: toError(error).message }, 'Failed to cache workflow response');
    }
  }

  /**
   * Cached response, or undefined when none is usable. A corrupt cache file is deleted.
   */
  private async loadCachedResponse(workspaceId: string, workflowId: string): Promise<unknown> {
    const filePath = this.getCacheFilePath(workspaceId, workflowId);
    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch {
      return undefined;
    }

    try {
      const parsed: unknown = JSON.parse(content);
      logger.info({ workspaceId, workflowId }, 'Using cached workflow specification');
      return parsed;
    } catch {
      logger.warn({ workspaceId, workflowId, filePath }, 'Deleting corrupt workflow cache file');
      await safeUnlink(filePath);
      return undefined;
    }
  }
}
