/**
 * Workflow Specification Service Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, mkdir, readFile, rm, writeFile, access } from 'fs/promises';
import os from 'os';
import path from 'path';

vi.mock('../utils/logger.js', () => ({
  createChildLogger: vi.fn(() => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  })),
}));

import { WorkflowSpecService, extractSpecification, sanitizePathSegment } from './workflow-spec.service.js';
import { MalformedWorkflowResponseError, WorkflowApiError } from '../utils/errors.js';

const specification = {
  version: '1.0',
  inputs: [{ type: 'WorkflowImage', name: 'image' }],
  steps: [],
  outputs: [],
};

function apiBody(spec: unknown = specification): { workflow: { config: string } } {
  return { workflow: { config: JSON.stringify({ specification: spec }) } };
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

describe('sanitizePathSegment', () => {
  it('should replace unsafe characters', () => {
    expect(sanitizePathSegment('my ws/../x')).toBe('my_ws____x');
  });

  it('should keep letters, digits, dashes and underscores', () => {
    expect(sanitizePathSegment('Space_01-a')).toBe('Space_01-a');
  });
});

describe('extractSpecification', () => {
  it('should return the nested specification', () => {
    expect(extractSpecification(apiBody())).toEqual(specification);
  });

  it('should reject responses without a workflow config', () => {
    expect(() => extractSpecification({ workflow: {} })).toThrow(
      'Could not find workflow specification in API response'
    );
    expect(() => extractSpecification(null)).toThrow(MalformedWorkflowResponseError);
  });

  it('should reject configs that are not JSON strings', () => {
    expect(() => extractSpecification({ workflow: { config: '{not json' } })).toThrow(
      'Could not decode workflow specification in API response'
    );
    expect(() => extractSpecification({ workflow: { config: 42 } })).toThrow(
      'Could not decode workflow specification in API response'
    );
  });

  it('should reject configs without a specification', () => {
    expect(() => extractSpecification({ workflow: { config: '{"other":1}' } })).toThrow(
      'Workflow specification not found in API response'
    );
  });
});

describe('WorkflowSpecService', () => {
  let cacheDir: string;
  let service: WorkflowSpecService;
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(async () => {
    cacheDir = await mkdtemp(path.join(os.tmpdir(), 'workflow-spec-'));
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
    service = new WorkflowSpecService({
      baseUrl: 'https://workflows.test/',
      apiKey: 'test-secret',
      cacheDir,
      timeoutMs: 1000,
    });
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    await rm(cacheDir, { recursive: true, force: true });
  });

  it('should build the cache path from sanitized ids', () => {
    expect(service.getCacheFilePath('my ws', 'flow.v2')).toBe(path.join(cacheDir, 'workflow', 'my_ws', 'flow_v2.json'));
  });

  it.each([
    [{ baseUrl: '' }, 'Workflows API: Base URL is not configured (WORKFLOWS_API_BASE_URL)'],
    [{ apiKey: '' }, 'Workflows API: API key is not configured (API_KEY)'],
  ])('should reject requests when the API is not configured (%o)', async (overrides, message) => {
    const unconfigured = new WorkflowSpecService({
      baseUrl: 'https://workflows.test',
      apiKey: 'test-secret',
      cacheDir,
      timeoutMs: 1000,
      ...overrides,
    });

    const error = await unconfigured.getWorkflowSpecification('my-space', 'detect').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(WorkflowApiError);
    if (error instanceof WorkflowApiError) {
      expect(error.code).toBe('WORKFLOW_API_NOT_CONFIGURED');
      expect(error.message).toBe(message);
    }
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('should fetch the specification and cache the response', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(apiBody()));

    const result = await service.getWorkflowSpecification('my-space', 'detect');

    expect(result).toEqual(specification);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(String(fetchMock.mock.calls[0][0])).toBe('https://workflows.test/my-space/workflows/detect?api_key=test-secret');
    const cached: unknown = JSON.parse(await readFile(service.getCacheFilePath('my-space', 'detect'), 'utf-8'));
    expect(cached).toEqual(apiBody());
  });

  it('should prefer an explicit API key', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(apiBody()));

    await service.getWorkflowSpecification('my-space', 'detect', 'other-secret');

    expect(String(fetchMock.mock.calls[0][0])).toBe('https://workflows.test/my-space/workflows/detect?api_key=other-secret');
  });

  it('should fall back to the cached response when the API is unreachable', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(apiBody()));
    await service.getWorkflowSpecification('my-space', 'detect');

    fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));
    const result = await service.getWorkflowSpecification('my-space', 'detect');

    expect(result).toEqual(specification);
  });

  it('should raise a connection error when nothing is cached', async () => {
    fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));

    const error = await service.getWorkflowSpecification('my-space', 'detect').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(WorkflowApiError);
    if (error instanceof WorkflowApiError) {
      expect(error.code).toBe('WORKFLOW_API_CONNECTION_ERROR');
      expect(error.message).toBe('Workflows API: Could not connect to workflows API');
      expect(error.originalError?.message).toBe('fetch failed');
    }
  });

  it('should delete a corrupt cache file', async () => {
    const cacheFile = service.getCacheFilePath('my-space', 'detect');
    await mkdir(path.dirname(cacheFile), { recursive: true });
    await writeFile(cacheFile, '{corrupt');
    fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));

    await expect(service.getWorkflowSpecification('my-space', 'detect')).rejects.toBeInstanceOf(WorkflowApiError);
    expect(await exists(cacheFile)).toBe(false);
  });

  it.each([
    [401, 'WORKFLOW_API_UNAUTHORIZED', 'Workflows API: Unauthorized access to workflows API - check API key'],
    [404, 'WORKFLOW_NOT_FOUND', 'Workflows API: Workflow or workspace not found'],
    [500, 'WORKFLOW_API_ERROR', 'Workflows API: Unsuccessful request with response code: 500'],
  ])('should map HTTP %i to a WorkflowApiError', async (status, code, message) => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ error: 'nope' }, status));

    const error = await service.getWorkflowSpecification('my-space', 'detect').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(WorkflowApiError);
    if (error instanceof WorkflowApiError) {
      expect(error.httpStatus).toBe(status);
      expect(error.code).toBe(code);
      expect(error.message).toBe(message);
    }
  });

  it('should not fall back to the cache on HTTP errors', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(apiBody()));
    await service.getWorkflowSpecification('my-space', 'detect');
    fetchMock.mockResolvedValueOnce(jsonResponse({}, 404));

    await expect(service.getWorkflowSpecification('my-space', 'detect')).rejects.toBeInstanceOf(WorkflowApiError);
  });

  it('should reject bodies that are not JSON', async () => {
    fetchMock.mockResolvedValueOnce(new Response('<html>', { status: 200 }));

    await expect(service.getWorkflowSpecification('my-space', 'detect')).rejects.toThrow(
      'Could not decode JSON response from workflows API'
    );
  });

  it('should reject responses without a specification', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ workflow: { config: '{}' } }));

    await expect(service.getWorkflowSpecification('my-space', 'detect')).rejects.toBeInstanceOf(
      MalformedWorkflowResponseError
    );
  });
});
