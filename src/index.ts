/**
 * Workflow engine entry point
 */

export * from './workflows/index.js';

export { WorkflowEngine, type WorkflowEngineOptions } from './services/workflow-engine.service.js';
export {
  WorkflowSpecService,
  extractSpecification,
  sanitizePathSegment,
  type WorkflowSpecServiceOptions,
  type WorkflowSpecification,
} from './services/workflow-spec.service.js';
export {
  UsageCollector,
  mergeUsagePayloads,
  mergeUsageRecords,
  type ApiKeyUsage,
  type ResourceUsage,
  type UsageCollectorOptions,
} from './services/usage-collector.service.js';

export { getConfig, type AppConfig } from './config/index.js';
export {
  AppError,
  BadRequestError,
  ValidationError,
  InternalError,
  ExternalApiError,
  WorkflowApiError,
  MalformedWorkflowResponseError,
} from './utils/errors.js';
export { ConcurrencyLimiter, parallelMap } from './utils/parallel.js';
