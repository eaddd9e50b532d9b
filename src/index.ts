export * from './types.js';
export { ReviewError, ConfigError, ValidationError, ProjectIndexError, errorMessage } from './errors.js';
export { resolveConfig, requireApiKey, toCoordinatorConfig } from './config.js';
export type { RawCliArgs } from './config.js';
export { run, exitCodeFor } from './cli.js';

export type { ModelApi } from './models/modelApi.js';
export { OpenRouterClient } from './models/openRouterClient.js';
export type { OpenRouterClientOptions } from './models/openRouterClient.js';
export { ModelCapabilityCache } from './models/capabilityCache.js';
export type { CapabilityCacheOptions } from './models/capabilityCache.js';
export { computeBudget, isBudgetExhausted } from './models/budget.js';

export type * from './project/projectIndex.js';
export { LocalProjectIndex, INDEX_DIR_NAME } from './project/localProjectIndex.js';
export { TOOL_DEFINITIONS, executeTool } from './project/tools.js';

export * from './review/index.js';
export * from './input/index.js';
export { formatAggregatedMarkdown, normalizeReviewerMarkdown } from './output/markdown.js';
export { formatJsonReport } from './output/json.js';

export { AdmissionGate } from './shared/admissionGate.js';
export { Deadline } from './shared/deadline.js';
export { createLogger, silentLogger } from './shared/logger.js';
export type { Logger, LogLevel } from './shared/logger.js';
export { redactText } from './shared/redaction.js';
