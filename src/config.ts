import type { CliConfig, EngineConfig } from './types.js';
import {
  DEFAULT_BASE_URL,
  DEFAULT_CONTEXT_OVERHEAD_TOKENS,
  DEFAULT_FIXED_OUTPUT_TOKENS,
  DEFAULT_MAX_CONCURRENT_REQUESTS,
  DEFAULT_MAX_DIR_ENTRIES,
  DEFAULT_MAX_INPUT_CHARS,
  DEFAULT_MAX_SEARCH_RESULTS,
  DEFAULT_MAX_TOOL_CALLS,
  DEFAULT_MAX_TOOL_RESULT_CHARS,
  DEFAULT_MAX_TOTAL_TOOL_CHARS,
  DEFAULT_METADATA_TTL,
  DEFAULT_PRIMARY_MODEL,
  DEFAULT_REVIEWER_TIMEOUT,
  DEFAULT_SECONDARY_MODEL,
  DEFAULT_SYNTHESIS_TIMEOUT,
  DEFAULT_TOOL_CALL_TIMEOUT,
  DISABLED_MODEL_SENTINELS,
} from './types.js';
import { ConfigError } from './errors.js';
import { parseLogLevel, type LogLevel } from './shared/logger.js';
import type { CoordinatorConfig } from './review/coordinator.js';

export interface RawCliArgs {
  readonly primaryModel?: string;
  readonly secondaryModel?: string;
  readonly synthesisModel?: string;
  readonly timeout?: number;
  readonly concurrency?: number;
  /** `false` when `--no-index` is given */
  readonly index?: boolean;
  readonly json?: boolean;
  readonly verbose?: boolean;
}

const ENV_PREFIX = 'TWIN_REVIEW_';

/**
 * Resolve CLI config from args > env > defaults.
 * Throws ConfigError for out-of-range or malformed values.
 */
export function resolveConfig(args: RawCliArgs): CliConfig {
  const primaryModel = resolveModel(args.primaryModel, 'PRIMARY_MODEL') ?? DEFAULT_PRIMARY_MODEL;
  if (DISABLED_MODEL_SENTINELS.includes(primaryModel.toLowerCase())) {
    throw new ConfigError('The primary reviewer cannot be disabled');
  }
  const secondaryModel =
    resolveModel(args.secondaryModel, 'SECONDARY_MODEL') ?? DEFAULT_SECONDARY_MODEL;
  const synthesisModel = resolveModel(args.synthesisModel, 'SYNTHESIS_MODEL') ?? primaryModel;
  if (DISABLED_MODEL_SENTINELS.includes(synthesisModel.toLowerCase())) {
    throw new ConfigError('The synthesis model cannot be disabled');
  }

  const verbose = args.verbose ?? false;
  const jsonOutput = args.json ?? false;

  return {
    primaryModel,
    secondaryModel,
    synthesisModel,
    maxConcurrentRequests: positive(
      'maxConcurrentRequests',
      args.concurrency ?? parseEnvInt('MAX_CONCURRENT_REQUESTS') ?? DEFAULT_MAX_CONCURRENT_REQUESTS,
    ),
    reviewerTimeoutSeconds: positive(
      'reviewerTimeoutSeconds',
      args.timeout ?? parseEnvInt('REVIEWER_TIMEOUT_SECONDS') ?? DEFAULT_REVIEWER_TIMEOUT,
    ),
    synthesisTimeoutSeconds: positive(
      'synthesisTimeoutSeconds',
      parseEnvInt('SYNTHESIS_TIMEOUT_SECONDS') ?? DEFAULT_SYNTHESIS_TIMEOUT,
    ),
    toolCallTimeoutSeconds: positive(
      'toolCallTimeoutSeconds',
      parseEnvInt('TOOL_CALL_TIMEOUT_SECONDS') ?? DEFAULT_TOOL_CALL_TIMEOUT,
    ),
    fixedOutputTokens: positive(
      'fixedOutputTokens',
      parseEnvInt('FIXED_OUTPUT_TOKENS') ?? DEFAULT_FIXED_OUTPUT_TOKENS,
    ),
    contextOverheadTokens: nonNegative(
      'contextOverheadTokens',
      parseEnvInt('CONTEXT_OVERHEAD_TOKENS') ?? DEFAULT_CONTEXT_OVERHEAD_TOKENS,
    ),
    metadataTtlSeconds: positive(
      'metadataTtlSeconds',
      parseEnvInt('METADATA_TTL_SECONDS') ?? DEFAULT_METADATA_TTL,
    ),
    maxToolResultChars: positive(
      'maxToolResultChars',
      parseEnvInt('MAX_TOOL_RESULT_CHARS') ?? DEFAULT_MAX_TOOL_RESULT_CHARS,
    ),
    maxTotalToolChars: positive(
      'maxTotalToolChars',
      parseEnvInt('MAX_TOTAL_TOOL_CHARS') ?? DEFAULT_MAX_TOTAL_TOOL_CHARS,
    ),
    maxToolCalls: positive('maxToolCalls', parseEnvInt('MAX_TOOL_CALLS') ?? DEFAULT_MAX_TOOL_CALLS),
    maxInputChars: positive(
      'maxInputChars',
      parseEnvInt('MAX_INPUT_CHARS') ?? DEFAULT_MAX_INPUT_CHARS,
    ),
    maxDirEntries: positive(
      'maxDirEntries',
      parseEnvInt('MAX_DIR_ENTRIES') ?? DEFAULT_MAX_DIR_ENTRIES,
    ),
    maxSearchResults: positive(
      'maxSearchResults',
      parseEnvInt('MAX_SEARCH_RESULTS') ?? DEFAULT_MAX_SEARCH_RESULTS,
    ),
    apiKey: nonEmptyEnv('OPENROUTER_API_KEY'),
    baseUrl: nonEmptyEnv('OPENROUTER_BASE_URL') ?? DEFAULT_BASE_URL,
    httpReferer: nonEmptyEnv('OPENROUTER_HTTP_REFERER'),
    appTitle: nonEmptyEnv('OPENROUTER_X_TITLE'),
    useIndex: args.index ?? true,
    jsonOutput,
    verbose,
    logLevel: resolveLogLevel(verbose),
  };
}

/**
 * The OpenRouter API key, required before any model call.
 */
export function requireApiKey(config: CliConfig): string {
  if (!config.apiKey) {
    throw new ConfigError('OPENROUTER_API_KEY is not set. Export it before running a review.');
  }
  return config.apiKey;
}

/**
 * Map resolved settings onto the coordinator's seconds-to-milliseconds view.
 */
export function toCoordinatorConfig(config: EngineConfig): CoordinatorConfig {
  return {
    primaryModel: config.primaryModel,
    secondaryModel: config.secondaryModel,
    synthesisModel: config.synthesisModel,
    synthesisTimeoutMs: config.synthesisTimeoutSeconds * 1000,
    reviewer: {
      timeoutMs: config.reviewerTimeoutSeconds * 1000,
      fixedOutputTokens: config.fixedOutputTokens,
      contextOverheadTokens: config.contextOverheadTokens,
      maxInputChars: config.maxInputChars,
      toolLimits: {
        maxToolCalls: config.maxToolCalls,
        toolCallTimeoutMs: config.toolCallTimeoutSeconds * 1000,
        maxToolResultChars: config.maxToolResultChars,
        maxTotalToolChars: config.maxTotalToolChars,
      },
    },
  };
}

function resolveLogLevel(verbose: boolean): LogLevel {
  if (verbose) return 'debug';
  const raw = process.env[`${ENV_PREFIX}LOG_LEVEL`];
  if (raw == null || raw.trim() === '') return 'warn';
  const level = parseLogLevel(raw);
  if (!level) throw new ConfigError(`${ENV_PREFIX}LOG_LEVEL has unknown level "${raw}"`);
  return level;
}

function resolveModel(arg: string | undefined, envKey: string): string | undefined {
  const raw = arg ?? process.env[`${ENV_PREFIX}${envKey}`];
  if (raw == null) return undefined;
  const trimmed = raw.trim();
  if (trimmed === '') throw new ConfigError(`${ENV_PREFIX}${envKey} must not be empty`);
  return trimmed;
}

function nonEmptyEnv(key: string): string | undefined {
  const val = process.env[key]?.trim();
  return val ? val : undefined;
}

function parseEnvInt(key: string): number | undefined {
  const name = `${ENV_PREFIX}${key}`;
  const val = process.env[name];
  if (val == null || val.trim() === '') return undefined;
  const num = Number(val.trim());
  if (!Number.isInteger(num)) {
    throw new ConfigError(`${name} must be an integer, got "${val}"`);
  }
  return num;
}

function positive(name: string, value: number): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got ${value}`);
  }
  return value;
}

function nonNegative(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigError(`${name} must be a non-negative integer, got ${value}`);
  }
  return value;
}
