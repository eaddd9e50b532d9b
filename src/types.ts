import type { LogLevel } from './shared/logger.js';

/** Kind of review requested */
export type ReviewKind = 'design' | 'code';

/** Which of the two reviewer slots an invocation fills */
export type ReviewerRole = 'primary' | 'secondary';

/** Terminal status of a single reviewer invocation */
export type ReviewerStatus = 'succeeded' | 'timed_out' | 'failed' | 'disabled';

/** Failure classification carried into outcomes and the aggregate */
export type ErrorKind =
  | 'metadata_unavailable'
  | 'budget_exhausted'
  | 'transport_error'
  | 'timed_out'
  | 'tool_call_ceiling_reached'
  | 'no_input_for_synthesis';

/** Failure reason attached to an outcome */
export interface ReviewFailure {
  readonly kind: ErrorKind;
  readonly message: string;
}

// ─── Model Capabilities ───────────────────────────────────

/** Capability facts reported by the model-serving API for one model */
export interface ModelInfo {
  readonly id: string;
  /** Effective context window (smallest of model and top provider limits) */
  readonly contextWindowTokens: number;
  readonly maxCompletionTokens?: number;
  readonly supportsToolCalling: boolean;
  readonly supportsToolChoice: boolean;
}

/** ModelInfo stamped with the time it was fetched (epoch ms) */
export interface ModelMetadata extends ModelInfo {
  readonly fetchedAt: number;
}

/** Prompt sizing for one reviewer on one request */
export interface Budget {
  readonly availableInputTokens: number;
  readonly maxInputChars: number;
  readonly reservedOutputTokens: number;
  readonly reservedOverheadTokens: number;
}

// ─── Chat Protocol ────────────────────────────────────────

/** A tool call as requested by the model */
export interface ToolCallRequest {
  readonly id: string;
  readonly name: string;
  /** Raw JSON arguments string as sent by the model */
  readonly arguments: string;
}

export type ChatMessage =
  | { readonly role: 'system'; readonly content: string }
  | { readonly role: 'user'; readonly content: string }
  | {
      readonly role: 'assistant';
      readonly content: string | null;
      readonly toolCalls?: readonly ToolCallRequest[];
    }
  | {
      readonly role: 'tool';
      readonly toolCallId: string;
      readonly name: string;
      readonly content: string;
    };

/** JSON-schema function definition presented to the model */
export interface ToolDefinition {
  readonly name: string;
  readonly description: string;
  readonly parameters: Readonly<Record<string, unknown>>;
}

/** `auto` lets the model choose; a name forces that function */
export type ToolChoice = 'auto' | { readonly name: string };

export interface CompletionRequest {
  readonly model: string;
  readonly messages: readonly ChatMessage[];
  readonly tools?: readonly ToolDefinition[];
  readonly toolChoice?: ToolChoice;
  readonly maxTokens: number;
  readonly signal?: AbortSignal;
}

export type CompletionResponse =
  | { readonly type: 'final'; readonly content: string }
  | {
      readonly type: 'tool_calls';
      readonly content: string | null;
      readonly toolCalls: readonly ToolCallRequest[];
    };

// ─── Review Request & Results ─────────────────────────────

/** A file already read from disk for embedding into the prompt */
export interface EmbeddedFile {
  readonly path: string;
  readonly content: string;
}

/** A requested file that was not embedded, with the reason */
export interface SkippedFile {
  readonly path: string;
  readonly reason: string;
}

/** Validated, immutable input to the review engine */
export interface ReviewRequest {
  readonly kind: ReviewKind;
  readonly inlineText?: string;
  readonly embeddedFiles: readonly EmbeddedFile[];
  readonly skippedFiles: readonly SkippedFile[];
  readonly constraints?: string;
  readonly context?: string;
}

/** One executed (or budget-refused) tool call */
export interface ToolCall {
  readonly name: string;
  readonly arguments: Readonly<Record<string, unknown>>;
  readonly result: string;
  readonly truncated: boolean;
  readonly elapsedMs: number;
}

/** Result of one reviewer invocation */
export interface ReviewerOutcome {
  readonly role: ReviewerRole;
  readonly modelId: string;
  readonly status: ReviewerStatus;
  readonly finalText?: string;
  readonly toolCalls: readonly ToolCall[];
  readonly error?: ReviewFailure;
  readonly durationMs: number;
  /** Why the tool surface was not offered, when it was not */
  readonly toolsDisabledReason?: string;
}

/** Combined output of both reviewers and the synthesized summary */
export interface AggregateResult {
  readonly kind: ReviewKind;
  readonly primary: ReviewerOutcome;
  readonly secondary?: ReviewerOutcome;
  readonly summary?: string;
  readonly summaryError?: ReviewFailure;
  readonly durationMs: number;
}

// ─── Configuration ────────────────────────────────────────

/** Engine configuration after resolving args > env > defaults */
export interface EngineConfig {
  readonly primaryModel: string;
  readonly secondaryModel: string;
  readonly synthesisModel: string;
  readonly maxConcurrentRequests: number;
  readonly reviewerTimeoutSeconds: number;
  readonly synthesisTimeoutSeconds: number;
  readonly toolCallTimeoutSeconds: number;
  readonly fixedOutputTokens: number;
  readonly contextOverheadTokens: number;
  readonly metadataTtlSeconds: number;
  readonly maxToolResultChars: number;
  readonly maxTotalToolChars: number;
  readonly maxToolCalls: number;
  readonly maxInputChars: number;
  readonly maxDirEntries: number;
  readonly maxSearchResults: number;
}

/** Full CLI configuration */
export interface CliConfig extends EngineConfig {
  readonly apiKey?: string;
  readonly baseUrl: string;
  readonly httpReferer?: string;
  readonly appTitle?: string;
  readonly useIndex: boolean;
  readonly jsonOutput: boolean;
  readonly verbose: boolean;
  readonly logLevel: LogLevel;
}

/** Model ids that switch a reviewer off */
export const DISABLED_MODEL_SENTINELS: readonly string[] = ['0', 'disabled'];

export const DEFAULT_PRIMARY_MODEL = 'moonshotai/kimi-k2.5';

export const DEFAULT_SECONDARY_MODEL = 'z-ai/glm-5';

export const DEFAULT_BASE_URL = 'https://openrouter.ai/api/v1';

/** Default global ceiling on in-flight model requests */
export const DEFAULT_MAX_CONCURRENT_REQUESTS = 4;

/** Default per-reviewer wall-clock timeout in seconds (5 minutes) */
export const DEFAULT_REVIEWER_TIMEOUT = 300;

export const DEFAULT_SYNTHESIS_TIMEOUT = 120;

export const DEFAULT_TOOL_CALL_TIMEOUT = 30;

export const DEFAULT_FIXED_OUTPUT_TOKENS = 8192;

export const DEFAULT_CONTEXT_OVERHEAD_TOKENS = 2000;

/** Default capability metadata TTL in seconds (1 hour) */
export const DEFAULT_METADATA_TTL = 3600;

export const DEFAULT_MAX_TOOL_RESULT_CHARS = 12_000;

export const DEFAULT_MAX_TOTAL_TOOL_CHARS = 50_000;

export const DEFAULT_MAX_TOOL_CALLS = 32;

export const DEFAULT_MAX_INPUT_CHARS = 100_000;

export const DEFAULT_MAX_DIR_ENTRIES = 100;

export const DEFAULT_MAX_SEARCH_RESULTS = 20;

/** Conservative characters-per-token estimate for mixed tokenizers */
export const DEFAULT_CHARS_PER_TOKEN = 3;
