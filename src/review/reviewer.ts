import type {
  ChatMessage,
  ModelMetadata,
  ReviewFailure,
  ReviewRequest,
  ReviewerOutcome,
  ReviewerRole,
} from '../types.js';
import { DISABLED_MODEL_SENTINELS } from '../types.js';
import { ReviewError, errorMessage } from '../errors.js';
import type { ModelApi } from '../models/modelApi.js';
import type { ModelCapabilityCache } from '../models/capabilityCache.js';
import { computeBudget, isBudgetExhausted } from '../models/budget.js';
import type { ProjectIndex } from '../project/projectIndex.js';
import type { AdmissionGate } from '../shared/admissionGate.js';
import { Deadline, abortReason } from '../shared/deadline.js';
import { silentLogger, type Logger } from '../shared/logger.js';
import { buildReviewPrompt } from './prompt.js';
import { ToolCallBridge, type ToolBridgeLimits } from './toolBridge.js';

/** Per-invocation limits shared by both reviewers */
export interface ReviewerSettings {
  readonly timeoutMs: number;
  readonly fixedOutputTokens: number;
  readonly contextOverheadTokens: number;
  /** Absolute ceiling on prompt characters */
  readonly maxInputChars: number;
  readonly charsPerToken?: number;
  readonly toolLimits: ToolBridgeLimits;
}

/** Collaborators injected into every invocation; cache and gate are process-wide */
export interface ReviewerDeps {
  readonly api: ModelApi;
  readonly cache: ModelCapabilityCache;
  readonly gate: AdmissionGate;
  /** Project index offered to tool-capable models; omit to review without tools */
  readonly index?: ProjectIndex;
  readonly settings: ReviewerSettings;
  readonly logger?: Logger;
}

/** True when the model id switches the reviewer off */
export function isDisabledModel(modelId: string): boolean {
  return DISABLED_MODEL_SENTINELS.includes(modelId.trim().toLowerCase());
}

/**
 * Run one reviewer to a terminal outcome. Never rejects.
 *
 * The whole invocation (metadata lookup, gate waits, model turns and tool calls) shares one
 * deadline. On expiry the outcome is `timed_out` and keeps the tool calls made so far.
 */
export async function runReviewer(
  role: ReviewerRole,
  modelId: string,
  request: ReviewRequest,
  deps: ReviewerDeps,
): Promise<ReviewerOutcome> {
  if (isDisabledModel(modelId)) {
    return { role, modelId, status: 'disabled', toolCalls: [], durationMs: 0 };
  }

  const logger = deps.logger ?? silentLogger;
  const label = `${role}:${modelId}`;
  const deadline = new Deadline(deps.settings.timeoutMs, `${role} reviewer (${modelId})`);
  let bridge: ToolCallBridge | undefined;
  let toolsDisabledReason: string | undefined;

  try {
    const metadata = await deps.cache.resolve(modelId, deadline.signal);
    toolsDisabledReason = describeToolsDisabled(metadata, deps.index);
    if (deps.index && toolsDisabledReason === undefined) {
      bridge = new ToolCallBridge(deps.index, deps.settings.toolLimits, {
        supportsToolChoice: metadata.supportsToolChoice,
        label,
        logger,
      });
    }

    const finalText = await converse(modelId, metadata, request, deps, bridge, deadline.signal, logger);
    bridge?.complete();

    return {
      role,
      modelId,
      status: 'succeeded',
      finalText,
      toolCalls: bridge?.toolCalls ?? [],
      durationMs: deadline.elapsedMs,
      toolsDisabledReason,
    };
  } catch (err) {
    let status: 'timed_out' | 'failed';
    let error: ReviewFailure;
    if (deadline.expired) {
      bridge?.markTimedOut();
      status = 'timed_out';
      error = { kind: 'timed_out', message: errorMessage(abortReason(deadline.signal)) };
    } else {
      bridge?.markFailed();
      status = 'failed';
      error =
        err instanceof ReviewError
          ? err.toFailure()
          : { kind: 'transport_error', message: errorMessage(err) };
    }
    logger.debug(`[${label}] ${status}: ${error.kind}`);

    return {
      role,
      modelId,
      status,
      toolCalls: bridge?.toolCalls ?? [],
      error,
      durationMs: deadline.elapsedMs,
      toolsDisabledReason,
    };
  } finally {
    deadline.dispose();
  }
}

function describeToolsDisabled(
  metadata: ModelMetadata,
  index: ProjectIndex | undefined,
): string | undefined {
  if (!metadata.supportsToolCalling) return 'model does not support tool calling';
  if (!index) return 'no project index available';
  return undefined;
}

/**
 * Drive the model to a final answer: a single call without tools, or the bounded tool loop.
 */
async function converse(
  modelId: string,
  metadata: ModelMetadata,
  request: ReviewRequest,
  deps: ReviewerDeps,
  bridge: ToolCallBridge | undefined,
  signal: AbortSignal,
  logger: Logger,
): Promise<string> {
  const { settings } = deps;
  const budget = computeBudget(metadata, settings.fixedOutputTokens, settings.contextOverheadTokens, {
    charsPerToken: settings.charsPerToken,
    maxInputChars: settings.maxInputChars,
  });
  if (isBudgetExhausted(budget)) {
    throw new ReviewError(
      'budget_exhausted',
      `Model ${modelId} has no room for input: ${metadata.contextWindowTokens}-token context window, ` +
        `${budget.reservedOutputTokens} reserved for output and ${budget.reservedOverheadTokens} for overhead`,
    );
  }

  const prompt = buildReviewPrompt(request, {
    toolsEnabled: bridge !== undefined,
    maxInputChars: budget.maxInputChars,
  });
  logger.debug(
    `[${modelId}] prompt ${prompt.system.length + prompt.user.length}/${budget.maxInputChars} chars, ` +
      `${prompt.embedded.length} file(s) embedded, ${prompt.omitted.length} omitted`,
  );

  const messages: ChatMessage[] = [
    { role: 'system', content: prompt.system },
    { role: 'user', content: prompt.user },
  ];

  for (;;) {
    const notice = bridge?.takeFinalizeNotice();
    if (notice) messages.push(notice);

    const tools = bridge?.tools();
    const toolChoice = bridge?.nextToolChoice();
    const response = await deps.gate.run(
      () =>
        deps.api.complete({
          model: modelId,
          messages: [...messages],
          tools,
          toolChoice,
          maxTokens: budget.reservedOutputTokens,
          signal,
        }),
      signal,
    );

    if (response.type === 'final') return response.content;

    if (!bridge) {
      // Tools were never offered; keep whatever text came with the request
      return response.content ?? '';
    }

    if (bridge.finalizeDue && response.content?.trim()) {
      logger.warn(`[${modelId}] still requesting tools after the limit; using the text sent with the request`);
      return response.content;
    }

    messages.push({ role: 'assistant', content: response.content, toolCalls: response.toolCalls });
    messages.push(...(await bridge.handle(response.toolCalls, signal)));
  }
}
