import type {
  ChatMessage,
  ToolCall,
  ToolCallRequest,
  ToolChoice,
  ToolDefinition,
} from '../types.js';
import {
  DEFAULT_MAX_TOOL_CALLS,
  DEFAULT_MAX_TOOL_RESULT_CHARS,
  DEFAULT_MAX_TOTAL_TOOL_CHARS,
  DEFAULT_TOOL_CALL_TIMEOUT,
} from '../types.js';
import { ReviewError, errorMessage } from '../errors.js';
import type { ProjectIndex } from '../project/projectIndex.js';
import {
  ACTIVATION_TOOL,
  OVERVIEW_TOOL,
  TOOL_DEFINITIONS,
  executeTool,
  isToolName,
  parseToolArguments,
} from '../project/tools.js';
import { TIMED_OUT, abortReason, formatSeconds, withTimeout } from '../shared/deadline.js';
import { silentLogger, type Logger } from '../shared/logger.js';
import { redactText } from '../shared/redaction.js';
import { buildFinalizeMessage } from './prompt.js';

/** Bridge lifecycle; the last three are terminal */
export type BridgeState =
  | 'awaiting_preflight'
  | 'active'
  | 'exhausted'
  | 'completed'
  | 'timed_out'
  | 'failed';

export interface ToolBridgeLimits {
  /** Ceiling on tool-call requests handled per invocation */
  readonly maxToolCalls: number;
  readonly toolCallTimeoutMs: number;
  /** Per-result character ceiling */
  readonly maxToolResultChars: number;
  /** Cumulative result character ceiling across the invocation */
  readonly maxTotalToolChars: number;
}

export const DEFAULT_TOOL_BRIDGE_LIMITS: ToolBridgeLimits = {
  maxToolCalls: DEFAULT_MAX_TOOL_CALLS,
  toolCallTimeoutMs: DEFAULT_TOOL_CALL_TIMEOUT * 1000,
  maxToolResultChars: DEFAULT_MAX_TOOL_RESULT_CHARS,
  maxTotalToolChars: DEFAULT_MAX_TOTAL_TOOL_CHARS,
};

export const TRUNCATION_MARKER = '\n[TRUNCATED: tool result exceeded the size limit]';

export const BUDGET_EXHAUSTED_MARKER =
  '[BUDGET EXHAUSTED: the cumulative tool output limit has been reached. Answer with what you already have.]';

export const PREFLIGHT_REQUIRED_MESSAGE = `Tool not executed: call \`${ACTIVATION_TOOL}\` with project="." before any other tool.`;

export const CEILING_REACHED_MESSAGE =
  'Tool not executed: the tool call limit has been reached. Provide your final review now without further tool calls.';

/** Rounds of refused tool requests answered after exhaustion before the bridge stops answering */
export const MAX_REFUSED_ROUNDS = 2;

export interface ToolBridgeOptions {
  /** Whether the model honours a forced `tool_choice` */
  readonly supportsToolChoice: boolean;
  /** Prefix for log lines, e.g. `primary:model-id` */
  readonly label?: string;
  readonly logger?: Logger;
}

/**
 * Bounded, read-only tool-call loop for one reviewer invocation.
 *
 * awaiting_preflight → active → exhausted, with completed / timed_out / failed as terminal states.
 * Every transition is driven by a model response; requests are handled one at a time, so
 * activation always precedes any other executed call.
 */
export class ToolCallBridge {
  private current: BridgeState = 'awaiting_preflight';
  private readonly calls: ToolCall[] = [];
  private requestCount = 0;
  private consumedChars = 0;
  private overviewForced = false;
  private refusedRounds = 0;
  private finalizePending = false;
  private readonly limits: ToolBridgeLimits;
  private readonly label: string;
  private readonly logger: Logger;

  constructor(
    private readonly index: ProjectIndex,
    limits: Partial<ToolBridgeLimits>,
    private readonly options: ToolBridgeOptions,
  ) {
    this.limits = { ...DEFAULT_TOOL_BRIDGE_LIMITS, ...limits };
    this.label = options.label ?? 'reviewer';
    this.logger = options.logger ?? silentLogger;
  }

  get state(): BridgeState {
    return this.current;
  }

  /** Ordered history of executed (or budget-refused) calls, copied at the time of access */
  get toolCalls(): readonly ToolCall[] {
    return [...this.calls];
  }

  /** Tool-call requests seen so far, including refused ones */
  get requestsHandled(): number {
    return this.requestCount;
  }

  /** Result characters counted against the cumulative ceiling */
  get totalResultChars(): number {
    return this.consumedChars;
  }

  /**
   * True once every refused round after exhaustion is spent.
   * The next tool request should end the invocation with whatever text the model sent alongside it.
   */
  get finalizeDue(): boolean {
    return this.current === 'exhausted' && this.refusedRounds >= MAX_REFUSED_ROUNDS;
  }

  get isTerminal(): boolean {
    return this.current === 'completed' || this.current === 'timed_out' || this.current === 'failed';
  }

  /** Tool surface for the next model request; withdrawn once exhausted */
  tools(): readonly ToolDefinition[] | undefined {
    return this.current === 'awaiting_preflight' || this.current === 'active'
      ? TOOL_DEFINITIONS
      : undefined;
  }

  /**
   * Tool choice for the next model request.
   * Forces activation first and the project overview once, when the model supports forcing.
   */
  nextToolChoice(): ToolChoice | undefined {
    if (this.tools() === undefined) return undefined;
    if (!this.options.supportsToolChoice) return 'auto';
    if (this.current === 'awaiting_preflight') return { name: ACTIVATION_TOOL };
    if (!this.overviewForced) {
      this.overviewForced = true;
      return { name: OVERVIEW_TOOL };
    }
    return 'auto';
  }

  /**
   * Instruction to append once after the bridge becomes exhausted.
   * Returns undefined on every later call.
   */
  takeFinalizeNotice(): ChatMessage | undefined {
    if (!this.finalizePending) return undefined;
    this.finalizePending = false;
    return { role: 'system', content: buildFinalizeMessage() };
  }

  /**
   * Handle one model turn's tool requests, sequentially.
   * Returns one tool message per request, in request order.
   * Rejects with the signal's reason if it aborts, and with `tool_call_ceiling_reached`
   * when called again after `finalizeDue`.
   */
  async handle(requests: readonly ToolCallRequest[], signal?: AbortSignal): Promise<ChatMessage[]> {
    if (this.isTerminal) {
      throw new Error(`Tool bridge is ${this.current}; no further tool calls can be handled`);
    }

    if (this.current === 'exhausted') {
      this.refusedRounds++;
      if (this.refusedRounds > MAX_REFUSED_ROUNDS) {
        this.current = 'failed';
        throw new ReviewError(
          'tool_call_ceiling_reached',
          `Model kept requesting tools after the ${this.limits.maxToolCalls}-call limit without a final answer`,
        );
      }
      this.logger.warn(`[${this.label}] refusing ${requests.length} tool call(s) after limit`);
      return requests.map((r) => toolMessage(r, CEILING_REACHED_MESSAGE));
    }

    const messages: ChatMessage[] = [];
    for (const request of requests) {
      if (this.current === 'exhausted') {
        messages.push(toolMessage(request, CEILING_REACHED_MESSAGE));
        continue;
      }

      this.requestCount++;

      if (this.current === 'awaiting_preflight' && request.name !== ACTIVATION_TOOL) {
        this.logger.debug(`[${this.label}] rejected ${request.name} before activation`);
        messages.push(toolMessage(request, PREFLIGHT_REQUIRED_MESSAGE));
      } else {
        messages.push(toolMessage(request, await this.dispatch(request, signal)));
      }

      if (this.requestCount >= this.limits.maxToolCalls) {
        this.current = 'exhausted';
        this.finalizePending = true;
        this.logger.info(
          `[${this.label}] tool call limit (${this.limits.maxToolCalls}) reached; asking for final answer`,
        );
      }
    }
    return messages;
  }

  /** The model produced a final answer */
  complete(): void {
    if (!this.isTerminal) this.current = 'completed';
  }

  markTimedOut(): void {
    if (!this.isTerminal) this.current = 'timed_out';
  }

  markFailed(): void {
    if (!this.isTerminal) this.current = 'failed';
  }

  private async dispatch(request: ToolCallRequest, signal: AbortSignal | undefined): Promise<string> {
    const started = Date.now();
    const parsed = parseToolArguments(request.arguments);

    const record = (result: string, truncated: boolean): string => {
      this.calls.push({
        name: request.name,
        arguments: parsed.args,
        result,
        truncated,
        elapsedMs: Date.now() - started,
      });
      this.logger.debug(
        `[${this.label}] tool ${request.name} → ${result.length} chars${truncated ? ' (truncated)' : ''}`,
      );
      return result;
    };

    if (this.consumedChars >= this.limits.maxTotalToolChars) {
      return record(BUDGET_EXHAUSTED_MARKER, true);
    }

    let raw: string;
    let activated = false;
    if (!isToolName(request.name)) {
      raw = errorJson(`Unknown tool: ${request.name}`);
    } else if (!parsed.ok) {
      raw = errorJson(parsed.error);
    } else {
      try {
        const outcome = await withTimeout(
          executeTool(this.index, request.name, parsed.args),
          this.limits.toolCallTimeoutMs,
          signal,
        );
        if (outcome === TIMED_OUT) {
          raw = errorJson(`tool call timed out after ${formatSeconds(this.limits.toolCallTimeoutMs)}`);
        } else {
          raw = redactText(JSON.stringify(outcome, null, 2) ?? 'null');
          activated = request.name === ACTIVATION_TOOL;
        }
      } catch (err) {
        if (signal?.aborted) throw abortReason(signal);
        raw = errorJson(errorMessage(err));
      }
    }

    if (activated && this.current === 'awaiting_preflight') {
      this.current = 'active';
      this.logger.debug(`[${this.label}] project activated`);
    }

    const { text, truncated } = this.fit(raw);
    return record(text, truncated);
  }

  /** Apply the per-call and cumulative ceilings, counting what is kept */
  private fit(raw: string): { text: string; truncated: boolean } {
    const remaining = this.limits.maxTotalToolChars - this.consumedChars;
    const cap = Math.min(this.limits.maxToolResultChars, remaining);
    if (raw.length <= cap) {
      this.consumedChars += raw.length;
      return { text: raw, truncated: false };
    }
    this.consumedChars += cap;
    return { text: raw.slice(0, cap) + TRUNCATION_MARKER, truncated: true };
  }
}

function toolMessage(request: ToolCallRequest, content: string): ChatMessage {
  return { role: 'tool', toolCallId: request.id, name: request.name, content };
}

function errorJson(message: string): string {
  return JSON.stringify({ error: message });
}
