import axios, { type AxiosInstance } from 'axios';
import type {
  ChatMessage,
  CompletionRequest,
  CompletionResponse,
  ModelInfo,
  ToolCallRequest,
  ToolChoice,
  ToolDefinition,
} from '../types.js';
import { DEFAULT_BASE_URL } from '../types.js';
import { ReviewError, errorMessage } from '../errors.js';
import { abortReason } from '../shared/deadline.js';
import type { ModelApi } from './modelApi.js';
import {
  chatCompletionSchema,
  errorBodySchema,
  modelEntrySchema,
  modelsPayloadSchema,
  type ModelEntry,
} from './schemas.js';

export interface OpenRouterClientOptions {
  readonly apiKey: string;
  readonly baseUrl?: string;
  /** Sent as `HTTP-Referer` for OpenRouter app attribution */
  readonly httpReferer?: string;
  /** Sent as `X-Title` for OpenRouter app attribution */
  readonly appTitle?: string;
  /** Timeout for the models listing request */
  readonly listTimeoutMs?: number;
  /** Pre-built HTTP instance (tests) */
  readonly http?: AxiosInstance;
}

/**
 * ModelApi over OpenRouter's OpenAI-compatible HTTP API.
 * Every failure surfaces as a `transport_error` ReviewError; nothing is retried here.
 */
export class OpenRouterClient implements ModelApi {
  private readonly http: AxiosInstance;
  private readonly listTimeoutMs: number;

  constructor(options: OpenRouterClientOptions) {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${options.apiKey}`,
      Accept: 'application/json',
    };
    if (options.httpReferer) headers['HTTP-Referer'] = options.httpReferer;
    if (options.appTitle) headers['X-Title'] = options.appTitle;

    this.http =
      options.http ?? axios.create({ baseURL: options.baseUrl ?? DEFAULT_BASE_URL, headers });
    this.listTimeoutMs = options.listTimeoutMs ?? 30_000;
  }

  async listModels(signal?: AbortSignal): Promise<readonly ModelInfo[]> {
    let payload: unknown;
    try {
      const response = await this.http.get<unknown>('/models', {
        timeout: this.listTimeoutMs,
        signal,
      });
      payload = response.data;
    } catch (err) {
      throw toTransportError('models listing', err, signal);
    }

    const envelope = modelsPayloadSchema.safeParse(payload);
    if (!envelope.success) {
      throw new ReviewError('transport_error', 'Invalid models payload: missing data list');
    }

    const models: ModelInfo[] = [];
    for (const raw of envelope.data.data) {
      const entry = modelEntrySchema.safeParse(raw);
      if (entry.success) models.push(toModelInfo(entry.data));
    }
    return models;
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const body: Record<string, unknown> = {
      model: request.model,
      messages: request.messages.map(toWireMessage),
      max_tokens: request.maxTokens,
    };
    if (request.tools && request.tools.length > 0) {
      body['tools'] = request.tools.map(toWireTool);
      body['tool_choice'] = toWireToolChoice(request.toolChoice ?? 'auto');
    }

    let data: unknown;
    try {
      const response = await this.http.post<unknown>('/chat/completions', body, {
        signal: request.signal,
        headers: { 'Content-Type': 'application/json' },
      });
      data = response.data;
    } catch (err) {
      throw toTransportError(`completion for ${request.model}`, err, request.signal);
    }

    const providerError = errorBodySchema.safeParse(data);
    if (providerError.success) {
      const e = providerError.data.error;
      const detail = typeof e === 'string' ? e : (e.message ?? 'unknown error');
      throw new ReviewError('transport_error', `OpenRouter error for ${request.model}: ${detail}`);
    }

    const parsed = chatCompletionSchema.safeParse(data);
    if (!parsed.success) {
      throw new ReviewError(
        'transport_error',
        `Unexpected completion payload for ${request.model}: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
      );
    }

    const message = parsed.data.choices[0]!.message;
    const toolCalls: ToolCallRequest[] = (message.tool_calls ?? []).map((tc, i) => ({
      id: tc.id ?? `call_${i}`,
      name: tc.function.name,
      arguments: tc.function.arguments,
    }));

    if (toolCalls.length > 0) {
      return { type: 'tool_calls', content: message.content ?? null, toolCalls };
    }
    return { type: 'final', content: message.content ?? '' };
  }
}

/** Map a validated listing entry to capability facts */
export function toModelInfo(entry: ModelEntry): ModelInfo {
  const providerContext = entry.top_provider?.context_length;
  const contextWindowTokens =
    providerContext != null ? Math.min(entry.context_length, providerContext) : entry.context_length;

  return {
    id: entry.id,
    contextWindowTokens,
    maxCompletionTokens: entry.top_provider?.max_completion_tokens,
    // Missing or empty supported_parameters means no tool calling
    supportsToolCalling: entry.supported_parameters.includes('tools'),
    supportsToolChoice: entry.supported_parameters.includes('tool_choice'),
  };
}

function toWireMessage(message: ChatMessage): Record<string, unknown> {
  switch (message.role) {
    case 'system':
    case 'user':
      return { role: message.role, content: message.content };
    case 'assistant':
      return {
        role: 'assistant',
        content: message.content,
        ...(message.toolCalls && message.toolCalls.length > 0
          ? {
              tool_calls: message.toolCalls.map((tc) => ({
                id: tc.id,
                type: 'function',
                function: { name: tc.name, arguments: tc.arguments },
              })),
            }
          : {}),
      };
    case 'tool':
      return {
        role: 'tool',
        tool_call_id: message.toolCallId,
        name: message.name,
        content: message.content,
      };
  }
}

function toWireTool(tool: ToolDefinition): Record<string, unknown> {
  return {
    type: 'function',
    function: { name: tool.name, description: tool.description, parameters: tool.parameters },
  };
}

function toWireToolChoice(choice: ToolChoice): unknown {
  if (choice === 'auto') return 'auto';
  return { type: 'function', function: { name: choice.name } };
}

function toTransportError(what: string, err: unknown, signal: AbortSignal | undefined): Error {
  // Deadline expiry is reported as-is so the invocation classifies it as a timeout
  if (signal?.aborted) return abortReason(signal);

  if (axios.isAxiosError(err)) {
    const status = err.response?.status;
    const body = errorBodySchema.safeParse(err.response?.data);
    let detail = err.message;
    if (body.success) {
      const e = body.data.error;
      detail = typeof e === 'string' ? e : (e.message ?? detail);
    }
    const prefix = status != null ? `HTTP ${status}` : 'network error';
    return new ReviewError('transport_error', `OpenRouter ${what} failed (${prefix}): ${detail}`, {
      cause: err,
    });
  }
  return new ReviewError('transport_error', `OpenRouter ${what} failed: ${errorMessage(err)}`, {
    cause: err,
  });
}
