import { describe, it, expect } from 'vitest';
import axios, {
  AxiosError,
  type AxiosAdapter,
  type InternalAxiosRequestConfig,
} from 'axios';
import { OpenRouterClient } from '../src/models/openRouterClient.js';
import { ReviewError } from '../src/errors.js';
import type { CompletionRequest } from '../src/types.js';

type Handler = (config: InternalAxiosRequestConfig) => unknown;

/** Axios instance whose adapter answers in process */
function fakeHttp(handler: Handler) {
  const requests: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (config) => {
    requests.push(config);
    if (config.signal?.aborted) throw new AxiosError('canceled', 'ERR_CANCELED', config);
    const data = handler(config);
    return { data, status: 200, statusText: 'OK', headers: {}, config };
  };
  const http = axios.create({ baseURL: 'https://models.example.test/api/v1', adapter });
  return { http, requests };
}

function client(handler: Handler) {
  const { http, requests } = fakeHttp(handler);
  return { api: new OpenRouterClient({ apiKey: 'test-secret', http }), requests };
}

function sentBody(config: InternalAxiosRequestConfig | undefined): unknown {
  return JSON.parse(String(config?.data));
}

const BASE_REQUEST: CompletionRequest = {
  model: 'vendor/model',
  messages: [{ role: 'user', content: 'Review this.' }],
  maxTokens: 100,
};

describe('OpenRouterClient.listModels', () => {
  it('maps valid entries and drops malformed ones', async () => {
    const { api, requests } = client(() => ({
      data: [
        {
          id: 'vendor/tools',
          context_length: 200_000,
          supported_parameters: ['tools', 'tool_choice', 'temperature'],
          top_provider: { context_length: 128_000, max_completion_tokens: 16_384 },
        },
        { id: 'vendor/plain', context_length: 32_000, supported_parameters: null, top_provider: null },
        { id: '', context_length: 1000 },
        { id: 'vendor/broken', context_length: 'big' },
      ],
    }));

    const models = await api.listModels();

    expect(requests[0]?.url).toBe('/models');
    expect(requests[0]?.method).toBe('get');
    expect(models).toEqual([
      {
        id: 'vendor/tools',
        contextWindowTokens: 128_000,
        maxCompletionTokens: 16_384,
        supportsToolCalling: true,
        supportsToolChoice: true,
      },
      {
        id: 'vendor/plain',
        contextWindowTokens: 32_000,
        maxCompletionTokens: undefined,
        supportsToolCalling: false,
        supportsToolChoice: false,
      },
    ]);
  });

  it('rejects a payload without a data list', async () => {
    const { api } = client(() => ({ models: [] }));
    await expect(api.listModels()).rejects.toThrow('Invalid models payload: missing data list');
  });

  it('reports network failures as transport errors', async () => {
    const { api } = client((config) => {
      throw new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED', config);
    });

    const failure = api.listModels();
    await expect(failure).rejects.toBeInstanceOf(ReviewError);
    await expect(failure).rejects.toMatchObject({
      kind: 'transport_error',
      message: 'OpenRouter models listing failed (network error): connect ECONNREFUSED',
    });
  });

  it('surfaces the abort reason when the caller cancels', async () => {
    const { api } = client(() => ({ data: [] }));
    const controller = new AbortController();
    controller.abort(new ReviewError('timed_out', 'secondary reviewer (m) timed out after 1s'));

    await expect(api.listModels(controller.signal)).rejects.toThrow(
      'secondary reviewer (m) timed out after 1s',
    );
  });
});

describe('OpenRouterClient.complete', () => {
  it('returns a final answer', async () => {
    const { api, requests } = client(() => ({
      choices: [{ message: { content: '## Summary\nFine.' }, finish_reason: 'stop' }],
    }));

    await expect(api.complete(BASE_REQUEST)).resolves.toEqual({ type: 'final', content: '## Summary\nFine.' });
    expect(requests[0]?.url).toBe('/chat/completions');
    expect(sentBody(requests[0])).toEqual({
      model: 'vendor/model',
      messages: [{ role: 'user', content: 'Review this.' }],
      max_tokens: 100,
    });
  });

  it('sends tools, a forced choice and the tool history in wire format', async () => {
    const { api, requests } = client(() => ({ choices: [{ message: { content: 'ok' } }] }));

    await api.complete({
      model: 'vendor/model',
      messages: [
        { role: 'system', content: 'sys' },
        {
          role: 'assistant',
          content: null,
          toolCalls: [{ id: 'c1', name: 'list_dir', arguments: '{"path":"."}' }],
        },
        { role: 'tool', toolCallId: 'c1', name: 'list_dir', content: '{}' },
      ],
      tools: [{ name: 'list_dir', description: 'List a directory.', parameters: { type: 'object' } }],
      toolChoice: { name: 'activate_project' },
      maxTokens: 50,
    });

    expect(sentBody(requests[0])).toEqual({
      model: 'vendor/model',
      messages: [
        { role: 'system', content: 'sys' },
        {
          role: 'assistant',
          content: null,
          tool_calls: [
            { id: 'c1', type: 'function', function: { name: 'list_dir', arguments: '{"path":"."}' } },
          ],
        },
        { role: 'tool', tool_call_id: 'c1', name: 'list_dir', content: '{}' },
      ],
      max_tokens: 50,
      tools: [
        {
          type: 'function',
          function: { name: 'list_dir', description: 'List a directory.', parameters: { type: 'object' } },
        },
      ],
      tool_choice: { type: 'function', function: { name: 'activate_project' } },
    });
  });

  it('parses tool calls, filling a missing id and arguments', async () => {
    const { api } = client(() => ({
      choices: [
        {
          message: {
            content: null,
            tool_calls: [
              { id: 'x', type: 'function', function: { name: 'read_file', arguments: '{"path":"a"}' } },
              { function: { name: 'list_dir' } },
            ],
          },
        },
      ],
    }));

    await expect(api.complete(BASE_REQUEST)).resolves.toEqual({
      type: 'tool_calls',
      content: null,
      toolCalls: [
        { id: 'x', name: 'read_file', arguments: '{"path":"a"}' },
        { id: 'call_1', name: 'list_dir', arguments: '{}' },
      ],
    });
  });

  it('treats an error body as a transport error', async () => {
    const { api } = client(() => ({ error: { message: 'model overloaded', code: 503 } }));
    await expect(api.complete(BASE_REQUEST)).rejects.toMatchObject({
      kind: 'transport_error',
      message: 'OpenRouter error for vendor/model: model overloaded',
    });
  });

  it('rejects a payload without choices', async () => {
    const { api } = client(() => ({ choices: [] }));
    await expect(api.complete(BASE_REQUEST)).rejects.toThrow('Unexpected completion payload for vendor/model');
  });

  it('includes the HTTP status and provider message on failure', async () => {
    const { api } = client((config) => {
      throw new AxiosError('Request failed with status code 429', 'ERR_BAD_REQUEST', config, null, {
        data: { error: { message: 'Rate limited' } },
        status: 429,
        statusText: 'Too Many Requests',
        headers: {},
        config,
      });
    });

    await expect(api.complete(BASE_REQUEST)).rejects.toMatchObject({
      kind: 'transport_error',
      message: 'OpenRouter completion for vendor/model failed (HTTP 429): Rate limited',
    });
  });
});
