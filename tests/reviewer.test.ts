import { describe, it, expect } from 'vitest';
import { runReviewer, isDisabledModel, type ReviewerSettings } from '../src/review/reviewer.js';
import { DEFAULT_TOOL_BRIDGE_LIMITS } from '../src/review/toolBridge.js';
import { buildFinalizeMessage, buildSystemPrompt } from '../src/review/prompt.js';
import { ModelCapabilityCache } from '../src/models/capabilityCache.js';
import { AdmissionGate } from '../src/shared/admissionGate.js';
import { ReviewError } from '../src/errors.js';
import type { ModelInfo } from '../src/types.js';
import {
  FakeModelApi,
  FakeProjectIndex,
  designRequest,
  final,
  modelInfo,
  toolCall,
  toolCalls,
  untilAborted,
  type Responder,
} from './fakes.js';

const SETTINGS: ReviewerSettings = {
  timeoutMs: 5000,
  fixedOutputTokens: 1000,
  contextOverheadTokens: 500,
  maxInputChars: 100_000,
  toolLimits: DEFAULT_TOOL_BRIDGE_LIMITS,
};

function setup(
  models: ModelInfo[],
  responders: Record<string, Responder>,
  overrides: { settings?: Partial<ReviewerSettings>; index?: FakeProjectIndex; gate?: AdmissionGate } = {},
) {
  const api = new FakeModelApi(models, responders);
  const deps = {
    api,
    cache: new ModelCapabilityCache(api),
    gate: overrides.gate ?? new AdmissionGate(4),
    index: overrides.index,
    settings: { ...SETTINGS, ...overrides.settings },
  };
  return { api, deps };
}

describe('isDisabledModel', () => {
  it('recognises the sentinels case-insensitively', () => {
    expect(isDisabledModel('0')).toBe(true);
    expect(isDisabledModel(' DISABLED ')).toBe(true);
    expect(isDisabledModel('z-ai/glm-5')).toBe(false);
  });
});

describe('runReviewer', () => {
  it('returns a disabled outcome without touching the API', async () => {
    const { api, deps } = setup([], {});
    const outcome = await runReviewer('secondary', 'disabled', designRequest(), deps);

    expect(outcome).toEqual({
      role: 'secondary',
      modelId: 'disabled',
      status: 'disabled',
      toolCalls: [],
      durationMs: 0,
    });
    expect(api.listCalls).toBe(0);
    expect(api.completions).toEqual([]);
  });

  it('makes a single call without tools for a model that cannot call tools', async () => {
    const { api, deps } = setup(
      [modelInfo('plain/model', { supportsToolCalling: false, supportsToolChoice: false })],
      { 'plain/model': () => final('## Summary\nLooks fine.') },
      { index: new FakeProjectIndex() },
    );

    const outcome = await runReviewer('primary', 'plain/model', designRequest(), deps);

    expect(outcome.status).toBe('succeeded');
    expect(outcome.finalText).toBe('## Summary\nLooks fine.');
    expect(outcome.toolCalls).toEqual([]);
    expect(outcome.toolsDisabledReason).toBe('model does not support tool calling');
    expect(api.completions).toHaveLength(1);
    expect(api.completions[0]?.tools).toBeUndefined();
    expect(api.completions[0]?.toolChoice).toBeUndefined();
    expect(api.completions[0]?.maxTokens).toBe(1000);
    expect(api.completions[0]?.messages[0]).toEqual({
      role: 'system',
      content: buildSystemPrompt('design', false),
    });
  });

  it('reviews without tools when no project index is available', async () => {
    const { deps } = setup([modelInfo('m')], { m: () => final('done') });
    const outcome = await runReviewer('primary', 'm', designRequest(), deps);

    expect(outcome.status).toBe('succeeded');
    expect(outcome.toolsDisabledReason).toBe('no project index available');
  });

  it('runs the tool loop: activation, overview, then a final answer', async () => {
    const index = new FakeProjectIndex();
    const { api, deps } = setup(
      [modelInfo('m')],
      {
        m: (_req, turn) => {
          if (turn === 0) return toolCalls(toolCall('a', 'activate_project', { project: '.' }));
          if (turn === 1) return toolCalls(toolCall('b', 'read_project_overview'));
          return final('## Summary\nUses the overview.');
        },
      },
      { index },
    );

    const outcome = await runReviewer('primary', 'm', designRequest(), deps);

    expect(outcome.status).toBe('succeeded');
    expect(outcome.finalText).toBe('## Summary\nUses the overview.');
    expect(outcome.toolsDisabledReason).toBeUndefined();
    expect(outcome.toolCalls.map((c) => c.name)).toEqual(['activate_project', 'read_project_overview']);
    expect(index.calls).toEqual(['activate_project:.', 'read_memory:project_overview']);

    expect(api.completions.map((r) => r.toolChoice)).toEqual([
      { name: 'activate_project' },
      { name: 'read_project_overview' },
      'auto',
    ]);
    expect(api.completions[0]?.messages[0]).toEqual({
      role: 'system',
      content: buildSystemPrompt('design', true),
    });
    expect(api.completions[2]?.messages.map((m) => m.role)).toEqual([
      'system',
      'user',
      'assistant',
      'tool',
      'assistant',
      'tool',
    ]);
  });

  it('fails with budget_exhausted before any completion call', async () => {
    const { api, deps } = setup([modelInfo('tiny', { contextWindowTokens: 1200 })], {
      tiny: () => final('unreachable'),
    });

    const outcome = await runReviewer('primary', 'tiny', designRequest(), deps);

    expect(outcome.status).toBe('failed');
    expect(outcome.error).toEqual({
      kind: 'budget_exhausted',
      message:
        'Model tiny has no room for input: 1200-token context window, 1000 reserved for output and 500 for overhead',
    });
    expect(api.completions).toEqual([]);
  });

  it('fails with metadata_unavailable for a model missing from the listing', async () => {
    const { api, deps } = setup([modelInfo('other')], {});
    const outcome = await runReviewer('secondary', 'ghost', designRequest(), deps);

    expect(outcome.status).toBe('failed');
    expect(outcome.error).toEqual({
      kind: 'metadata_unavailable',
      message: "Model 'ghost' not found in the models listing",
    });
    expect(api.completions).toEqual([]);
  });

  it('reports transport errors as failed', async () => {
    const { deps } = setup([modelInfo('m')], {
      m: () => {
        throw new ReviewError('transport_error', 'HTTP 502: upstream unavailable');
      },
    });

    const outcome = await runReviewer('primary', 'm', designRequest(), deps);
    expect(outcome.status).toBe('failed');
    expect(outcome.error).toEqual({ kind: 'transport_error', message: 'HTTP 502: upstream unavailable' });
  });

  it('ends with the text sent alongside tool requests once refusals run out', async () => {
    const { api, deps } = setup(
      [modelInfo('m')],
      {
        m: (_req, turn) =>
          turn === 0
            ? toolCalls(toolCall('a', 'activate_project', { project: '.' }))
            : {
                type: 'tool_calls',
                content: '## Summary\nDone.',
                toolCalls: [toolCall(`l${turn}`, 'list_dir', { path: '.' })],
              },
      },
      {
        index: new FakeProjectIndex(),
        settings: { toolLimits: { ...DEFAULT_TOOL_BRIDGE_LIMITS, maxToolCalls: 1 } },
      },
    );

    const outcome = await runReviewer('primary', 'm', designRequest(), deps);

    expect(outcome.status).toBe('succeeded');
    expect(outcome.finalText).toBe('## Summary\nDone.');
    expect(outcome.error).toBeUndefined();
    expect(outcome.toolCalls).toHaveLength(1);
    expect(api.completions).toHaveLength(4);
  });

  it('fails with tool_call_ceiling_reached when the model ignores the finalize instruction without any text', async () => {
    const { api, deps } = setup(
      [modelInfo('m')],
      { m: () => toolCalls(toolCall('a', 'activate_project', { project: '.' })) },
      {
        index: new FakeProjectIndex(),
        settings: { toolLimits: { ...DEFAULT_TOOL_BRIDGE_LIMITS, maxToolCalls: 1 } },
      },
    );

    const outcome = await runReviewer('primary', 'm', designRequest(), deps);

    expect(outcome.status).toBe('failed');
    expect(outcome.error?.kind).toBe('tool_call_ceiling_reached');
    expect(outcome.toolCalls).toHaveLength(1);
    expect(api.completions).toHaveLength(4);
    expect(api.completions[1]?.tools).toBeUndefined();
    expect(api.completions[1]?.messages.at(-1)).toEqual({ role: 'system', content: buildFinalizeMessage() });
  });

  it('times out mid-conversation and keeps the tool calls made so far', async () => {
    const { deps } = setup(
      [modelInfo('m')],
      {
        m: (req, turn) =>
          turn === 0 ? toolCalls(toolCall('a', 'activate_project', { project: '.' })) : untilAborted(req.signal),
      },
      { index: new FakeProjectIndex(), settings: { timeoutMs: 100 } },
    );

    const outcome = await runReviewer('primary', 'm', designRequest(), deps);

    expect(outcome.status).toBe('timed_out');
    expect(outcome.error).toEqual({
      kind: 'timed_out',
      message: 'primary reviewer (m) timed out after 0.1s',
    });
    expect(outcome.toolCalls.map((c) => c.name)).toEqual(['activate_project']);
    expect(outcome.finalText).toBeUndefined();
  });

  it('times out while waiting for an admission slot', async () => {
    const gate = new AdmissionGate(1);
    const release = await gate.acquire();
    const { api, deps } = setup([modelInfo('m')], { m: () => final('late') }, { gate, settings: { timeoutMs: 100 } });

    const outcome = await runReviewer('secondary', 'm', designRequest(), deps);
    release();

    expect(outcome.status).toBe('timed_out');
    expect(api.completions).toEqual([]);
    expect(gate.waiting).toBe(0);
  });
});
