import { describe, it, expect } from 'vitest';
import { DualReviewCoordinator, type CoordinatorConfig } from '../src/review/coordinator.js';
import { DEFAULT_TOOL_BRIDGE_LIMITS } from '../src/review/toolBridge.js';
import { ModelCapabilityCache } from '../src/models/capabilityCache.js';
import { AdmissionGate } from '../src/shared/admissionGate.js';
import { ReviewError } from '../src/errors.js';
import type { ReviewerOutcome } from '../src/types.js';
import { FakeModelApi, designRequest, final, modelInfo, untilAborted, type Responder } from './fakes.js';

const BASE_CONFIG: CoordinatorConfig = {
  primaryModel: 'primary/model',
  secondaryModel: 'secondary/model',
  synthesisModel: 'synth/model',
  synthesisTimeoutMs: 5000,
  reviewer: {
    timeoutMs: 5000,
    fixedOutputTokens: 1000,
    contextOverheadTokens: 500,
    maxInputChars: 100_000,
    toolLimits: DEFAULT_TOOL_BRIDGE_LIMITS,
  },
};

function coordinator(
  responders: Record<string, Responder>,
  config: Partial<CoordinatorConfig> = {},
  gate: AdmissionGate = new AdmissionGate(4),
) {
  const api = new FakeModelApi([modelInfo('primary/model'), modelInfo('secondary/model')], responders);
  const coord = new DualReviewCoordinator(
    { api, cache: new ModelCapabilityCache(api), gate },
    { ...BASE_CONFIG, ...config },
  );
  return { api, coord };
}

describe('DualReviewCoordinator', () => {
  it('runs both reviewers and synthesizes their answers', async () => {
    const { api, coord } = coordinator({
      'primary/model': () => final('Primary review.'),
      'secondary/model': () => final('Secondary review.'),
      'synth/model': () => final('Combined.'),
    });
    const events: string[] = [];

    const result = await coord.review(designRequest(), {
      onReviewerStart: (role) => events.push(`start:${role}`),
      onReviewerComplete: (outcome) => events.push(`done:${outcome.role}`),
      onSynthesisStart: (model) => events.push(`synth:${model}`),
    });

    expect(result.kind).toBe('design');
    expect(result.primary.status).toBe('succeeded');
    expect(result.secondary?.status).toBe('succeeded');
    expect(result.summary).toBe('Combined.');
    expect(result.summaryError).toBeUndefined();
    expect(events.slice(0, 2)).toEqual(['start:primary', 'start:secondary']);
    expect(events.at(-1)).toBe('synth:synth/model');
    expect(api.listCalls).toBe(1);
  });

  it('never lets more model requests run than the shared gate admits', async () => {
    let running = 0;
    let peak = 0;
    const order: string[] = [];
    const slow =
      (text: string): Responder =>
      async (req) => {
        running++;
        peak = Math.max(peak, running);
        order.push(`begin:${req.model}`);
        await new Promise((resolve) => setTimeout(resolve, 20));
        order.push(`end:${req.model}`);
        running--;
        return final(text);
      };
    const { coord } = coordinator(
      {
        'primary/model': slow('Primary review.'),
        'secondary/model': slow('Secondary review.'),
        'synth/model': slow('Combined.'),
      },
      {},
      new AdmissionGate(1),
    );

    const result = await coord.review(designRequest());

    expect(result.primary.status).toBe('succeeded');
    expect(result.secondary?.status).toBe('succeeded');
    expect(result.summary).toBe('Combined.');
    expect(peak).toBe(1);
    expect(order).toHaveLength(6);
    for (let i = 0; i < order.length; i += 2) {
      expect(order[i]?.replace('begin:', '')).toBe(order[i + 1]?.replace('end:', ''));
    }
  });

  it('keeps the surviving review when the other reviewer times out', async () => {
    const { api, coord } = coordinator(
      {
        'primary/model': (req) => untilAborted(req.signal),
        'secondary/model': () => final('Secondary review.'),
      },
      { reviewer: { ...BASE_CONFIG.reviewer, timeoutMs: 100 } },
    );

    const result = await coord.review(designRequest());

    expect(result.primary.status).toBe('timed_out');
    expect(result.secondary?.status).toBe('succeeded');
    expect(result.secondary?.finalText).toBe('Secondary review.');
    expect(result.summary).toBe(
      "> **Note:** The Primary reviewer (primary/model) did not produce a review (timed_out: primary reviewer (primary/model) timed out after 0.1s). This summary is the other reviewer's output alone.\n\nSecondary review.",
    );
    expect(api.callsFor('synth/model')).toEqual([]);
  });

  it('skips the secondary reviewer entirely when it is disabled', async () => {
    const { api, coord } = coordinator(
      { 'primary/model': () => final('Primary review.') },
      { secondaryModel: '0' },
    );

    expect(coord.secondaryEnabled).toBe(false);
    const result = await coord.review(designRequest());

    expect(result.secondary).toBeUndefined();
    expect(api.callsFor('0')).toEqual([]);
    expect(result.summary).toBe(
      "> **Note:** The Secondary reviewer is disabled. This summary is the other reviewer's output alone.\n\nPrimary review.",
    );
  });

  it('keeps both outcomes when synthesis fails', async () => {
    const { coord } = coordinator({
      'primary/model': () => final('Primary review.'),
      'secondary/model': () => final('Secondary review.'),
      'synth/model': () => {
        throw new ReviewError('transport_error', 'HTTP 500: synthesis down');
      },
    });

    const result = await coord.review(designRequest());

    expect(result.primary.finalText).toBe('Primary review.');
    expect(result.secondary?.finalText).toBe('Secondary review.');
    expect(result.summary).toBeUndefined();
    expect(result.summaryError).toEqual({ kind: 'transport_error', message: 'HTTP 500: synthesis down' });
  });

  it('reports no_input_for_synthesis when both reviewers fail', async () => {
    const { coord } = coordinator({});
    const completed: ReviewerOutcome[] = [];

    const result = await coord.review(designRequest(), {
      onReviewerComplete: (outcome) => completed.push(outcome),
    });

    expect(completed.map((o) => o.status)).toEqual(['failed', 'failed']);
    expect(result.summaryError?.kind).toBe('no_input_for_synthesis');
  });
});
