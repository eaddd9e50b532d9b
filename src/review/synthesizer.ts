import type { ReviewFailure, ReviewKind, ReviewerOutcome } from '../types.js';
import { ReviewError, errorMessage } from '../errors.js';
import type { ModelApi } from '../models/modelApi.js';
import type { AdmissionGate } from '../shared/admissionGate.js';
import { Deadline, abortReason } from '../shared/deadline.js';
import { silentLogger, type Logger } from '../shared/logger.js';
import { buildSynthesisMessage, buildSynthesisSystemPrompt } from './prompt.js';

export interface SynthesisResult {
  readonly summary?: string;
  readonly error?: ReviewFailure;
}

export interface SynthesizerOptions {
  readonly api: ModelApi;
  readonly gate: AdmissionGate;
  readonly model: string;
  readonly timeoutMs: number;
  readonly maxTokens: number;
  readonly logger?: Logger;
}

/** Final text of a succeeded outcome, if it has any */
export function reviewText(outcome: ReviewerOutcome | undefined): string | undefined {
  if (outcome?.status !== 'succeeded') return undefined;
  const text = outcome.finalText?.trim();
  return text ? text : undefined;
}

/**
 * Combines the two reviewer outputs into one summary.
 *
 * Both texts → one model call under its own timeout.
 * One text → that text, prefixed with a note on the missing reviewer.
 * None → `no_input_for_synthesis`.
 */
export class Synthesizer {
  private readonly logger: Logger;

  constructor(private readonly options: SynthesizerOptions) {
    this.logger = options.logger ?? silentLogger;
  }

  async summarize(
    kind: ReviewKind,
    primary: ReviewerOutcome,
    secondary?: ReviewerOutcome,
  ): Promise<SynthesisResult> {
    const primaryText = reviewText(primary);
    const secondaryText = reviewText(secondary);

    if (primaryText !== undefined && secondaryText !== undefined && secondary) {
      return this.synthesize(kind, primary, primaryText, secondary, secondaryText);
    }
    if (primaryText !== undefined) {
      return { summary: degradedSummary('Secondary', secondary, primaryText) };
    }
    if (secondaryText !== undefined) {
      return { summary: degradedSummary('Primary', primary, secondaryText) };
    }
    return {
      error: {
        kind: 'no_input_for_synthesis',
        message: 'No reviewer produced a final answer; nothing to synthesize',
      },
    };
  }

  private async synthesize(
    kind: ReviewKind,
    primary: ReviewerOutcome,
    primaryText: string,
    secondary: ReviewerOutcome,
    secondaryText: string,
  ): Promise<SynthesisResult> {
    const { api, gate, model, timeoutMs, maxTokens } = this.options;
    const deadline = new Deadline(timeoutMs, `synthesis (${model})`);
    this.logger.debug(`[synthesis:${model}] combining 2 reviews`);

    try {
      const response = await gate.run(
        () =>
          api.complete({
            model,
            messages: [
              { role: 'system', content: buildSynthesisSystemPrompt(kind) },
              {
                role: 'user',
                content: buildSynthesisMessage(
                  { model: primary.modelId, review: primaryText },
                  { model: secondary.modelId, review: secondaryText },
                ),
              },
            ],
            maxTokens,
            signal: deadline.signal,
          }),
        deadline.signal,
      );

      const summary = response.content?.trim();
      if (!summary) {
        throw new ReviewError('transport_error', `Synthesis model ${model} returned no content`);
      }
      return { summary };
    } catch (err) {
      if (deadline.expired) {
        return { error: { kind: 'timed_out', message: errorMessage(abortReason(deadline.signal)) } };
      }
      this.logger.warn(`[synthesis:${model}] failed: ${errorMessage(err)}`);
      return { error: { kind: 'transport_error', message: errorMessage(err) } };
    } finally {
      deadline.dispose();
    }
  }
}

function degradedSummary(
  missingLabel: 'Primary' | 'Secondary',
  missing: ReviewerOutcome | undefined,
  text: string,
): string {
  let why: string;
  if (!missing || missing.status === 'disabled') {
    why = 'is disabled';
  } else {
    const detail = missing.error ? `: ${missing.error.message}` : '';
    why = `(${missing.modelId}) did not produce a review (${missing.status}${detail})`;
  }
  return `> **Note:** The ${missingLabel} reviewer ${why}. This summary is the other reviewer's output alone.\n\n${text}`;
}
