import type {
  AggregateResult,
  ReviewRequest,
  ReviewerOutcome,
  ReviewerRole,
} from '../types.js';
import type { ModelApi } from '../models/modelApi.js';
import type { ModelCapabilityCache } from '../models/capabilityCache.js';
import type { ProjectIndex } from '../project/projectIndex.js';
import type { AdmissionGate } from '../shared/admissionGate.js';
import { formatSeconds } from '../shared/deadline.js';
import { silentLogger, type Logger } from '../shared/logger.js';
import { isDisabledModel, runReviewer, type ReviewerSettings } from './reviewer.js';
import { Synthesizer } from './synthesizer.js';

/** Progress callbacks, e.g. for a spinner */
export interface ReviewCallbacks {
  onReviewerStart?: (role: ReviewerRole, modelId: string) => void;
  onReviewerComplete?: (outcome: ReviewerOutcome) => void;
  onSynthesisStart?: (modelId: string) => void;
}

export interface CoordinatorDeps {
  readonly api: ModelApi;
  readonly cache: ModelCapabilityCache;
  readonly gate: AdmissionGate;
  readonly index?: ProjectIndex;
  readonly logger?: Logger;
}

export interface CoordinatorConfig {
  readonly primaryModel: string;
  /** `0` or `disabled` switches the Secondary reviewer off */
  readonly secondaryModel: string;
  readonly synthesisModel: string;
  readonly synthesisTimeoutMs: number;
  readonly reviewer: ReviewerSettings;
}

/**
 * Runs the Primary and Secondary reviewers concurrently and synthesizes their outputs.
 *
 * Each reviewer runs to its own terminal outcome; neither is cancelled because of the other.
 * Synthesis starts only after both are terminal.
 */
export class DualReviewCoordinator {
  private readonly logger: Logger;
  private readonly synthesizer: Synthesizer;

  constructor(
    private readonly deps: CoordinatorDeps,
    private readonly config: CoordinatorConfig,
  ) {
    this.logger = deps.logger ?? silentLogger;
    this.synthesizer = new Synthesizer({
      api: deps.api,
      gate: deps.gate,
      model: config.synthesisModel,
      timeoutMs: config.synthesisTimeoutMs,
      maxTokens: config.reviewer.fixedOutputTokens,
      logger: this.logger,
    });
  }

  get secondaryEnabled(): boolean {
    return !isDisabledModel(this.config.secondaryModel);
  }

  async review(request: ReviewRequest, callbacks: ReviewCallbacks = {}): Promise<AggregateResult> {
    const start = Date.now();

    const [primary, secondary] = await Promise.all([
      this.runRole('primary', this.config.primaryModel, request, callbacks),
      this.secondaryEnabled
        ? this.runRole('secondary', this.config.secondaryModel, request, callbacks)
        : Promise.resolve(undefined),
    ]);

    callbacks.onSynthesisStart?.(this.config.synthesisModel);
    const synthesis = await this.synthesizer.summarize(request.kind, primary, secondary);
    if (synthesis.error) {
      this.logger.warn(`synthesis skipped or failed: ${synthesis.error.kind}`);
    }

    return {
      kind: request.kind,
      primary,
      secondary,
      summary: synthesis.summary,
      summaryError: synthesis.error,
      durationMs: Date.now() - start,
    };
  }

  private async runRole(
    role: ReviewerRole,
    modelId: string,
    request: ReviewRequest,
    callbacks: ReviewCallbacks,
  ): Promise<ReviewerOutcome> {
    this.logger.info(`${role} reviewer started (${modelId})`);
    callbacks.onReviewerStart?.(role, modelId);

    const outcome = await runReviewer(role, modelId, request, {
      api: this.deps.api,
      cache: this.deps.cache,
      gate: this.deps.gate,
      index: this.deps.index,
      settings: this.config.reviewer,
      logger: this.logger,
    });

    const detail = outcome.error ? ` [${outcome.error.kind}] ${outcome.error.message}` : '';
    const line =
      `${role} reviewer ${outcome.status} in ${formatSeconds(outcome.durationMs)} ` +
      `with ${outcome.toolCalls.length} tool call(s)${detail}`;
    if (outcome.status === 'succeeded') this.logger.info(line);
    else this.logger.warn(line);

    callbacks.onReviewerComplete?.(outcome);
    return outcome;
  }
}
