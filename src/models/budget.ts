import type { Budget, ModelInfo } from '../types.js';
import { DEFAULT_CHARS_PER_TOKEN } from '../types.js';

export interface BudgetOptions {
  /** Characters-per-token estimate (default: 3) */
  readonly charsPerToken?: number;
  /** Absolute ceiling on prompt characters; none when omitted */
  readonly maxInputChars?: number;
}

/**
 * Compute the prompt budget for one model.
 *
 * available = max(0, context window - output reservation - overhead)
 * maxInputChars = available * charsPerToken, capped by the absolute ceiling.
 *
 * The output reservation is lowered to the provider's completion limit when it reports one.
 * Pure: same inputs always give the same Budget.
 */
export function computeBudget(
  metadata: Pick<ModelInfo, 'contextWindowTokens' | 'maxCompletionTokens'>,
  fixedOutputTokens: number,
  overheadTokens: number,
  options: BudgetOptions = {},
): Budget {
  const charsPerToken = options.charsPerToken ?? DEFAULT_CHARS_PER_TOKEN;
  const reservedOutputTokens =
    metadata.maxCompletionTokens != null
      ? Math.min(fixedOutputTokens, metadata.maxCompletionTokens)
      : fixedOutputTokens;

  const availableInputTokens = Math.max(
    0,
    metadata.contextWindowTokens - reservedOutputTokens - overheadTokens,
  );

  let maxInputChars = availableInputTokens * charsPerToken;
  if (options.maxInputChars != null) {
    maxInputChars = Math.min(maxInputChars, options.maxInputChars);
  }

  return {
    availableInputTokens,
    maxInputChars,
    reservedOutputTokens,
    reservedOverheadTokens: overheadTokens,
  };
}

/** A zero budget means no request could fit */
export function isBudgetExhausted(budget: Budget): boolean {
  return budget.availableInputTokens <= 0 || budget.maxInputChars <= 0;
}
