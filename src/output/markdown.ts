import type { AggregateResult, ReviewerOutcome } from '../types.js';
import { REVIEW_SECTIONS } from '../review/prompt.js';
import { redactText } from '../shared/redaction.js';

const EMPTY_REVIEW = '## Summary\n*(No content provided by reviewer)*';

/**
 * Ensure every expected section heading exists (as `##` or `###`), appending placeholders
 * for the missing ones. Deterministic; never calls a model.
 */
export function normalizeReviewerMarkdown(markdown: string | undefined): string {
  let normalized = markdown?.trim() ?? '';
  if (normalized === '') normalized = EMPTY_REVIEW;

  for (const section of REVIEW_SECTIONS) {
    const heading = new RegExp(`^#{2,3}\\s+${escapeRegExp(section)}\\s*$`, 'm');
    if (!heading.test(normalized)) {
      normalized += `\n\n## ${section}\n*(No ${section} provided by reviewer)*`;
    }
  }
  return normalized.trim();
}

/** Placeholder review for an outcome that produced no text */
export function formatReviewerFailure(outcome: ReviewerOutcome): string {
  const reason = outcome.error
    ? `${outcome.error.kind}: ${outcome.error.message}`
    : `reviewer ${outcome.status}`;
  return [
    '## Summary',
    `**Reviewer Error** for model \`${outcome.modelId}\` (${outcome.status}).`,
    '',
    '## Key Findings',
    `- **High**: ${reason}`,
    '',
    '## Recommendations',
    '- Check that OPENROUTER_API_KEY is set and the model id is valid.',
    '- Raise the reviewer timeout if the model is slow.',
    '',
    '## Questions / Unknowns',
    '- Did the model support tool calling, and was a project index available?',
  ].join('\n');
}

/** One-line disclosure of who reviewed and what they looked at */
export function formatDisclosure(outcome: ReviewerOutcome): string {
  let tools: string;
  if (outcome.toolCalls.length > 0) {
    const names = [...new Set(outcome.toolCalls.map((c) => c.name))].join(', ');
    tools = `${outcome.toolCalls.length} tool call(s) (${names})`;
  } else if (outcome.toolsDisabledReason) {
    tools = `no tools (${outcome.toolsDisabledReason})`;
  } else {
    tools = 'no tool calls';
  }
  const seconds = (outcome.durationMs / 1000).toFixed(1);
  return `*Model: \`${outcome.modelId}\` · Status: ${outcome.status} · ${tools} · ${seconds}s*`;
}

export function formatReviewerSection(outcome: ReviewerOutcome): string {
  const body =
    outcome.status === 'succeeded'
      ? normalizeReviewerMarkdown(outcome.finalText)
      : formatReviewerFailure(outcome);
  return `${body}\n\n---\n${formatDisclosure(outcome)}`;
}

/**
 * Render the aggregate as one Markdown document, redacted for output.
 */
export function formatAggregatedMarkdown(result: AggregateResult): string {
  const parts = ['## Primary Reviewer', formatReviewerSection(result.primary)];

  if (result.secondary) {
    parts.push('## Secondary Reviewer', formatReviewerSection(result.secondary));
  }

  parts.push('## Synthesized Summary');
  if (result.summary?.trim()) {
    parts.push(result.summary.trim());
  } else if (result.summaryError) {
    parts.push(
      `*(No synthesized summary: ${result.summaryError.kind}: ${result.summaryError.message})*`,
    );
  } else {
    parts.push('*(No synthesized summary)*');
  }

  return redactText(parts.join('\n\n'));
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}
