import pc from 'picocolors';
import type { AggregateResult, ReviewerOutcome, ReviewerStatus } from '../types.js';
import { formatSeconds } from '../shared/deadline.js';
import { redactText } from '../shared/redaction.js';
import { formatAggregatedMarkdown } from './markdown.js';

const STATUS_LABELS: Record<ReviewerStatus, string> = {
  succeeded: pc.bgGreen(pc.black(pc.bold(' OK '))),
  timed_out: pc.bgYellow(pc.black(pc.bold(' TIME '))),
  failed: pc.bgRed(pc.white(pc.bold(' FAIL '))),
  disabled: pc.dim('[OFF]'),
};

/**
 * Print the Markdown review to stdout and a coloured status block to stderr.
 */
export function printAggregatedReport(result: AggregateResult, verbose: boolean): void {
  console.log(formatAggregatedMarkdown(result));

  console.error();
  console.error(pc.bold('Reviewers'));
  console.error(pc.dim('─'.repeat(70)));
  printOutcome('Primary', result.primary, verbose);
  if (result.secondary) printOutcome('Secondary', result.secondary, verbose);

  if (result.summaryError) {
    console.error(
      `  ${pc.yellow('Summary')} ${pc.dim(`${result.summaryError.kind}: ${result.summaryError.message}`)}`,
    );
  }
  console.error(pc.dim(`  Total: ${formatSeconds(roundTenths(result.durationMs))}`));
  console.error();
}

function printOutcome(label: string, outcome: ReviewerOutcome, verbose: boolean): void {
  const time = pc.dim(formatSeconds(roundTenths(outcome.durationMs)));
  console.error(`  ${STATUS_LABELS[outcome.status]} ${pc.bold(label)} ${outcome.modelId} ${time}`);

  if (outcome.error) {
    console.error(`    ${pc.red(outcome.error.kind)} ${pc.dim(redactText(outcome.error.message))}`);
  }
  if (outcome.toolsDisabledReason) {
    console.error(`    ${pc.dim(`tools off: ${outcome.toolsDisabledReason}`)}`);
  }

  if (verbose) {
    for (const call of outcome.toolCalls) {
      const args = redactText(JSON.stringify(call.arguments));
      const flag = call.truncated ? pc.yellow(' truncated') : '';
      console.error(
        `    ${pc.dim('->')} ${call.name} ${pc.dim(args)} ${pc.dim(`${call.result.length} chars, ${call.elapsedMs}ms`)}${flag}`,
      );
    }
  }
}

function roundTenths(ms: number): number {
  return Math.round(ms / 100) * 100;
}
