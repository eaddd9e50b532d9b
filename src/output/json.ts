import type { AggregateResult } from '../types.js';
import { redactText } from '../shared/redaction.js';

/**
 * Print the aggregate result as redacted JSON to stdout.
 */
export function printJsonReport(result: AggregateResult): void {
  console.log(formatJsonReport(result));
}

export function formatJsonReport(result: AggregateResult): string {
  return redactText(JSON.stringify(result, null, 2));
}
