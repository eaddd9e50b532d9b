/** A named secret pattern and its replacement */
export interface RedactionRule {
  readonly name: string;
  readonly pattern: RegExp;
}

export const REDACTED = '[REDACTED]';

/** Best-effort secret patterns; over-redaction is acceptable */
export const DEFAULT_REDACTION_RULES: readonly RedactionRule[] = [
  { name: 'openrouter_api_key', pattern: /\bsk-or-v1-[A-Za-z0-9]{16,}\b/g },
  { name: 'openai_like_api_key', pattern: /\bsk-[A-Za-z0-9]{16,}\b/g },
  { name: 'github_pat', pattern: /\bghp_[A-Za-z0-9]{20,}\b/g },
  { name: 'github_fine_grained_pat', pattern: /\bgithub_pat_[A-Za-z0-9_]{20,}\b/g },
  { name: 'aws_access_key_id', pattern: /\bAKIA[0-9A-Z]{16}\b/g },
  { name: 'jwt', pattern: /\beyJ[A-Za-z0-9_-]{10,}\.[A-Za-z0-9_-]{10,}\.[A-Za-z0-9_-]{10,}\b/g },
  {
    name: 'pem_private_key',
    pattern:
      /-----BEGIN (?:RSA |EC |OPENSSH )?PRIVATE KEY-----[\s\S]*?-----END (?:RSA |EC |OPENSSH )?PRIVATE KEY-----/g,
  },
];

/**
 * Replace known secret shapes with `[REDACTED]`.
 * Applied to prompts on the way out, tool results on the way back, and the final report.
 */
export function redactText(
  text: string,
  rules: readonly RedactionRule[] = DEFAULT_REDACTION_RULES,
): string {
  let redacted = text;
  for (const rule of rules) {
    redacted = redacted.replace(rule.pattern, REDACTED);
  }
  return redacted;
}
