import type { EmbeddedFile, ReviewKind, ReviewRequest, SkippedFile } from '../types.js';
import { redactText } from '../shared/redaction.js';

/** Headings every reviewer answer is expected to carry */
export const REVIEW_SECTIONS = [
  'Summary',
  'Key Findings',
  'Recommendations',
  'Questions / Unknowns',
] as const;

export const FILE_TRUNCATED_NOTE = '\n[NOTE: File content truncated to fit the input budget.]';

export const REQUEST_TRUNCATED_NOTE = '\n[NOTE: Request truncated to fit the input budget.]';

/** Room kept for the omitted-files note so it never pushes the prompt over budget */
const OMISSION_NOTE_RESERVE = 120;

/** A partial first file is only embedded when at least this much content fits */
const MIN_PARTIAL_CONTENT = 50;

const SECTION_LIST = REVIEW_SECTIONS.map((s) => `## ${s}`).join('\n');

/**
 * Build the system prompt for a review.
 * Tool instructions, including the mandatory activation preflight, appear only when tools are offered.
 */
export function buildSystemPrompt(kind: ReviewKind, toolsEnabled: boolean): string {
  const role =
    kind === 'design'
      ? 'You are an expert software architect and reviewer.\nProvide a thorough but concise critique of the proposed design.'
      : 'You are an expert code reviewer focused on correctness, security, and maintainability.';

  const toolNote = toolsEnabled
    ? 'You MAY call the read-only project tools to inspect repository files and project memories when needed.'
    : 'You do NOT have access to any tools or repository context beyond the user-provided text.';

  const preflight = toolsEnabled
    ? 'PRE-FLIGHT (mandatory): Immediately call `activate_project` with `project="."` before any other tool. ' +
      'Then call `read_project_overview` to load baseline project context.\n'
    : '';

  return `${role}
${toolNote}
${preflight}
Return Markdown with sections:
${SECTION_LIST}
`;
}

/**
 * Build the request body (everything except embedded files) for the user message.
 */
export function buildRequestBody(request: ReviewRequest): string {
  const parts: string[] = [];

  if (request.kind === 'design') {
    parts.push('# System Design Review Request');
    if (request.inlineText) parts.push(`## Proposal\n${request.inlineText}`);
    if (request.constraints) parts.push(`## Constraints\n${request.constraints}`);
  } else {
    parts.push('# Code Review Request');
    if (request.inlineText) parts.push(`## Code\n\`\`\`\n${request.inlineText}\n\`\`\``);
  }
  if (request.context) parts.push(`## Context\n${request.context}`);

  return redactText(parts.join('\n\n'));
}

// ─── File Embedding ──────────────────────────────────────────

export interface FittedFiles {
  readonly text: string;
  /** Paths embedded in full or in part */
  readonly embedded: readonly string[];
  /** Paths left out for lack of room */
  readonly omitted: readonly string[];
  readonly truncated: boolean;
}

function fileHeader(path: string): string {
  return `--- BEGIN FILE: ${path} ---\n`;
}

function fileFooter(path: string): string {
  return `\n--- END FILE: ${path} ---\n`;
}

/**
 * Pack files in order into `maxChars`.
 * Stops at the first file that does not fit; when that is the first file, a truncated
 * prefix of it is embedded instead.
 */
export function fitEmbeddedFiles(files: readonly EmbeddedFile[], maxChars: number): FittedFiles {
  const chunks: string[] = [];
  const embedded: string[] = [];
  let remaining = Math.max(maxChars, 0);
  let truncated = false;
  let index = 0;

  for (; index < files.length; index++) {
    const file = files[index]!;
    const header = fileHeader(file.path);
    const footer = fileFooter(file.path);
    const content = redactText(file.content);
    const block = header + content + footer;

    if (block.length <= remaining) {
      chunks.push(block);
      embedded.push(file.path);
      remaining -= block.length;
      continue;
    }

    const usable = remaining - header.length - footer.length - FILE_TRUNCATED_NOTE.length;
    if (embedded.length === 0 && usable >= MIN_PARTIAL_CONTENT) {
      chunks.push(header + content.slice(0, usable) + FILE_TRUNCATED_NOTE + footer);
      embedded.push(file.path);
      truncated = true;
      index++;
    }
    break;
  }

  return {
    text: chunks.join(''),
    embedded,
    omitted: files.slice(index).map((f) => f.path),
    truncated,
  };
}

// ─── Review Prompt ───────────────────────────────────────────

export interface ReviewPrompt {
  readonly system: string;
  readonly user: string;
  readonly embedded: readonly string[];
  readonly omitted: readonly string[];
}

/**
 * Build the system and user messages for one reviewer, keeping their combined length
 * within `maxInputChars`.
 */
export function buildReviewPrompt(
  request: ReviewRequest,
  options: { readonly toolsEnabled: boolean; readonly maxInputChars: number },
): ReviewPrompt {
  const system = buildSystemPrompt(request.kind, options.toolsEnabled);
  let budget = options.maxInputChars - system.length;

  let body = buildRequestBody(request);
  const skippedNote = formatSkipped(request.skippedFiles);
  if (skippedNote.length + OMISSION_NOTE_RESERVE <= budget - body.length) {
    body += skippedNote;
  }

  if (body.length > budget) {
    const keep = Math.max(budget - REQUEST_TRUNCATED_NOTE.length, 0);
    return {
      system,
      user: body.slice(0, keep) + (keep > 0 ? REQUEST_TRUNCATED_NOTE : ''),
      embedded: [],
      omitted: request.embeddedFiles.map((f) => f.path),
    };
  }
  budget -= body.length;

  if (request.embeddedFiles.length === 0) {
    return { system, user: body, embedded: [], omitted: [] };
  }

  const filesHeading = '\n\n## Files\n';
  const fitted = fitEmbeddedFiles(
    request.embeddedFiles,
    budget - filesHeading.length - OMISSION_NOTE_RESERVE,
  );

  let user = body;
  if (fitted.embedded.length > 0) user += filesHeading + fitted.text;
  if (fitted.omitted.length > 0) {
    user += `\n[NOTE: ${fitted.omitted.length} file(s) omitted to fit the model's input budget.]\n`;
  }

  return { system, user, embedded: fitted.embedded, omitted: fitted.omitted };
}

function formatSkipped(skipped: readonly SkippedFile[]): string {
  if (skipped.length === 0) return '';
  const lines = skipped.map((s) => `- ${s.path} (${s.reason})`);
  return `\n\n## Files Not Included\n${lines.join('\n')}`;
}

// ─── Tool Loop & Synthesis ───────────────────────────────────

/** System message appended when the tool-call limit is reached */
export function buildFinalizeMessage(): string {
  return 'You have reached the maximum tool call budget. Provide your final review now without further tool calls.';
}

/**
 * System prompt for the synthesis model.
 * Instructs it to merge two independent reviews into one summary.
 */
export function buildSynthesisSystemPrompt(kind: ReviewKind): string {
  const subject = kind === 'design' ? 'system design' : 'code';
  return `You are a review aggregator. You will receive two independent ${subject} reviews of the same request, written by different AI models.

Your task:
1. Write one integrated summary of both reviews.
2. Call out the findings both reviewers agree on first.
3. Note where the reviewers disagree and which position is better supported.
4. List the most important recommendations in priority order.

IMPORTANT:
- Do NOT invent new findings. Only use what the reviews contain.
- Keep it concise. Return Markdown without a top-level heading.`;
}

/**
 * Build the synthesis user message containing both reviews.
 */
export function buildSynthesisMessage(
  primary: { readonly model: string; readonly review: string },
  secondary: { readonly model: string; readonly review: string },
): string {
  const text =
    `=== Primary review (${primary.model}) ===\n${primary.review}\n\n` +
    `=== Secondary review (${secondary.model}) ===\n${secondary.review}`;
  return redactText(text);
}
