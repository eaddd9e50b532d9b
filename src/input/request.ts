import { statSync } from 'node:fs';
import { dirname, isAbsolute, join, resolve, sep } from 'node:path';
import { z } from 'zod';
import type { ReviewKind, ReviewRequest } from '../types.js';
import { ValidationError } from '../errors.js';
import { INDEX_DIR_NAME } from '../project/localProjectIndex.js';
import { isDangerousRoot } from '../shared/paths.js';
import { embedFiles, type EmbedOptions } from './fileEmbedder.js';

/** Raw review input as collected from the command line */
export interface ReviewInput {
  readonly kind: ReviewKind;
  readonly text?: string;
  readonly paths?: readonly string[];
  readonly constraints?: string;
  readonly context?: string;
}

export const MIN_PROPOSAL_CHARS = 10;
export const MAX_NOTE_CHARS = 10_000;

const nonBlank = (field: string) =>
  z.string().refine((s) => s.trim() !== '', `${field} must not be blank`);

function reviewInputSchema(maxInputChars: number) {
  return z
    .object({
      kind: z.enum(['design', 'code']),
      text: nonBlank('text')
        .refine((s) => s.length <= maxInputChars, `text must be at most ${maxInputChars} characters`)
        .optional(),
      paths: z.array(nonBlank('paths[]')).optional(),
      constraints: z
        .string()
        .max(MAX_NOTE_CHARS, `constraints must be at most ${MAX_NOTE_CHARS} characters`)
        .optional(),
      context: z
        .string()
        .max(MAX_NOTE_CHARS, `context must be at most ${MAX_NOTE_CHARS} characters`)
        .optional(),
    })
    .superRefine((input, ctx) => {
      if (input.text === undefined && (input.paths ?? []).length === 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Provide inline text or at least one path' });
      }
      if (input.kind === 'design' && input.text !== undefined && input.text.trim().length < MIN_PROPOSAL_CHARS) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['text'],
          message: `proposal must be at least ${MIN_PROPOSAL_CHARS} characters`,
        });
      }
    });
}

export type ValidatedInput = z.output<ReturnType<typeof reviewInputSchema>>;

/**
 * Validate raw review input. Throws ValidationError with the first problem found.
 */
export function validateReviewInput(input: ReviewInput, maxInputChars: number): ValidatedInput {
  const result = reviewInputSchema(maxInputChars).safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ValidationError(issue?.message ?? 'Invalid review input');
  }
  return result.data;
}

/** Directories that mark a project root when inferring one from absolute paths */
export const PROJECT_ROOT_MARKERS: readonly string[] = [INDEX_DIR_NAME, '.git'];

const MAX_ROOT_WALK_UP = 25;

/**
 * Resolve the project root, refusing filesystem roots, the home directory
 * and system directories.
 *
 * An explicit `root` wins. Without one, absolute `paths` imply a root: their common directory,
 * or its nearest ancestor carrying a project marker. Otherwise the root is `cwd`.
 */
export function resolveProjectRoot(
  root: string | undefined,
  cwd: string = process.cwd(),
  paths?: readonly string[],
): string {
  const resolved = root !== undefined ? resolve(cwd, root) : (inferProjectRoot(paths) ?? resolve(cwd));
  const info = statSync(resolved, { throwIfNoEntry: false });
  if (!info) throw new ValidationError(`Project root does not exist: ${resolved}`);
  if (!info.isDirectory()) throw new ValidationError(`Project root is not a directory: ${resolved}`);
  if (isDangerousRoot(resolved)) {
    throw new ValidationError(`Refusing to review ${resolved}: choose a project directory`);
  }
  return resolved;
}

/**
 * Project root implied by absolute paths, or undefined when any path is relative
 * or their common directory does not exist.
 */
export function inferProjectRoot(paths: readonly string[] | undefined): string | undefined {
  if (!paths?.length || !paths.every((p) => isAbsolute(p))) return undefined;

  const dirs = paths.map((p) => {
    const abs = resolve(p);
    return statSync(abs, { throwIfNoEntry: false })?.isFile() ? dirname(abs) : abs;
  });
  const base = commonDirectory(dirs);
  if (!isDirectory(base)) return undefined;

  let current = base;
  for (let depth = 0; depth < MAX_ROOT_WALK_UP; depth++) {
    if (PROJECT_ROOT_MARKERS.some((marker) => isDirectory(join(current, marker)))) return current;
    const parent = dirname(current);
    if (parent === current) break;
    current = parent;
  }
  return base;
}

function commonDirectory(dirs: readonly string[]): string {
  let common = dirs[0]?.split(sep) ?? [];
  for (const dir of dirs.slice(1)) {
    const parts = dir.split(sep);
    let i = 0;
    while (i < common.length && i < parts.length && common[i] === parts[i]) i++;
    common = common.slice(0, i);
  }
  return common.join(sep) || sep;
}

function isDirectory(path: string): boolean {
  return statSync(path, { throwIfNoEntry: false })?.isDirectory() ?? false;
}

/**
 * Validate input and embed its files, producing the immutable engine request.
 */
export async function prepareReviewRequest(
  input: ReviewInput,
  root: string,
  maxInputChars: number,
  embedOptions?: EmbedOptions,
): Promise<ReviewRequest> {
  const valid = validateReviewInput(input, maxInputChars);
  const { embedded, skipped } = valid.paths?.length
    ? await embedFiles(root, valid.paths, embedOptions)
    : { embedded: [], skipped: [] };

  return {
    kind: valid.kind,
    inlineText: valid.text,
    embeddedFiles: embedded,
    skippedFiles: skipped,
    constraints: valid.constraints || undefined,
    context: valid.context || undefined,
  };
}
