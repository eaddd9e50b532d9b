import { readFile, stat } from 'node:fs/promises';
import { extname } from 'node:path';
import type { EmbeddedFile, SkippedFile } from '../types.js';
import { ValidationError, errorMessage } from '../errors.js';
import { isLikelyBinary, safeResolveUnderRoot, toRelative, walkFiles } from '../shared/paths.js';

/** Options for embedding files */
export interface EmbedOptions {
  readonly maxBytesPerFile?: number;
  readonly maxFiles?: number;
}

export const DEFAULT_MAX_BYTES_PER_FILE = 1_000_000;
export const DEFAULT_MAX_EMBED_FILES = 2000;

/** Extensions skipped without reading */
export const BINARY_EXTENSIONS: ReadonlySet<string> = new Set([
  '.png', '.jpg', '.jpeg', '.gif', '.webp', '.ico', '.pdf',
  '.zip', '.tar', '.gz', '.7z', '.rar',
  '.exe', '.dll', '.so', '.dylib', '.class', '.jar', '.wasm', '.pyc', '.pyo',
  '.db', '.sqlite', '.parquet', '.feather', '.bin',
  '.mp3', '.mp4', '.mov', '.avi',
]);

export interface EmbedResult {
  readonly embedded: readonly EmbeddedFile[];
  readonly skipped: readonly SkippedFile[];
}

/**
 * Read the files named by `paths` (files or directories, root-relative or absolute under `root`).
 * Directories are walked in sorted order. Files that cannot be embedded are listed with a reason.
 * Throws ValidationError when a path escapes the root.
 */
export async function embedFiles(
  root: string,
  paths: readonly string[],
  options: EmbedOptions = {},
): Promise<EmbedResult> {
  const maxBytes = options.maxBytesPerFile ?? DEFAULT_MAX_BYTES_PER_FILE;
  const maxFiles = options.maxFiles ?? DEFAULT_MAX_EMBED_FILES;

  const resolved = paths.map((p) => {
    try {
      return { input: p, absolute: safeResolveUnderRoot(root, p) };
    } catch (err) {
      throw new ValidationError(`Invalid path "${p}": ${errorMessage(err)}`);
    }
  });

  const skipped: SkippedFile[] = [];
  const files: string[] = [];
  const seen = new Set<string>();
  let scanTruncated = false;

  for (const { input, absolute } of resolved) {
    if (files.length >= maxFiles) {
      scanTruncated = true;
      break;
    }

    let isDir: boolean;
    try {
      isDir = (await stat(absolute)).isDirectory();
    } catch {
      skipped.push({ path: input, reason: 'not_found' });
      continue;
    }

    // One past the cap tells us whether the walk was cut short
    const candidates = isDir ? await walkFiles(absolute, maxFiles - files.length + 1) : [absolute];
    for (const file of candidates) {
      if (seen.has(file)) continue;
      if (files.length >= maxFiles) {
        scanTruncated = true;
        break;
      }
      seen.add(file);
      files.push(file);
    }
  }

  if (scanTruncated) {
    skipped.push({
      path: '(directory scan)',
      reason: `too_many_files: stopped after ${maxFiles} files`,
    });
  }

  const embedded: EmbeddedFile[] = [];
  for (const file of files) {
    const rel = toRelative(root, file);
    if (BINARY_EXTENSIONS.has(extname(file).toLowerCase())) {
      skipped.push({ path: rel, reason: 'binary_extension' });
      continue;
    }

    let buffer: Buffer;
    try {
      const info = await stat(file);
      if (info.size > maxBytes) {
        skipped.push({ path: rel, reason: 'too_large' });
        continue;
      }
      buffer = await readFile(file);
    } catch (err) {
      skipped.push({ path: rel, reason: `read_failed: ${errorMessage(err)}` });
      continue;
    }

    if (isLikelyBinary(buffer)) {
      skipped.push({ path: rel, reason: 'binary' });
      continue;
    }
    embedded.push({ path: rel, content: buffer.toString('utf-8') });
  }

  return { embedded, skipped };
}
