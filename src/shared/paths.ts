import { existsSync, realpathSync } from 'node:fs';
import { readdir } from 'node:fs/promises';
import { homedir } from 'node:os';
import { dirname, isAbsolute, join, parse, relative, resolve, sep } from 'node:path';

/** Directory names never walked into */
export const EXCLUDED_DIR_NAMES: ReadonlySet<string> = new Set([
  '.git',
  '.venv',
  '__pycache__',
  'node_modules',
  'dist',
  '.twin-review',
]);

const BLOCKED_PREFIXES = [
  '/etc',
  '/proc',
  '/sys',
  '/dev',
  '/run',
  '/var',
  '/bin',
  '/sbin',
  '/lib',
  '/lib64',
  '/boot',
];

/**
 * Resolve `pathStr` (absolute or root-relative) and ensure it stays under `root`,
 * both as written and once symlinks are followed.
 * Throws on blank input, `..` segments, or a location outside the root.
 */
export function safeResolveUnderRoot(root: string, pathStr: string): string {
  if (pathStr.trim() === '') {
    throw new Error('path must be a non-empty string');
  }
  if (/^[A-Za-z]:[\\/]/.test(pathStr) || pathStr.startsWith('\\\\')) {
    throw new Error('windows absolute paths are not supported');
  }
  if (pathStr.split(/[\\/]/).includes('..')) {
    throw new Error('path traversal is not allowed');
  }

  const resolvedRoot = resolve(root);
  const resolved = isAbsolute(pathStr) ? resolve(pathStr) : resolve(resolvedRoot, pathStr);
  if (!isUnder(resolved, resolvedRoot)) {
    throw new Error('path is outside the project root');
  }
  if (!isRealPathUnder(resolved, resolvedRoot)) {
    throw new Error('path resolves outside the project root through a symlink');
  }
  return resolved;
}

/**
 * True if `target` stays under `parent` after following symlinks.
 * A path that does not exist yet is judged by its nearest existing ancestor.
 */
export function isRealPathUnder(target: string, parent: string): boolean {
  return isUnder(realpathOfNearest(target), realpathOfNearest(parent));
}

function realpathOfNearest(path: string): string {
  let probe = resolve(path);
  while (!existsSync(probe)) {
    const up = dirname(probe);
    if (up === probe) return probe;
    probe = up;
  }
  return realpathSync(probe);
}

/** True if `child` is `parent` or lies beneath it */
export function isUnder(child: string, parent: string): boolean {
  const rel = relative(parent, child);
  return rel === '' || (!rel.startsWith('..') && !isAbsolute(rel));
}

/** Root-relative POSIX path for display */
export function toRelative(root: string, absPath: string): string {
  const rel = relative(resolve(root), absPath);
  return rel === '' ? '.' : rel.split(sep).join('/');
}

/**
 * Guard against reviewing whole system directories:
 * filesystem roots, the home directory itself, and well-known system trees.
 */
export function isDangerousRoot(root: string, home: string = homedir()): boolean {
  const resolved = resolve(root);
  if (parse(resolved).root === resolved) return true;
  if (resolved === resolve(home)) return true;
  return BLOCKED_PREFIXES.some((prefix) => isUnder(resolved, prefix));
}

/**
 * Detect if a buffer contains binary content.
 * Uses null byte detection over the first 8KB (common heuristic).
 */
export function isLikelyBinary(buffer: Buffer): boolean {
  const checkLength = Math.min(buffer.length, 8192);
  for (let i = 0; i < checkLength; i++) {
    if (buffer[i] === 0) {
      return true;
    }
  }
  return false;
}

/**
 * Walk files under `dir` in deterministic (sorted) order, pruning hidden and excluded directories.
 * Hidden files are skipped. Stops early when `limit` files have been yielded.
 */
export async function walkFiles(dir: string, limit = Number.POSITIVE_INFINITY): Promise<string[]> {
  const out: string[] = [];

  const visit = async (current: string): Promise<void> => {
    const entries = await readdir(current, { withFileTypes: true });
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      if (out.length >= limit) return;
      if (entry.name.startsWith('.')) continue;
      const full = join(current, entry.name);
      if (entry.isDirectory()) {
        if (EXCLUDED_DIR_NAMES.has(entry.name)) continue;
        await visit(full);
      } else if (entry.isFile()) {
        out.push(full);
      }
    }
  };

  await visit(dir);
  return out;
}
