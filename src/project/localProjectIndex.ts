import { readFile, readdir, stat } from 'node:fs/promises';
import { existsSync, statSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { minimatch } from 'minimatch';
import { ProjectIndexError, errorMessage } from '../errors.js';
import {
  isLikelyBinary,
  isRealPathUnder,
  isUnder,
  safeResolveUnderRoot,
  toRelative,
  walkFiles,
} from '../shared/paths.js';
import { DEFAULT_MAX_DIR_ENTRIES, DEFAULT_MAX_SEARCH_RESULTS } from '../types.js';
import type {
  ActivationResult,
  DirectoryEntry,
  DirectoryListing,
  FileRange,
  FileSlice,
  MemoryContent,
  MemoryList,
  ProjectIndex,
  SearchResult,
} from './projectIndex.js';

/** Marker directory that enables the index for a project */
export const INDEX_DIR_NAME = '.twin-review';

/** Memory read by `read_project_overview` */
export const PROJECT_OVERVIEW_MEMORY = 'project_overview';

const MAX_FILE_BYTES = 1_000_000;
const MAX_PATTERN_LENGTH = 500;
const MAX_MATCH_LINE_CHARS = 200;
const MAX_SEARCH_FILES = 5000;

export interface LocalProjectIndexLimits {
  readonly maxDirEntries: number;
  readonly maxSearchResults: number;
}

/**
 * Filesystem-backed ProjectIndex rooted at a project directory.
 * Memories are Markdown files under `.twin-review/memories/`.
 */
export class LocalProjectIndex implements ProjectIndex {
  readonly root: string;
  private readonly memoriesDir: string;
  private readonly limits: LocalProjectIndexLimits;

  constructor(root: string, limits: Partial<LocalProjectIndexLimits> = {}) {
    this.root = resolve(root);
    this.memoriesDir = join(this.root, INDEX_DIR_NAME, 'memories');
    this.limits = {
      maxDirEntries: limits.maxDirEntries ?? DEFAULT_MAX_DIR_ENTRIES,
      maxSearchResults: limits.maxSearchResults ?? DEFAULT_MAX_SEARCH_RESULTS,
    };
  }

  /**
   * Return an index for `root` if it carries the `.twin-review/` marker directory.
   */
  static detect(root: string, limits?: Partial<LocalProjectIndexLimits>): LocalProjectIndex | null {
    const marker = join(resolve(root), INDEX_DIR_NAME);
    if (existsSync(marker) && statSync(marker).isDirectory()) {
      return new LocalProjectIndex(root, limits);
    }
    return null;
  }

  async activateProject(project: string): Promise<ActivationResult> {
    const requested = project.trim() === '' ? '.' : project.trim();
    const allowed = new Set(['.', this.root, this.root.replace(/\/+$/, '')]);
    if (!allowed.has(requested)) {
      throw new ProjectIndexError('Only the current project root can be activated');
    }
    return {
      status: 'activated',
      project: requested,
      note: 'Project activated. Other read-only tools are now available.',
    };
  }

  async listDirectory(path: string): Promise<DirectoryListing> {
    const target = this.resolvePath(path);
    const info = await this.statOrThrow(target);
    if (!info.isDirectory()) throw new ProjectIndexError('path is not a directory');

    const names = (await readdir(target, { withFileTypes: true }))
      .map((d) => ({ name: d.name, isDir: d.isDirectory() }))
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    const entries: DirectoryEntry[] = names
      .slice(0, this.limits.maxDirEntries)
      .map((d) => ({ name: d.name, type: d.isDir ? 'dir' : 'file' }));

    return {
      path: toRelative(this.root, target),
      entries,
      truncated: names.length > this.limits.maxDirEntries,
    };
  }

  async readFile(path: string, range: FileRange = {}): Promise<FileSlice> {
    const target = this.resolvePath(path);
    const info = await this.statOrThrow(target);
    if (!info.isFile()) throw new ProjectIndexError('path is not a file');

    const { head, tail } = range;
    if (head != null && (!Number.isInteger(head) || head < 0)) {
      throw new ProjectIndexError('head must be a non-negative integer');
    }
    if (tail != null && (!Number.isInteger(tail) || tail < 0)) {
      throw new ProjectIndexError('tail must be a non-negative integer');
    }
    if (info.size > MAX_FILE_BYTES && head == null && tail == null) {
      throw new ProjectIndexError('file is too large to read without head/tail');
    }

    const buffer = await readFile(target);
    if (isLikelyBinary(buffer)) throw new ProjectIndexError('file appears to be binary');

    let lines = buffer.toString('utf-8').split('\n');
    if (head != null && tail != null && head + tail < lines.length) {
      lines = [
        ...lines.slice(0, head),
        '[NOTE: Middle of file omitted.]',
        ...(tail === 0 ? [] : lines.slice(-tail)),
      ];
    } else if (head != null) {
      lines = lines.slice(0, head);
    } else if (tail != null) {
      lines = tail === 0 ? [] : lines.slice(-tail);
    }

    return { path: toRelative(this.root, target), content: lines.join('\n') };
  }

  async readMemory(name: string): Promise<MemoryContent> {
    const trimmed = name.trim();
    if (trimmed === '') throw new ProjectIndexError('name must be a non-empty string');

    const filename = trimmed.endsWith('.md') ? trimmed : `${trimmed}.md`;
    if (filename.split(/[\\/]/).length > 1) {
      throw new ProjectIndexError('memory names must not contain path separators');
    }
    const target = join(this.memoriesDir, filename);
    if (!isUnder(target, this.memoriesDir) || !existsSync(target)) {
      throw new ProjectIndexError('memory not found');
    }
    if (!isRealPathUnder(target, this.memoriesDir)) {
      throw new ProjectIndexError('memory resolves outside the memories directory');
    }

    const content = await readFile(target, 'utf-8');
    return { name: filename, content };
  }

  async listMemories(): Promise<MemoryList> {
    if (!existsSync(this.memoriesDir)) {
      return { memories: [], note: `No ${INDEX_DIR_NAME}/memories directory found.` };
    }
    const entries = await readdir(this.memoriesDir, { withFileTypes: true });
    const memories = entries
      .filter((e) => e.isFile() && e.name.endsWith('.md'))
      .map((e) => e.name)
      .sort();
    return { memories };
  }

  /**
   * Literal substring search over text files.
   * `scope` is a root-relative directory or file, or a minimatch glob over root-relative paths.
   */
  async searchPattern(pattern: string, scope?: string): Promise<SearchResult> {
    if (pattern.trim() === '') throw new ProjectIndexError('pattern must be a non-empty string');
    if (pattern.length > MAX_PATTERN_LENGTH) {
      throw new ProjectIndexError(`pattern must be at most ${MAX_PATTERN_LENGTH} characters`);
    }

    const candidates = await this.searchCandidates(scope);
    const matches: string[] = [];

    for (const file of candidates) {
      if (matches.length >= this.limits.maxSearchResults) break;

      let buffer: Buffer;
      try {
        const info = await stat(file);
        if (info.size > MAX_FILE_BYTES) continue;
        buffer = await readFile(file);
      } catch {
        // Unreadable files are not search results
        continue;
      }
      if (isLikelyBinary(buffer)) continue;

      const rel = toRelative(this.root, file);
      const lines = buffer.toString('utf-8').split('\n');
      for (let i = 0; i < lines.length; i++) {
        if (matches.length >= this.limits.maxSearchResults) break;
        const line = lines[i]!;
        if (line.includes(pattern)) {
          matches.push(`${rel}:${i + 1}:${line.slice(0, MAX_MATCH_LINE_CHARS)}`);
        }
      }
    }

    return matches.length >= this.limits.maxSearchResults
      ? { matches, note: `Stopped after ${this.limits.maxSearchResults} matches.` }
      : { matches };
  }

  private async searchCandidates(scope: string | undefined): Promise<string[]> {
    const trimmed = scope?.trim();
    if (!trimmed || trimmed === '.') {
      return walkFiles(this.root, MAX_SEARCH_FILES);
    }

    if (/[*?[\]{}]/.test(trimmed)) {
      const all = await walkFiles(this.root, MAX_SEARCH_FILES);
      return all.filter((f) => minimatch(toRelative(this.root, f), trimmed, { dot: false }));
    }

    const target = this.resolvePath(trimmed);
    const info = await this.statOrThrow(target);
    return info.isFile() ? [target] : walkFiles(target, MAX_SEARCH_FILES);
  }

  private resolvePath(path: string): string {
    if (path.trim() === '.') return this.root;
    try {
      return safeResolveUnderRoot(this.root, path);
    } catch (err) {
      throw new ProjectIndexError(errorMessage(err));
    }
  }

  private async statOrThrow(target: string) {
    try {
      return await stat(target);
    } catch {
      throw new ProjectIndexError('path not found');
    }
  }
}
