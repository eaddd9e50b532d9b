/** Result of activating the project */
export interface ActivationResult {
  readonly status: 'activated';
  readonly project: string;
  readonly note: string;
}

export interface DirectoryEntry {
  readonly name: string;
  readonly type: 'dir' | 'file';
}

export interface DirectoryListing {
  readonly path: string;
  readonly entries: readonly DirectoryEntry[];
  readonly truncated: boolean;
}

export interface FileSlice {
  readonly path: string;
  readonly content: string;
}

export interface FileRange {
  /** Only the first N lines */
  readonly head?: number;
  /** Only the last N lines */
  readonly tail?: number;
}

export interface MemoryContent {
  readonly name: string;
  readonly content: string;
}

export interface MemoryList {
  readonly memories: readonly string[];
  readonly note?: string;
}

export interface SearchResult {
  /** `path:line:text` entries */
  readonly matches: readonly string[];
  readonly note?: string;
}

/**
 * Read-only project index that reviewer models may query through the tool bridge.
 * Operations reject with `ProjectIndexError` for refused or failed lookups; the bridge
 * reports those back to the model instead of failing the invocation.
 */
export interface ProjectIndex {
  /** Absolute project root */
  readonly root: string;
  activateProject(project: string): Promise<ActivationResult>;
  listDirectory(path: string): Promise<DirectoryListing>;
  readFile(path: string, range?: FileRange): Promise<FileSlice>;
  readMemory(name: string): Promise<MemoryContent>;
  listMemories(): Promise<MemoryList>;
  searchPattern(pattern: string, scope?: string): Promise<SearchResult>;
}
