import type { ModelMetadata } from '../types.js';
import { DEFAULT_METADATA_TTL } from '../types.js';
import { ReviewError, errorMessage } from '../errors.js';
import { raceAbort } from '../shared/deadline.js';
import { silentLogger, type Logger } from '../shared/logger.js';
import type { ModelApi } from './modelApi.js';

export interface CapabilityCacheOptions {
  /** Entry lifetime in seconds (default: 3600) */
  readonly ttlSeconds?: number;
  /**
   * Extra seconds past TTL during which a stale entry may still be served
   * when a re-fetch fails (default: same as TTL)
   */
  readonly staleGraceSeconds?: number;
  /** Clock in epoch ms (tests) */
  readonly now?: () => number;
  readonly logger?: Logger;
}

/**
 * Process-scoped cache of model capability metadata.
 *
 * - Entries live for `ttlSeconds`; a re-fetch supersedes the entry, never mutates it.
 * - At most one listing fetch is in flight; every caller waiting on any model id shares it.
 * - A caller's signal only abandons that caller's wait, never the shared fetch.
 */
export class ModelCapabilityCache {
  private readonly entries = new Map<string, ModelMetadata>();
  private inflight: Promise<number> | undefined;
  private readonly ttlMs: number;
  private readonly graceMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(
    private readonly api: ModelApi,
    options: CapabilityCacheOptions = {},
  ) {
    const ttlSeconds = options.ttlSeconds ?? DEFAULT_METADATA_TTL;
    this.ttlMs = ttlSeconds * 1000;
    this.graceMs = (options.staleGraceSeconds ?? ttlSeconds) * 1000;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Resolve capability metadata for `modelId`, fetching on miss or expiry.
   * Rejects with `metadata_unavailable` when no usable entry can be produced.
   */
  resolve(modelId: string, signal?: AbortSignal): Promise<ModelMetadata> {
    const cached = this.entries.get(modelId);
    if (cached && this.isFresh(cached)) {
      return Promise.resolve(cached);
    }

    return raceAbort(this.fetch(modelId), signal);
  }

  /** Cached entry without fetching (fresh or stale) */
  peek(modelId: string): ModelMetadata | undefined {
    return this.entries.get(modelId);
  }

  /** Drop every entry; in-flight fetches still complete and repopulate */
  clear(): void {
    this.entries.clear();
  }

  private isFresh(entry: ModelMetadata): boolean {
    return this.now() - entry.fetchedAt < this.ttlMs;
  }

  private isWithinGrace(entry: ModelMetadata): boolean {
    return this.now() - entry.fetchedAt < this.ttlMs + this.graceMs;
  }

  /** Start the shared listing fetch, or join the one in flight; resolves to its `fetchedAt` */
  private refresh(): Promise<number> {
    if (!this.inflight) {
      this.inflight = this.loadListing().finally(() => {
        this.inflight = undefined;
      });
    }
    return this.inflight;
  }

  private async loadListing(): Promise<number> {
    this.logger.debug('Fetching model metadata listing');
    // Shared fetch: not bound to any single caller's signal
    const listing = await this.api.listModels();

    const fetchedAt = this.now();
    for (const info of listing) {
      this.entries.set(info.id, { ...info, fetchedAt });
    }
    this.logger.debug(`Cached metadata for ${listing.length} model(s)`);
    return fetchedAt;
  }

  private async fetch(modelId: string): Promise<ModelMetadata> {
    let fetchedAt: number;
    try {
      fetchedAt = await this.refresh();
    } catch (err) {
      const previous = this.entries.get(modelId);
      if (previous && this.isWithinGrace(previous)) {
        this.logger.warn(
          `Model metadata fetch failed; serving stale entry for ${modelId}: ${errorMessage(err)}`,
        );
        return previous;
      }
      throw new ReviewError(
        'metadata_unavailable',
        `Model metadata unavailable for ${modelId}: ${errorMessage(err)}`,
        { cause: err },
      );
    }

    const entry = this.entries.get(modelId);
    if (!entry || entry.fetchedAt !== fetchedAt) {
      throw new ReviewError(
        'metadata_unavailable',
        `Model '${modelId}' not found in the models listing`,
      );
    }
    return entry;
  }
}
