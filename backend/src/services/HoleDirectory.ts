import type { Hole, HoleSetCache, HoleSource, ProjectId } from '../types/Telemetry';
import { createLogger } from '../utils/logger';

/**
 * HoleDirectory - TTL cache of each project's hole set
 *
 * A cache entry is always a complete snapshot of one successful listing.
 * Failed refreshes leave the previous snapshot in place and it keeps being
 * served until a listing succeeds or the cache is invalidated.
 */

export interface HoleDirectoryOptions {
  /** Cache TTL in milliseconds (default: 5 minutes) */
  ttlMs?: number;
}

export interface HoleCacheEntryStats {
  projectId: string;
  holeCount: number;
  fetchedAt: Date;
  ageMs: number;
  valid: boolean;
}

export const DEFAULT_HOLE_CACHE_TTL_MS = 300_000;

export class HoleDirectory {
  private readonly logger = createLogger({ component: 'HoleDirectory' });
  private readonly source: HoleSource;
  private readonly ttlMs: number;
  private readonly cache: Map<string, HoleSetCache> = new Map();
  private readonly pendingFetches: Map<string, Promise<readonly Hole[]>> = new Map();
  // Bumped by invalidate(); a listing started under an older generation is never cached
  private readonly generations: Map<string, number> = new Map();

  constructor(source: HoleSource, options: HoleDirectoryOptions = {}) {
    this.source = source;
    this.ttlMs = options.ttlMs ?? DEFAULT_HOLE_CACHE_TTL_MS;
  }

  /**
   * Holes of a project, from cache while fresh, otherwise from the remote listing
   */
  async getHoles(projectId: ProjectId): Promise<readonly Hole[]> {
    const key = String(projectId);
    const cached = this.cache.get(key);

    if (cached && this.isValid(cached)) {
      return cached.holes;
    }

    // Callers arriving while a refresh is in flight share it
    const pending = this.pendingFetches.get(key);
    if (pending) {
      return pending;
    }

    const request = this.refresh(projectId, key);
    this.pendingFetches.set(key, request);

    try {
      return await request;
    } finally {
      if (this.pendingFetches.get(key) === request) {
        this.pendingFetches.delete(key);
      }
    }
  }

  /**
   * Drop cached holes for one project, or for all of them
   */
  invalidate(projectId?: ProjectId): void {
    const keys = projectId === undefined
      ? new Set([...this.cache.keys(), ...this.pendingFetches.keys()])
      : [String(projectId)];

    for (const key of keys) {
      this.cache.delete(key);
      this.pendingFetches.delete(key);
      this.generations.set(key, this.generationOf(key) + 1);
    }

    if (projectId === undefined) {
      this.logger.info('Hole cache cleared');
    } else {
      this.logger.info({ projectId }, 'Hole cache cleared for project');
    }
  }

  getTtlMs(): number {
    return this.ttlMs;
  }

  getCacheStats(): { projects: number; entries: HoleCacheEntryStats[] } {
    const now = Date.now();
    const entries = Array.from(this.cache.entries()).map(([projectId, entry]) => ({
      projectId,
      holeCount: entry.holes.length,
      fetchedAt: new Date(entry.fetchedAt),
      ageMs: now - entry.fetchedAt,
      valid: this.isValid(entry, now),
    }));

    return { projects: entries.length, entries };
  }

  private generationOf(key: string): number {
    return this.generations.get(key) ?? 0;
  }

  private isValid(entry: HoleSetCache, now: number = Date.now()): boolean {
    return now - entry.fetchedAt < entry.ttlMs;
  }

  private async refresh(projectId: ProjectId, key: string): Promise<readonly Hole[]> {
    const generation = this.generationOf(key);
    let holes: Hole[] | null = null;

    try {
      holes = await this.source.getAllHoles(projectId);
    } catch (error) {
      this.logger.error({ projectId, error }, 'Hole listing threw');
    }

    if (holes === null) {
      const previous = this.cache.get(key);
      this.logger.warn(
        { projectId, staleHoles: previous?.holes.length ?? 0 },
        'Could not refresh holes, keeping previous snapshot'
      );
      return previous?.holes ?? [];
    }

    const snapshot: readonly Hole[] = Object.freeze([...holes]);
    if (generation !== this.generationOf(key)) {
      this.logger.debug({ projectId }, 'Cache invalidated during listing, not storing it');
      return snapshot;
    }

    this.cache.set(key, {
      holes: snapshot,
      fetchedAt: Date.now(),
      ttlMs: this.ttlMs,
    });

    this.logger.info({ projectId, holeCount: snapshot.length }, 'Loaded holes from API');
    return snapshot;
  }
}
