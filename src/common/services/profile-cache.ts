/**
 * Profile Cache - read-through cache for the user profile
 *
 * The profile (baselines + goals) is read by every query but changes rarely.
 * Entries carry the store's profile version and the load time; a version
 * bump, the TTL, or invalidate() forces a reload.
 *
 * One instance is shared by the coach and the jobs through injection.
 */

import { LRUCache } from 'lru-cache';
import type { UserProfile } from '../types.js';
import type { HealthStore } from './health-store.js';
import { logDebug, logWarn } from './logger.js';

const PROFILE_KEY = 'profile';
const DEFAULT_TTL_MS = parseInt(process.env.PROFILE_CACHE_TTL_MS || '300000', 10);

export interface CachedProfile {
  profile: UserProfile;
  version: number;
  loadedAt: number;
}

export class ProfileCache {
  private cache: LRUCache<string, CachedProfile>;
  private hits = 0;
  private misses = 0;

  constructor(
    private store: Pick<HealthStore, 'getProfile' | 'getProfileVersion'>,
    ttlMs: number = DEFAULT_TTL_MS
  ) {
    this.cache = new LRUCache<string, CachedProfile>({ max: 1, ttl: ttlMs });
  }

  async get(): Promise<UserProfile> {
    const cached = this.cache.get(PROFILE_KEY);

    let version: number;
    try {
      version = await this.store.getProfileVersion();
    } catch (error) {
      if (cached) {
        logWarn('Profile version check failed, serving cached profile', {
          error: error instanceof Error ? error.message : String(error),
          cached_version: cached.version,
        });
        return cached.profile;
      }
      throw error;
    }

    if (cached && cached.version === version) {
      this.hits++;
      return cached.profile;
    }

    this.misses++;
    const profile = await this.store.getProfile();
    this.cache.set(PROFILE_KEY, { profile, version, loadedAt: Date.now() });
    logDebug('Profile loaded', { version, baseline_days: profile.baselineDays });
    return profile;
  }

  /**
   * Drop the cached profile. Call after a profile or goal update.
   */
  invalidate(): void {
    this.cache.clear();
  }

  peek(): CachedProfile | undefined {
    return this.cache.peek(PROFILE_KEY);
  }

  getStats(): { hits: number; misses: number } {
    return { hits: this.hits, misses: this.misses };
  }
}
