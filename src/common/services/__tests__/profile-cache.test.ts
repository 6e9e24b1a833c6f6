/**
 * Jest Unit Tests for the Profile Cache
 */

import { ProfileCache } from '../profile-cache.js';
import type { UserProfile } from '../../types.js';

function fakeStore(initialVersion = 1) {
  let version = initialVersion;
  let versionFails = false;
  const getProfile = jest.fn(
    async (): Promise<UserProfile> => ({
      name: `User v${version}`,
      baselines: { systolic: 140 },
      goals: [],
      baselineDays: 30,
    })
  );
  return {
    getProfile,
    getProfileVersion: async (): Promise<number> => {
      if (versionFails) throw new Error('database is locked');
      return version;
    },
    bump() {
      version++;
    },
    failVersion() {
      versionFails = true;
    },
  };
}

describe('ProfileCache', () => {
  test('loads once while the version is unchanged', async () => {
    const store = fakeStore();
    const cache = new ProfileCache(store, 60_000);

    await cache.get();
    await cache.get();

    expect(store.getProfile).toHaveBeenCalledTimes(1);
    expect(cache.getStats()).toEqual({ hits: 1, misses: 1 });
  });

  test('a version bump reloads', async () => {
    const store = fakeStore();
    const cache = new ProfileCache(store, 60_000);

    expect((await cache.get()).name).toBe('User v1');
    store.bump();
    expect((await cache.get()).name).toBe('User v2');
    expect(cache.peek()?.version).toBe(2);
  });

  test('invalidate forces a reload', async () => {
    const store = fakeStore();
    const cache = new ProfileCache(store, 60_000);

    await cache.get();
    cache.invalidate();
    await cache.get();
    expect(store.getProfile).toHaveBeenCalledTimes(2);
  });

  test('serves the cached profile when the version check fails', async () => {
    const store = fakeStore();
    const cache = new ProfileCache(store, 60_000);

    await cache.get();
    store.failVersion();
    expect((await cache.get()).name).toBe('User v1');
  });

  test('propagates the failure when nothing is cached', async () => {
    const store = fakeStore();
    store.failVersion();
    await expect(new ProfileCache(store, 60_000).get()).rejects.toThrow('database is locked');
  });
});
