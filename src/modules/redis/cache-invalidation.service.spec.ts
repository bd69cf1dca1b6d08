import { InMemoryKeyValueStore } from '../../../test/support/in-memory';
import { CacheInvalidationService } from './cache-invalidation.service';
import { CacheService } from './cache.service';
import { CacheNamespaces, RedisKeys } from './redis-keys';

function makeService() {
  const store = new InMemoryKeyValueStore();
  const cache = new CacheService(store);
  const svc = new CacheInvalidationService(cache);
  return { svc, cache, store };
}

describe('CacheInvalidationService.bumpForPostWrite', () => {
  it('bumps the listing namespace once and drops each unique post entry', async () => {
    const { svc, store } = makeService();
    store.values.set(RedisKeys.cacheEntry(CacheNamespaces.posts, 1, 7), '{"id":7}');
    store.values.set(RedisKeys.cacheEntry(CacheNamespaces.posts, 1, 3), '{"id":3}');
    store.values.set(RedisKeys.cacheEntry(CacheNamespaces.posts, 1, 9), '{"id":9}');
    const del = jest.spyOn(store, 'del');

    await svc.bumpForPostWrite({ postIds: [7, 3, 7, null, undefined, 0, -1] });

    expect(store.values.get(RedisKeys.namespaceVersion(CacheNamespaces.postsPage))).toBe('1');
    expect(del).toHaveBeenCalledTimes(2);
    expect(store.values.has(RedisKeys.cacheEntry(CacheNamespaces.posts, 1, 7))).toBe(false);
    expect(store.values.has(RedisKeys.cacheEntry(CacheNamespaces.posts, 1, 3))).toBe(false);
    expect(store.values.get(RedisKeys.cacheEntry(CacheNamespaces.posts, 1, 9))).toBe('{"id":9}');
  });

  it('never throws when the store is down', async () => {
    const { svc, store } = makeService();
    store.failing = true;

    await expect(svc.bumpForPostWrite({ postIds: [1] })).resolves.toBeUndefined();
  });
});
