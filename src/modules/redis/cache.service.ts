import { Injectable, Logger } from '@nestjs/common';
import { KeyValueStore } from './key-value-store';
import { RedisKeys, type CacheNamespace } from './redis-keys';

/**
 * Namespaced JSON cache.
 *
 * Each namespace carries a version counter that is part of every entry key. `invalidateAll`
 * bumps the counter so older entries are never read again (they expire on their own TTL),
 * which avoids pattern deletes. `invalidate` drops one entry under the current version.
 *
 * Store failures never fail the caller: reads fall back to `compute`, writes are logged.
 */
@Injectable()
export class CacheService {
  private readonly logger = new Logger(CacheService.name);

  constructor(private readonly store: KeyValueStore) {}

  private async namespaceVersion(namespace: CacheNamespace): Promise<number> {
    // The counter holds the number of bumps; an untouched namespace is at v1.
    const raw = await this.store.getString(RedisKeys.namespaceVersion(namespace));
    const bumps = raw ? Number(raw) : 0;
    return Number.isFinite(bumps) && bumps > 0 ? Math.floor(bumps) + 1 : 1;
  }

  async entryKey(namespace: CacheNamespace, key: string | number): Promise<string> {
    return RedisKeys.cacheEntry(namespace, await this.namespaceVersion(namespace), key);
  }

  private async readEntry<T>(entryKey: string): Promise<T | null> {
    const raw = await this.store.getString(entryKey);
    if (!raw) return null;
    try {
      return JSON.parse(raw) as T;
    } catch {
      // Corrupt entry; drop it.
      await this.store.del(entryKey);
      return null;
    }
  }

  private async writeEntry(entryKey: string, value: unknown, ttlSeconds: number): Promise<void> {
    await this.store.setString(entryKey, JSON.stringify(value), { ttlSeconds: Math.max(1, Math.floor(ttlSeconds || 1)) });
  }

  async getJson<T>(namespace: CacheNamespace, key: string | number): Promise<T | null> {
    return await this.readEntry<T>(await this.entryKey(namespace, key));
  }

  async setJson(namespace: CacheNamespace, key: string | number, value: unknown, ttlSeconds: number): Promise<void> {
    await this.writeEntry(await this.entryKey(namespace, key), value, ttlSeconds);
  }

  /**
   * Read-through cache for JSON values. The entry key is fixed before `compute` runs, so a value
   * computed across an `invalidateAll` lands under the old version and is never served.
   */
  async getOrSetJson<T>(params: {
    namespace: CacheNamespace;
    key: string | number;
    ttlSeconds: number;
    compute: () => Promise<T>;
  }): Promise<T> {
    const { namespace, key } = params;
    let entryKey: string;
    try {
      entryKey = await this.entryKey(namespace, key);
      const cached = await this.readEntry<T>(entryKey);
      if (cached !== null) return cached;
    } catch (err) {
      this.logger.warn(`Cache read failed ns=${namespace} key=${key}: ${err}`);
      return await params.compute();
    }

    const value = await params.compute();
    try {
      await this.writeEntry(entryKey, value, params.ttlSeconds);
    } catch (err) {
      this.logger.warn(`Cache write failed ns=${namespace} key=${key}: ${err}`);
    }
    return value;
  }

  async invalidate(namespace: CacheNamespace, key: string | number): Promise<void> {
    try {
      await this.store.del(await this.entryKey(namespace, key));
    } catch (err) {
      this.logger.warn(`Failed to invalidate ns=${namespace} key=${key}: ${err}`);
    }
  }

  async invalidateAll(namespace: CacheNamespace): Promise<void> {
    try {
      await this.store.incr(RedisKeys.namespaceVersion(namespace));
    } catch (err) {
      this.logger.warn(`Failed to bump namespace version ns=${namespace}: ${err}`);
    }
  }
}
