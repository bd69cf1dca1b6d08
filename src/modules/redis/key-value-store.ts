export type SetOptions = { ttlMs?: number; ttlSeconds?: number; onlyIfAbsent?: boolean };

/**
 * Minimal string store the cache layer needs. `RedisService` is the production binding;
 * tests use an in-memory map.
 */
export abstract class KeyValueStore {
  abstract getString(key: string): Promise<string | null>;
  abstract setString(key: string, value: string, opts?: SetOptions): Promise<boolean>;
  abstract del(...keys: Array<string | null | undefined>): Promise<number>;
  abstract incr(key: string): Promise<number>;
}
