import * as crypto from 'node:crypto';

function clean(s: string | number | null | undefined): string {
  return String(s ?? '').trim();
}

type JsonLike = null | undefined | string | number | boolean | JsonLike[] | { [key: string]: JsonLike };

export function stableJsonHash(value: JsonLike): string {
  // Stable enough for cache keys: JSON stringify with deterministic key order.
  const stable = (v: JsonLike): JsonLike => {
    if (v == null || typeof v !== 'object') return v;
    if (Array.isArray(v)) return v.map(stable);
    const out: { [key: string]: JsonLike } = {};
    for (const k of Object.keys(v).sort()) out[k] = stable(v[k]);
    return out;
  };
  const json = JSON.stringify(stable(value)) ?? '';
  return crypto.createHash('sha256').update(json).digest('hex').slice(0, 20);
}

export const CacheNamespaces = {
  posts: 'posts',
  postsPage: 'posts.page',
} as const;

export type CacheNamespace = (typeof CacheNamespaces)[keyof typeof CacheNamespaces];

export const RedisKeys = {
  namespaceVersion(namespace: string): string {
    return `ver:${clean(namespace)}`;
  },
  cacheEntry(namespace: string, version: number, key: string | number): string {
    const v = Number.isFinite(version) && version > 0 ? Math.floor(version) : 1;
    return `cache:${clean(namespace)}:v${v}:${clean(key)}`;
  },
} as const;
