import type { ExecutionContext } from '@nestjs/common';
import type { AppConfigService } from '../../modules/app/app-config.service';

export type RateLimitEntry = { limit: number; ttlMs: number };

/** Route-specific limits are published on Express `app.locals` by main.ts. */
export const RATE_LIMITS_LOCALS_KEY = 'microblogRateLimits';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isEntry(value: unknown): value is RateLimitEntry {
  if (!isRecord(value)) return false;
  const { limit, ttlMs } = value;
  return typeof limit === 'number' && limit > 0 && typeof ttlMs === 'number' && ttlMs > 0;
}

function getEntry(ctx: ExecutionContext, key: string): RateLimitEntry | null {
  const req: unknown = ctx.switchToHttp().getRequest();
  if (!isRecord(req) || !isRecord(req.app) || !isRecord(req.app.locals)) return null;
  const store = req.app.locals[RATE_LIMITS_LOCALS_KEY];
  if (!isRecord(store)) return null;
  const entry = store[key];
  return isEntry(entry) ? entry : null;
}

/** Overrides published by main.ts, keyed as the controllers look them up. */
export function routeRateLimits(cfg: AppConfigService): Record<string, RateLimitEntry> {
  return {
    postWrite: { limit: cfg.rateLimitPostWriteLimit(), ttlMs: cfg.rateLimitPostWriteTtlSeconds() * 1000 },
    interact: { limit: cfg.rateLimitInteractLimit(), ttlMs: cfg.rateLimitInteractTtlSeconds() * 1000 },
  };
}

export function rateLimitLimit(key: string, fallback: number) {
  return (ctx: ExecutionContext) => getEntry(ctx, key)?.limit ?? fallback;
}

/** Fallback is in seconds; throttler v6 takes milliseconds. */
export function rateLimitTtl(key: string, fallbackSeconds: number) {
  return (ctx: ExecutionContext) => getEntry(ctx, key)?.ttlMs ?? fallbackSeconds * 1000;
}
