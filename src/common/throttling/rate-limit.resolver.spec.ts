import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { testAppConfig } from '../../../test/support/in-memory';
import { RATE_LIMITS_LOCALS_KEY, rateLimitLimit, rateLimitTtl, routeRateLimits } from './rate-limit.resolver';

function contextWithLocals(locals: Record<string, unknown>) {
  return new ExecutionContextHost([{ app: { locals } }]);
}

describe('routeRateLimits', () => {
  it('publishes every override the controllers look up', () => {
    const cfg = testAppConfig({ RATE_LIMIT_INTERACT_LIMIT: '5', RATE_LIMIT_INTERACT_TTL_SECONDS: '10' });

    expect(routeRateLimits(cfg)).toEqual({
      postWrite: { limit: 30, ttlMs: 60_000 },
      interact: { limit: 5, ttlMs: 10_000 },
    });
  });
});

describe('rateLimitLimit / rateLimitTtl', () => {
  it('read the published entry for the route', () => {
    const ctx = contextWithLocals({
      [RATE_LIMITS_LOCALS_KEY]: routeRateLimits(testAppConfig({ RATE_LIMIT_INTERACT_LIMIT: '7' })),
    });

    expect(rateLimitLimit('interact', 180)(ctx)).toBe(7);
    expect(rateLimitTtl('interact', 60)(ctx)).toBe(60_000);
  });

  it('fall back when nothing is published', () => {
    const ctx = contextWithLocals({});

    expect(rateLimitLimit('interact', 180)(ctx)).toBe(180);
    expect(rateLimitTtl('interact', 60)(ctx)).toBe(60_000);
  });
});
