import { Injectable } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import {
  InjectThrottlerOptions,
  InjectThrottlerStorage,
  ThrottlerGuard,
  type ThrottlerModuleOptions,
  type ThrottlerStorage,
} from '@nestjs/throttler';
import { AuthService } from '../../modules/auth/auth.service';
import { getSessionCookie, type RequestWithCookies } from '../session-cookie';

function cookiesOf(req: Record<string, unknown>): RequestWithCookies {
  const raw = req.cookies;
  if (typeof raw !== 'object' || raw === null) return {};
  const cookies: Record<string, string | undefined> = {};
  for (const [name, value] of Object.entries(raw)) {
    if (typeof value === 'string') cookies[name] = value;
  }
  return { cookies };
}

/**
 * Throttling key strategy:
 * - a valid session cookie throttles by user id (shared across that user's sessions)
 * - anything else throttles by IP
 *
 * Runs globally before route guards, so it resolves the session itself.
 */
@Injectable()
export class SessionThrottlerGuard extends ThrottlerGuard {
  constructor(
    @InjectThrottlerOptions() options: ThrottlerModuleOptions,
    @InjectThrottlerStorage() storageService: ThrottlerStorage,
    reflector: Reflector,
    private readonly auth: AuthService,
  ) {
    super(options, storageService, reflector);
  }

  protected async getTracker(req: Record<string, unknown>): Promise<string> {
    const token = getSessionCookie(cookiesOf(req));
    if (token) {
      const principal = await this.auth.principalFromSessionToken(token);
      if (principal) return `user:${principal.userId}`;
    }
    return await super.getTracker(req);
  }
}
