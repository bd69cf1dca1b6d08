import { Injectable } from '@nestjs/common';
import { AppConfigService } from '../app/app-config.service';
import { UsersService } from '../users/users.service';
import { hmacSha256Hex } from './auth.utils';
import type { UserPrincipal } from './principal';

/**
 * Resolves session cookies to principals. Sessions are issued elsewhere; this service only
 * reads them (token hash match, not revoked, not expired).
 */
@Injectable()
export class AuthService {
  constructor(
    private readonly appConfig: AppConfigService,
    private readonly users: UsersService,
  ) {}

  async principalFromSessionToken(token: string | undefined, now: Date = new Date()): Promise<UserPrincipal | null> {
    if (!token) return null;
    const tokenHash = hmacSha256Hex(this.appConfig.sessionHmacSecret(), token);
    const user = await this.users.findBySessionTokenHash(tokenHash, now);
    if (!user) return null;
    return {
      kind: 'user',
      userId: user.id,
      activeBlogId: user.activeBlogId,
      authorities: [...user.authorities],
    };
  }
}
