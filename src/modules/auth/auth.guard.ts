import { CanActivate, ExecutionContext, Injectable, UnauthorizedException } from '@nestjs/common';
import type { Request } from 'express';
import { getSessionCookie } from '../../common/session-cookie';
import { AuthService } from './auth.service';
import type { Principal } from './principal';

export type AuthedRequest = Request & { principal?: Principal };

@Injectable()
export class AuthGuard implements CanActivate {
  constructor(private readonly auth: AuthService) {}

  async canActivate(context: ExecutionContext) {
    const req = context.switchToHttp().getRequest<AuthedRequest>();
    const principal = await this.auth.principalFromSessionToken(getSessionCookie(req));
    if (!principal) throw new UnauthorizedException();
    req.principal = principal;
    return true;
  }
}
