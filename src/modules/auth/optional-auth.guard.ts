import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { getSessionCookie } from '../../common/session-cookie';
import { AuthService } from './auth.service';
import type { AuthedRequest } from './auth.guard';
import { ANONYMOUS } from './principal';

@Injectable()
export class OptionalAuthGuard implements CanActivate {
  constructor(private readonly auth: AuthService) {}

  async canActivate(context: ExecutionContext) {
    const req = context.switchToHttp().getRequest<AuthedRequest>();
    const principal = await this.auth.principalFromSessionToken(getSessionCookie(req));
    req.principal = principal ?? ANONYMOUS;
    return true;
  }
}
