import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import type { AuthedRequest } from './auth.guard';
import { ANONYMOUS, type Principal } from './principal';

/**
 * The principal attached by AuthGuard / OptionalAuthGuard. Routes without either guard
 * see an anonymous principal.
 */
export const CurrentPrincipal = createParamDecorator((_data: unknown, ctx: ExecutionContext): Principal => {
  const req = ctx.switchToHttp().getRequest<AuthedRequest>();
  return req.principal ?? ANONYMOUS;
});
