import type { UserAuthority } from '../users/user.types';

/**
 * The acting identity for a request. Passed explicitly into every
 * authorization-sensitive service call.
 */
export type Principal =
  | { kind: 'anonymous' }
  | {
      kind: 'user';
      userId: number;
      activeBlogId: number | null;
      authorities: UserAuthority[];
    };

export type UserPrincipal = Extract<Principal, { kind: 'user' }>;

export const ANONYMOUS: Principal = { kind: 'anonymous' };

export function hasAuthority(principal: Principal, authority: UserAuthority): boolean {
  return principal.kind === 'user' && principal.authorities.includes(authority);
}
