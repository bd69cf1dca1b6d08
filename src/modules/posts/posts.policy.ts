import { ForbiddenException } from '@nestjs/common';
import { hasAuthority, type Principal } from '../auth/principal';
import type { Post } from './post.types';

export function canManagePost(principal: Principal, post: Post): boolean {
  if (principal.kind === 'anonymous') return false;
  if (principal.activeBlogId != null && post.blog.id === principal.activeBlogId) return true;
  return hasAuthority(principal, 'POST_MANAGE');
}

export function assertCanManagePost(principal: Principal, post: Post): void {
  if (principal.kind === 'anonymous') throw new ForbiddenException('User is anonymous.');
  if (!canManagePost(principal, post)) throw new ForbiddenException('User does not own post.');
}
