import { ForbiddenException } from '@nestjs/common';
import { ANONYMOUS, type Principal } from '../auth/principal';
import type { Post } from './post.types';
import { assertCanManagePost, canManagePost } from './posts.policy';

const post: Post = {
  id: 1,
  createdAt: new Date('2024-01-01T00:00:00.000Z'),
  updatedAt: new Date('2024-01-01T00:00:00.000Z'),
  title: 't',
  content: '',
  sensitive: false,
  published: true,
  category: 'ROOT',
  parentPostId: null,
  blog: {
    id: 10,
    createdAt: new Date('2024-01-01T00:00:00.000Z'),
    blogName: 'alice',
    preferredBlogName: 'alice',
    isPrivate: false,
    userId: 1,
  },
  attachments: [],
  postTags: [],
};

function user(activeBlogId: number | null, authorities: Array<'POST_MANAGE' | 'BLOG_MANAGE'> = []): Principal {
  return { kind: 'user', userId: 1, activeBlogId, authorities };
}

describe('posts policy', () => {
  it('rejects anonymous principals', () => {
    expect(canManagePost(ANONYMOUS, post)).toBe(false);
    expect(() => assertCanManagePost(ANONYMOUS, post)).toThrow(new ForbiddenException('User is anonymous.'));
  });

  it('allows the owning blog', () => {
    expect(() => assertCanManagePost(user(10), post)).not.toThrow();
  });

  it('rejects other blogs', () => {
    expect(() => assertCanManagePost(user(11), post)).toThrow(new ForbiddenException('User does not own post.'));
    expect(() => assertCanManagePost(user(null), post)).toThrow('User does not own post.');
  });

  it('allows POST_MANAGE regardless of ownership', () => {
    expect(canManagePost(user(11, ['POST_MANAGE']), post)).toBe(true);
    expect(canManagePost(user(11, ['BLOG_MANAGE']), post)).toBe(false);
  });
});
