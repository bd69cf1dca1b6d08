import { BadRequestException, ForbiddenException, NotFoundException } from '@nestjs/common';
import {
  ImmediateTransactionManager,
  InMemoryBlogsRepository,
  InMemoryFollowsRepository,
  InMemoryUsersRepository,
} from '../../../test/support/in-memory';
import { toPageRequest } from '../../common/pagination/page';
import { ANONYMOUS, type Principal } from '../auth/principal';
import { BlogsService } from '../blogs/blogs.service';
import { UsersService } from '../users/users.service';
import { FollowsService } from './follows.service';

async function makeService() {
  const blogsRepo = new InMemoryBlogsRepository();
  const followsRepo = new InMemoryFollowsRepository();
  const tx = new ImmediateTransactionManager();
  const blogs = new BlogsService(blogsRepo, new UsersService(new InMemoryUsersRepository()), tx);
  const svc = new FollowsService(followsRepo, blogs, tx);

  const alice = await blogs.save({ blogName: 'alice', preferredBlogName: 'Alice', isPrivate: false, userId: 1 });
  const bob = await blogs.save({ blogName: 'bob', preferredBlogName: 'Bob', isPrivate: false, userId: 2 });
  const carol = await blogs.save({ blogName: 'carol', preferredBlogName: 'Carol', isPrivate: false, userId: 3 });
  const as = (blogId: number): Principal => ({ kind: 'user', userId: blogId, activeBlogId: blogId, authorities: [] });
  return { svc, followsRepo, alice, bob, carol, as };
}

describe('FollowsService', () => {
  it('follow creates a follow from the active blog to the named blog', async () => {
    const { svc, alice, bob, as } = await makeService();

    const follow = await svc.follow(as(alice.id), 'bob');

    expect(follow).toMatchObject({
      follower: { id: alice.id, blogName: 'alice' },
      followee: { id: bob.id, blogName: 'bob' },
      notificationsEnabled: false,
      muted: false,
    });
  });

  it('follow is idempotent', async () => {
    const { svc, followsRepo, alice, as } = await makeService();

    const first = await svc.follow(as(alice.id), 'bob');
    const second = await svc.follow(as(alice.id), 'bob');

    expect(second.id).toBe(first.id);
    expect(followsRepo.follows.size).toBe(1);
  });

  it('rejects following yourself, anonymous callers and unknown blogs', async () => {
    const { svc, alice, as } = await makeService();

    await expect(svc.follow(as(alice.id), 'alice')).rejects.toThrow(
      new BadRequestException('You cannot follow yourself.'),
    );
    await expect(svc.follow(ANONYMOUS, 'bob')).rejects.toThrow(ForbiddenException);
    await expect(svc.follow(as(alice.id), 'nobody')).rejects.toThrow('Blog with name nobody is not found.');
  });

  it('unfollow removes the follow and is idempotent', async () => {
    const { svc, followsRepo, alice, as } = await makeService();
    await svc.follow(as(alice.id), 'bob');

    await svc.unfollow(as(alice.id), 'bob');
    await svc.unfollow(as(alice.id), 'bob');

    expect(followsRepo.follows.size).toBe(0);
  });

  it('updateFollow changes only the given settings', async () => {
    const { svc, alice, as } = await makeService();
    await svc.follow(as(alice.id), 'bob');

    await svc.updateFollow(as(alice.id), 'bob', { notificationsEnabled: true });
    const updated = await svc.updateFollow(as(alice.id), 'bob', { muted: true });

    expect(updated).toMatchObject({ notificationsEnabled: true, muted: true });
  });

  it('updateFollow throws NotFound when not following', async () => {
    const { svc, alice, as } = await makeService();

    await expect(svc.updateFollow(as(alice.id), 'bob', { muted: true })).rejects.toThrow(
      new NotFoundException('Blog alice does not follow bob.'),
    );
  });

  it('lists following and followers newest first', async () => {
    const { svc, alice, carol, as } = await makeService();
    await svc.follow(as(alice.id), 'bob');
    await svc.follow(as(alice.id), 'carol');
    await svc.follow(as(carol.id), 'bob');

    const following = await svc.listFollowing('alice', toPageRequest({}));
    const followers = await svc.listFollowers('bob', toPageRequest({ size: 1 }));

    expect(following.content.map((f) => f.followee.blogName)).toEqual(['carol', 'bob']);
    expect(following.totalElements).toBe(2);
    expect(followers.content.map((f) => f.follower.id)).toEqual([carol.id]);
    expect(followers).toMatchObject({ page: 0, size: 1, totalElements: 2, totalPages: 2 });
  });
});
