import { Injectable } from '@nestjs/common';
import { and, count, desc, eq, type SQL } from 'drizzle-orm';
import { alias } from 'drizzle-orm/pg-core';
import { pageOffset, toPage, type Page, type PageRequest } from '../../common/pagination/page';
import type { Blog } from '../blogs/blog.types';
import { toBlog } from '../blogs/drizzle-blogs.repository';
import { DatabaseService } from '../database/database.service';
import { blogs, follows, type BlogRow, type FollowRow } from '../database/schema';
import type { Follow } from './follow.types';
import { FollowsRepository } from './follows.repository';

const followerBlogs = alias(blogs, 'follower_blogs');
const followeeBlogs = alias(blogs, 'followee_blogs');

function toFollow(row: { follow: FollowRow; follower: BlogRow; followee: BlogRow }): Follow {
  return {
    id: row.follow.id,
    createdAt: row.follow.createdAt,
    follower: toBlog(row.follower),
    followee: toBlog(row.followee),
    notificationsEnabled: row.follow.notificationsEnabled,
    muted: row.follow.muted,
  };
}

@Injectable()
export class DrizzleFollowsRepository extends FollowsRepository {
  constructor(private readonly database: DatabaseService) {
    super();
  }

  private selectFollows() {
    return this.database
      .client()
      .select({ follow: follows, follower: followerBlogs, followee: followeeBlogs })
      .from(follows)
      .innerJoin(followerBlogs, eq(followerBlogs.id, follows.followerBlogId))
      .innerJoin(followeeBlogs, eq(followeeBlogs.id, follows.followeeBlogId));
  }

  async find(followerBlogId: number, followeeBlogId: number): Promise<Follow | null> {
    const [row] = await this.selectFollows()
      .where(and(eq(follows.followerBlogId, followerBlogId), eq(follows.followeeBlogId, followeeBlogId)))
      .limit(1);
    return row ? toFollow(row) : null;
  }

  async create(follower: Blog, followee: Blog): Promise<Follow> {
    await this.database
      .client()
      .insert(follows)
      .values({ followerBlogId: follower.id, followeeBlogId: followee.id })
      .onConflictDoNothing({ target: [follows.followerBlogId, follows.followeeBlogId] });
    const follow = await this.find(follower.id, followee.id);
    if (!follow) throw new Error(`Follow ${follower.id}->${followee.id} missing after insert.`);
    return follow;
  }

  async update(follow: Follow): Promise<Follow> {
    await this.database
      .client()
      .update(follows)
      .set({ notificationsEnabled: follow.notificationsEnabled, muted: follow.muted })
      .where(eq(follows.id, follow.id));
    const updated = await this.find(follow.follower.id, follow.followee.id);
    if (!updated) throw new Error(`Follow ${follow.id} vanished during update.`);
    return updated;
  }

  async delete(followerBlogId: number, followeeBlogId: number): Promise<void> {
    await this.database
      .client()
      .delete(follows)
      .where(and(eq(follows.followerBlogId, followerBlogId), eq(follows.followeeBlogId, followeeBlogId)));
  }

  private async list(where: SQL, page: PageRequest): Promise<Page<Follow>> {
    const [totalRow] = await this.database.client().select({ n: count() }).from(follows).where(where);
    const total = totalRow?.n ?? 0;
    if (total === 0) return toPage<Follow>([], page, 0);
    const rows = await this.selectFollows()
      .where(where)
      .orderBy(desc(follows.createdAt), desc(follows.id))
      .limit(page.size)
      .offset(pageOffset(page));
    return toPage(rows.map(toFollow), page, total);
  }

  async listByFollower(followerBlogId: number, page: PageRequest): Promise<Page<Follow>> {
    return await this.list(eq(follows.followerBlogId, followerBlogId), page);
  }

  async listByFollowee(followeeBlogId: number, page: PageRequest): Promise<Page<Follow>> {
    return await this.list(eq(follows.followeeBlogId, followeeBlogId), page);
  }
}
