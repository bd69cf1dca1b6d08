import type { Page, PageRequest } from '../../common/pagination/page';
import type { Blog } from '../blogs/blog.types';
import type { Follow } from './follow.types';

export abstract class FollowsRepository {
  abstract find(followerBlogId: number, followeeBlogId: number): Promise<Follow | null>;
  /** Inserts the pair unless it exists; returns the stored follow either way. */
  abstract create(follower: Blog, followee: Blog): Promise<Follow>;
  abstract update(follow: Follow): Promise<Follow>;
  abstract delete(followerBlogId: number, followeeBlogId: number): Promise<void>;
  /** Newest first. */
  abstract listByFollower(followerBlogId: number, page: PageRequest): Promise<Page<Follow>>;
  /** Newest first. */
  abstract listByFollowee(followeeBlogId: number, page: PageRequest): Promise<Page<Follow>>;
}
