import type { Blog } from '../blogs/blog.types';

export type Follow = {
  id: number;
  createdAt: Date;
  follower: Blog;
  followee: Blog;
  notificationsEnabled: boolean;
  muted: boolean;
};

export type FollowSettings = {
  notificationsEnabled?: boolean;
  muted?: boolean;
};
