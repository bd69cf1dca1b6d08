import type { Blog } from '../blogs/blog.types';
import type { FileRecord } from '../files/file.types';
import type { PostTag } from '../tags/post-tag.types';

export const POST_CATEGORIES = ['ROOT', 'REPLY'] as const;

export type PostCategory = (typeof POST_CATEGORIES)[number];

export function isPostCategory(value: string): value is PostCategory {
  return (POST_CATEGORIES as readonly string[]).includes(value);
}

export type Post = {
  id: number;
  createdAt: Date;
  updatedAt: Date;
  title: string;
  content: string;
  sensitive: boolean;
  published: boolean;
  category: PostCategory;
  parentPostId: number | null;
  blog: Blog;
  /** In display order. */
  attachments: FileRecord[];
  postTags: PostTag[];
};

export type NewPost = Omit<Post, 'id' | 'createdAt' | 'updatedAt'>;

/** Listing filter. Each list is an any-of match; the lists combine with AND. */
export type PostFilter = {
  blogIds?: number[];
  tagIds?: number[];
  category: PostCategory;
  parentPostId?: number;
};
