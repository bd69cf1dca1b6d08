import type { Blog } from './blog.types';

export type BlogResponseDto = {
  id: number;
  createdAt: string;
  blogName: string;
  preferredBlogName: string;
  isPrivate: boolean;
};

export function toBlogResponseDto(blog: Blog): BlogResponseDto {
  return {
    id: blog.id,
    createdAt: blog.createdAt.toISOString(),
    blogName: blog.blogName,
    preferredBlogName: blog.preferredBlogName,
    isPrivate: blog.isPrivate,
  };
}
