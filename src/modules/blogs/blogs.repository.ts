import type { Blog, NewBlog } from './blog.types';

export abstract class BlogsRepository {
  abstract findById(id: number): Promise<Blog | null>;
  abstract findByBlogName(blogName: string): Promise<Blog | null>;
  abstract create(blog: NewBlog): Promise<Blog>;
  abstract update(blog: Blog): Promise<Blog>;
}
