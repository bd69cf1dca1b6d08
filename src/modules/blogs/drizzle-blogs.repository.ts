import { Injectable } from '@nestjs/common';
import { eq } from 'drizzle-orm';
import { DatabaseService } from '../database/database.service';
import { blogs, type BlogRow } from '../database/schema';
import type { Blog, NewBlog } from './blog.types';
import { BlogsRepository } from './blogs.repository';

export function toBlog(row: BlogRow): Blog {
  return {
    id: row.id,
    createdAt: row.createdAt,
    blogName: row.blogName,
    preferredBlogName: row.preferredBlogName,
    isPrivate: row.isPrivate,
    userId: row.userId ?? null,
  };
}

@Injectable()
export class DrizzleBlogsRepository extends BlogsRepository {
  constructor(private readonly database: DatabaseService) {
    super();
  }

  async findById(id: number): Promise<Blog | null> {
    const [row] = await this.database.client().select().from(blogs).where(eq(blogs.id, id)).limit(1);
    return row ? toBlog(row) : null;
  }

  async findByBlogName(blogName: string): Promise<Blog | null> {
    const [row] = await this.database.client().select().from(blogs).where(eq(blogs.blogName, blogName)).limit(1);
    return row ? toBlog(row) : null;
  }

  async create(blog: NewBlog): Promise<Blog> {
    const [row] = await this.database
      .client()
      .insert(blogs)
      .values({
        blogName: blog.blogName,
        preferredBlogName: blog.preferredBlogName,
        isPrivate: blog.isPrivate,
        userId: blog.userId,
      })
      .returning();
    if (!row) throw new Error('Blog insert returned no row.');
    return toBlog(row);
  }

  async update(blog: Blog): Promise<Blog> {
    const [row] = await this.database
      .client()
      .update(blogs)
      .set({ preferredBlogName: blog.preferredBlogName, isPrivate: blog.isPrivate, userId: blog.userId })
      .where(eq(blogs.id, blog.id))
      .returning();
    if (!row) throw new Error(`Blog ${blog.id} vanished during update.`);
    return toBlog(row);
  }
}
