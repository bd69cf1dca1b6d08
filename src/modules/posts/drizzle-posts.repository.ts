import { Injectable } from '@nestjs/common';
import { and, asc, count, desc, eq, inArray, type SQL } from 'drizzle-orm';
import { pageOffset, toPage, type Page, type PageRequest } from '../../common/pagination/page';
import { toBlog } from '../blogs/drizzle-blogs.repository';
import { DatabaseService, type Db } from '../database/database.service';
import { blogs, files, postAttachments, postPostTags, posts, postTags } from '../database/schema';
import { toFileRecord } from '../files/drizzle-files.repository';
import type { FileRecord } from '../files/file.types';
import type { PostTag } from '../tags/post-tag.types';
import type { NewPost, Post, PostFilter } from './post.types';
import { PostsRepository } from './posts.repository';

@Injectable()
export class DrizzlePostsRepository extends PostsRepository {
  constructor(private readonly database: DatabaseService) {
    super();
  }

  async findById(id: number): Promise<Post | null> {
    const [post] = await this.findByIds([id]);
    return post ?? null;
  }

  async findByIds(ids: number[]): Promise<Post[]> {
    const unique = Array.from(new Set(ids));
    if (unique.length === 0) return [];
    const db = this.database.client();

    const rows = await db
      .select({ post: posts, blog: blogs })
      .from(posts)
      .innerJoin(blogs, eq(blogs.id, posts.blogId))
      .where(inArray(posts.id, unique));
    if (rows.length === 0) return [];

    const found = rows.map((r) => r.post.id);
    const [attachmentsByPost, tagsByPost] = await Promise.all([
      this.loadAttachments(db, found),
      this.loadTags(db, found),
    ]);

    const byId = new Map<number, Post>();
    for (const { post, blog } of rows) {
      byId.set(post.id, {
        id: post.id,
        createdAt: post.createdAt,
        updatedAt: post.updatedAt,
        title: post.title,
        content: post.content,
        sensitive: post.sensitive,
        published: post.published,
        category: post.category,
        parentPostId: post.parentPostId ?? null,
        blog: toBlog(blog),
        attachments: attachmentsByPost.get(post.id) ?? [],
        postTags: tagsByPost.get(post.id) ?? [],
      });
    }
    return ids.flatMap((id) => byId.get(id) ?? []);
  }

  private async loadAttachments(db: Db, postIds: number[]): Promise<Map<number, FileRecord[]>> {
    const rows = await db
      .select({ postId: postAttachments.postId, file: files })
      .from(postAttachments)
      .innerJoin(files, eq(files.id, postAttachments.fileId))
      .where(inArray(postAttachments.postId, postIds))
      .orderBy(asc(postAttachments.postId), asc(postAttachments.position));
    const out = new Map<number, FileRecord[]>();
    for (const r of rows) {
      const list = out.get(r.postId) ?? [];
      list.push(toFileRecord(r.file));
      out.set(r.postId, list);
    }
    return out;
  }

  private async loadTags(db: Db, postIds: number[]): Promise<Map<number, PostTag[]>> {
    const rows = await db
      .select({ postId: postPostTags.postId, id: postTags.id, name: postTags.name })
      .from(postPostTags)
      .innerJoin(postTags, eq(postTags.id, postPostTags.tagId))
      .where(inArray(postPostTags.postId, postIds))
      .orderBy(asc(postTags.name));
    const out = new Map<number, PostTag[]>();
    for (const r of rows) {
      const list = out.get(r.postId) ?? [];
      list.push({ id: r.id, name: r.name });
      out.set(r.postId, list);
    }
    return out;
  }

  async findAll(filter: PostFilter, page: PageRequest): Promise<Page<Post>> {
    const db = this.database.client();
    const conditions: SQL[] = [eq(posts.category, filter.category)];
    if (filter.blogIds?.length) conditions.push(inArray(posts.blogId, filter.blogIds));
    if (filter.parentPostId != null) conditions.push(eq(posts.parentPostId, filter.parentPostId));
    if (filter.tagIds?.length) {
      conditions.push(
        inArray(
          posts.id,
          db.select({ postId: postPostTags.postId }).from(postPostTags).where(inArray(postPostTags.tagId, filter.tagIds)),
        ),
      );
    }
    const where = and(...conditions);

    const [totalRow] = await db.select({ n: count() }).from(posts).where(where);
    const total = totalRow?.n ?? 0;
    if (total === 0) return toPage<Post>([], page, 0);

    const idRows = await db
      .select({ id: posts.id })
      .from(posts)
      .where(where)
      .orderBy(desc(posts.createdAt), desc(posts.id))
      .limit(page.size)
      .offset(pageOffset(page));
    const content = await this.findByIds(idRows.map((r) => r.id));
    return toPage(content, page, total);
  }

  async create(post: NewPost): Promise<Post> {
    const db = this.database.client();
    const [row] = await db
      .insert(posts)
      .values({
        title: post.title,
        content: post.content,
        sensitive: post.sensitive,
        published: post.published,
        category: post.category,
        blogId: post.blog.id,
        parentPostId: post.parentPostId,
      })
      .returning({ id: posts.id });
    if (!row) throw new Error('Post insert returned no row.');
    await this.writeAssociations(db, row.id, post);
    return await this.mustFind(row.id);
  }

  async update(post: Post): Promise<Post> {
    const db = this.database.client();
    const updated = await db
      .update(posts)
      .set({
        title: post.title,
        content: post.content,
        sensitive: post.sensitive,
        published: post.published,
        category: post.category,
        parentPostId: post.parentPostId,
        updatedAt: new Date(),
      })
      .where(eq(posts.id, post.id))
      .returning({ id: posts.id });
    if (updated.length === 0) throw new Error(`Post ${post.id} vanished during update.`);

    await db.delete(postAttachments).where(eq(postAttachments.postId, post.id));
    await db.delete(postPostTags).where(eq(postPostTags.postId, post.id));
    await this.writeAssociations(db, post.id, post);
    return await this.mustFind(post.id);
  }

  private async writeAssociations(db: Db, postId: number, post: NewPost): Promise<void> {
    if (post.attachments.length > 0) {
      await db
        .insert(postAttachments)
        .values(post.attachments.map((file, position) => ({ postId, fileId: file.id, position })));
    }
    const tagIds = Array.from(new Set(post.postTags.map((t) => t.id)));
    if (tagIds.length > 0) {
      await db.insert(postPostTags).values(tagIds.map((tagId) => ({ postId, tagId })));
    }
  }

  private async mustFind(id: number): Promise<Post> {
    const post = await this.findById(id);
    if (!post) throw new Error(`Post ${id} missing after write.`);
    return post;
  }

  async findReplyIds(parentPostId: number): Promise<number[]> {
    const rows = await this.database
      .client()
      .select({ id: posts.id })
      .from(posts)
      .where(eq(posts.parentPostId, parentPostId));
    return rows.map((r) => r.id);
  }

  async delete(id: number): Promise<void> {
    // Attachment and tag links cascade; replies keep existing with parent_post_id = NULL.
    await this.database.client().delete(posts).where(eq(posts.id, id));
  }
}
