import { ConfigService } from '@nestjs/config';
import { pageOffset, toPage, type Page, type PageRequest } from '../../src/common/pagination/page';
import { AppConfigService } from '../../src/modules/app/app-config.service';
import type { Blog, NewBlog } from '../../src/modules/blogs/blog.types';
import { BlogsRepository } from '../../src/modules/blogs/blogs.repository';
import { TransactionManager } from '../../src/modules/database/transaction-manager';
import { FileStorage } from '../../src/modules/files/file-storage';
import type { FileRecord, NewFileRecord, UploadedFilePart } from '../../src/modules/files/file.types';
import { FilesRepository } from '../../src/modules/files/files.repository';
import type { Follow } from '../../src/modules/follows/follow.types';
import { FollowsRepository } from '../../src/modules/follows/follows.repository';
import { PostSearchIndex, type PostSearchHits } from '../../src/modules/posts/post-search-index';
import type { NewPost, Post, PostFilter } from '../../src/modules/posts/post.types';
import { PostsRepository } from '../../src/modules/posts/posts.repository';
import { KeyValueStore, type SetOptions } from '../../src/modules/redis/key-value-store';
import type { PostTag } from '../../src/modules/tags/post-tag.types';
import { PostTagsRepository } from '../../src/modules/tags/post-tags.repository';
import type { User } from '../../src/modules/users/user.types';
import { UsersRepository } from '../../src/modules/users/users.repository';

/** Deterministic, strictly increasing timestamps (one second apart). */
export class TestClock {
  private seq = 0;

  next(): Date {
    this.seq += 1;
    return new Date(Date.UTC(2024, 0, 1) + this.seq * 1000);
  }
}

export function testAppConfig(env: Record<string, string> = {}): AppConfigService {
  return new AppConfigService(new ConfigService({ DATABASE_URL: 'postgres://test', ...env }));
}

export function upload(name: string, contentType = 'image/png', bytes = 'bytes'): UploadedFilePart {
  const buffer = Buffer.from(bytes);
  return { originalname: name, mimetype: contentType, size: buffer.length, buffer };
}

function sortNewestFirst<T extends { id: number; createdAt: Date }>(items: T[]): T[] {
  return [...items].sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id);
}

function pageOf<T>(items: T[], page: PageRequest): Page<T> {
  const start = pageOffset(page);
  return toPage(items.slice(start, start + page.size), page, items.length);
}

export class InMemoryKeyValueStore extends KeyValueStore {
  readonly values = new Map<string, string>();
  failing = false;

  private check() {
    if (this.failing) throw new Error('store unavailable');
  }

  async getString(key: string): Promise<string | null> {
    this.check();
    return this.values.get(key) ?? null;
  }

  async setString(key: string, value: string, opts?: SetOptions): Promise<boolean> {
    this.check();
    if (opts?.onlyIfAbsent && this.values.has(key)) return false;
    this.values.set(key, value);
    return true;
  }

  async del(...keys: Array<string | null | undefined>): Promise<number> {
    this.check();
    let n = 0;
    for (const k of keys) if (k && this.values.delete(k)) n++;
    return n;
  }

  async incr(key: string): Promise<number> {
    this.check();
    const next = Number(this.values.get(key) ?? '0') + 1;
    this.values.set(key, String(next));
    return next;
  }
}

export class ImmediateTransactionManager extends TransactionManager {
  runs = 0;

  async run<T>(fn: () => Promise<T>): Promise<T> {
    this.runs++;
    return await fn();
  }
}

/** Something a transaction double can roll back: `snapshot()` returns the restore. */
export type Snapshottable = { snapshot(): () => void };

function snapshotMap<K, V>(map: Map<K, V>, copy: (value: V) => V): () => void {
  const saved = [...map.entries()].map(([k, v]): [K, V] => [k, copy(v)]);
  return () => {
    map.clear();
    for (const [k, v] of saved) map.set(k, v);
  };
}

/** Restores the given repositories when the transaction body throws. */
export class RollbackTransactionManager extends TransactionManager {
  runs = 0;

  constructor(private readonly tables: ReadonlyArray<Snapshottable>) {
    super();
  }

  async run<T>(fn: () => Promise<T>): Promise<T> {
    this.runs++;
    const restores = this.tables.map((t) => t.snapshot());
    try {
      return await fn();
    } catch (err) {
      for (const restore of restores) restore();
      throw err;
    }
  }
}

export class InMemoryUsersRepository extends UsersRepository {
  readonly users = new Map<number, User>();
  readonly sessions = new Map<string, { userId: number; expiresAt: Date; revokedAt: Date | null }>();

  add(user: User): User {
    this.users.set(user.id, { ...user });
    return user;
  }

  async findBySessionTokenHash(tokenHash: string, now: Date): Promise<User | null> {
    const session = this.sessions.get(tokenHash);
    if (!session || session.revokedAt || session.expiresAt <= now) return null;
    const user = this.users.get(session.userId);
    return user ? { ...user } : null;
  }

  async update(user: User): Promise<User> {
    if (!this.users.has(user.id)) throw new Error(`User ${user.id} vanished during update.`);
    this.users.set(user.id, { ...user });
    return { ...user };
  }
}

export class InMemoryBlogsRepository extends BlogsRepository {
  readonly blogs = new Map<number, Blog>();
  private nextId = 1;

  constructor(private readonly clock = new TestClock()) {
    super();
  }

  async findById(id: number): Promise<Blog | null> {
    const blog = this.blogs.get(id);
    return blog ? { ...blog } : null;
  }

  async findByBlogName(blogName: string): Promise<Blog | null> {
    for (const blog of this.blogs.values()) if (blog.blogName === blogName) return { ...blog };
    return null;
  }

  async create(blog: NewBlog): Promise<Blog> {
    if (await this.findByBlogName(blog.blogName)) throw new Error(`duplicate blog_name ${blog.blogName}`);
    const created: Blog = { ...blog, id: this.nextId++, createdAt: this.clock.next() };
    this.blogs.set(created.id, created);
    return { ...created };
  }

  async update(blog: Blog): Promise<Blog> {
    if (!this.blogs.has(blog.id)) throw new Error(`Blog ${blog.id} vanished during update.`);
    this.blogs.set(blog.id, { ...blog });
    return { ...blog };
  }
}

export class InMemoryPostTagsRepository extends PostTagsRepository {
  readonly tags = new Map<string, PostTag>();
  private nextId = 1;

  async findByNames(names: string[]): Promise<PostTag[]> {
    return names.flatMap((n) => {
      const tag = this.tags.get(n);
      return tag ? [{ ...tag }] : [];
    });
  }

  async upsertByName(name: string): Promise<PostTag> {
    const existing = this.tags.get(name);
    if (existing) return { ...existing };
    const tag = { id: this.nextId++, name };
    this.tags.set(name, tag);
    return { ...tag };
  }
}

export class InMemoryFilesRepository extends FilesRepository implements Snapshottable {
  readonly files = new Map<number, FileRecord>();
  private nextId = 1;

  constructor(private readonly clock = new TestClock()) {
    super();
  }

  snapshot(): () => void {
    return snapshotMap(this.files, (f) => ({ ...f }));
  }

  async findById(id: number): Promise<FileRecord | null> {
    const file = this.files.get(id);
    return file ? { ...file } : null;
  }

  async create(file: NewFileRecord): Promise<FileRecord> {
    const created: FileRecord = { ...file, id: this.nextId++, createdAt: this.clock.next() };
    this.files.set(created.id, created);
    return { ...created };
  }

  async delete(id: number): Promise<void> {
    this.files.delete(id);
  }
}

export class InMemoryFileStorage extends FileStorage {
  readonly objects = new Map<string, { bytes: Buffer; contentType: string }>();

  async put(key: string, bytes: Buffer, contentType: string): Promise<void> {
    this.objects.set(key, { bytes, contentType });
  }

  async delete(key: string): Promise<void> {
    this.objects.delete(key);
  }
}

function copyPost(post: Post): Post {
  return { ...post, blog: { ...post.blog }, attachments: [...post.attachments], postTags: [...post.postTags] };
}

export class InMemoryPostsRepository extends PostsRepository implements Snapshottable {
  readonly posts = new Map<number, Post>();
  private nextId = 1;

  constructor(private readonly clock = new TestClock()) {
    super();
  }

  snapshot(): () => void {
    return snapshotMap(this.posts, copyPost);
  }

  async findReplyIds(parentPostId: number): Promise<number[]> {
    return [...this.posts.values()].filter((p) => p.parentPostId === parentPostId).map((p) => p.id);
  }

  async findById(id: number): Promise<Post | null> {
    const post = this.posts.get(id);
    return post ? copyPost(post) : null;
  }

  async findByIds(ids: number[]): Promise<Post[]> {
    return ids.flatMap((id) => {
      const post = this.posts.get(id);
      return post ? [copyPost(post)] : [];
    });
  }

  async findAll(filter: PostFilter, page: PageRequest): Promise<Page<Post>> {
    const matches = [...this.posts.values()].filter((p) => {
      if (p.category !== filter.category) return false;
      if (filter.blogIds?.length && !filter.blogIds.includes(p.blog.id)) return false;
      if (filter.tagIds?.length && !p.postTags.some((t) => filter.tagIds?.includes(t.id))) return false;
      if (filter.parentPostId != null && p.parentPostId !== filter.parentPostId) return false;
      return true;
    });
    return pageOf(sortNewestFirst(matches).map(copyPost), page);
  }

  async create(post: NewPost): Promise<Post> {
    const now = this.clock.next();
    const created: Post = { ...post, id: this.nextId++, createdAt: now, updatedAt: now };
    this.posts.set(created.id, copyPost(created));
    return copyPost(created);
  }

  async update(post: Post): Promise<Post> {
    if (!this.posts.has(post.id)) throw new Error(`Post ${post.id} vanished during update.`);
    const updated = { ...copyPost(post), updatedAt: this.clock.next() };
    this.posts.set(post.id, updated);
    return copyPost(updated);
  }

  async delete(id: number): Promise<void> {
    this.posts.delete(id);
    for (const p of this.posts.values()) if (p.parentPostId === id) p.parentPostId = null;
  }
}

export class InMemoryFollowsRepository extends FollowsRepository {
  readonly follows = new Map<string, Follow>();
  private nextId = 1;

  constructor(private readonly clock = new TestClock()) {
    super();
  }

  private key(followerBlogId: number, followeeBlogId: number) {
    return `${followerBlogId}->${followeeBlogId}`;
  }

  async find(followerBlogId: number, followeeBlogId: number): Promise<Follow | null> {
    const follow = this.follows.get(this.key(followerBlogId, followeeBlogId));
    return follow ? { ...follow } : null;
  }

  async create(follower: Blog, followee: Blog): Promise<Follow> {
    const existing = await this.find(follower.id, followee.id);
    if (existing) return existing;
    const follow: Follow = {
      id: this.nextId++,
      createdAt: this.clock.next(),
      follower,
      followee,
      notificationsEnabled: false,
      muted: false,
    };
    this.follows.set(this.key(follower.id, followee.id), follow);
    return { ...follow };
  }

  async update(follow: Follow): Promise<Follow> {
    this.follows.set(this.key(follow.follower.id, follow.followee.id), { ...follow });
    return { ...follow };
  }

  async delete(followerBlogId: number, followeeBlogId: number): Promise<void> {
    this.follows.delete(this.key(followerBlogId, followeeBlogId));
  }

  async listByFollower(followerBlogId: number, page: PageRequest): Promise<Page<Follow>> {
    const items = [...this.follows.values()].filter((f) => f.follower.id === followerBlogId);
    return pageOf(sortNewestFirst(items), page);
  }

  async listByFollowee(followeeBlogId: number, page: PageRequest): Promise<Page<Follow>> {
    const items = [...this.follows.values()].filter((f) => f.followee.id === followeeBlogId);
    return pageOf(sortNewestFirst(items), page);
  }
}

/** Returns preset hits and records the terms it was asked for. */
export class StubPostSearchIndex extends PostSearchIndex {
  hits: PostSearchHits = { postIds: [], total: 0 };
  readonly calls: Array<{ terms: string[]; page: PageRequest }> = [];

  async search(terms: string[], page: PageRequest): Promise<PostSearchHits> {
    this.calls.push({ terms, page });
    return this.hits;
  }
}
