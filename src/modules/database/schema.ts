import {
  boolean,
  index,
  integer,
  pgTable,
  primaryKey,
  serial,
  text,
  timestamp,
  unique,
  varchar,
  type AnyPgColumn,
} from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';

/** Mirrors db/schema.sql; keep both in step. */

export const users = pgTable('users', {
  id: serial('id').primaryKey(),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  username: varchar('username', { length: 64 }).notNull().unique(),
  // FK to blogs(id) lives in schema.sql (circular reference).
  activeBlogId: integer('active_blog_id'),
  authorities: text('authorities').array().notNull().default(sql`'{}'::text[]`),
});

export const sessions = pgTable('sessions', {
  id: serial('id').primaryKey(),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  userId: integer('user_id')
    .notNull()
    .references(() => users.id, { onDelete: 'cascade' }),
  tokenHash: varchar('token_hash', { length: 64 }).notNull().unique(),
  expiresAt: timestamp('expires_at', { withTimezone: true }).notNull(),
  revokedAt: timestamp('revoked_at', { withTimezone: true }),
});

export const blogs = pgTable('blogs', {
  id: serial('id').primaryKey(),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  blogName: varchar('blog_name', { length: 64 }).notNull().unique(),
  preferredBlogName: varchar('preferred_blog_name', { length: 128 }).notNull(),
  isPrivate: boolean('is_private').notNull().default(false),
  userId: integer('user_id').references(() => users.id, { onDelete: 'cascade' }),
});

export const posts = pgTable(
  'posts',
  {
    id: serial('id').primaryKey(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
    title: varchar('title', { length: 300 }).notNull(),
    content: text('content').notNull().default(''),
    sensitive: boolean('sensitive').notNull().default(false),
    published: boolean('published').notNull().default(false),
    category: varchar('category', { length: 16, enum: ['ROOT', 'REPLY'] }).notNull().default('ROOT'),
    blogId: integer('blog_id')
      .notNull()
      .references(() => blogs.id, { onDelete: 'cascade' }),
    parentPostId: integer('parent_post_id').references((): AnyPgColumn => posts.id, { onDelete: 'set null' }),
  },
  (t) => ({
    blogIdx: index('posts_blog_id_idx').on(t.blogId),
    parentIdx: index('posts_parent_post_id_idx').on(t.parentPostId),
  }),
);

export const files = pgTable('files', {
  id: serial('id').primaryKey(),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  blogId: integer('blog_id')
    .notNull()
    .references(() => blogs.id, { onDelete: 'cascade' }),
  storageKey: varchar('storage_key', { length: 512 }).notNull().unique(),
  originalFilename: varchar('original_filename', { length: 255 }).notNull(),
  contentType: varchar('content_type', { length: 128 }).notNull(),
  size: integer('size').notNull(),
});

export const postAttachments = pgTable(
  'post_attachments',
  {
    postId: integer('post_id')
      .notNull()
      .references(() => posts.id, { onDelete: 'cascade' }),
    fileId: integer('file_id')
      .notNull()
      .references(() => files.id, { onDelete: 'cascade' }),
    position: integer('position').notNull(),
  },
  (t) => ({
    pk: primaryKey({ columns: [t.postId, t.fileId] }),
  }),
);

export const postTags = pgTable('post_tags', {
  id: serial('id').primaryKey(),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  name: varchar('name', { length: 64 }).notNull().unique(),
});

export const postPostTags = pgTable(
  'post_post_tags',
  {
    postId: integer('post_id')
      .notNull()
      .references(() => posts.id, { onDelete: 'cascade' }),
    tagId: integer('tag_id')
      .notNull()
      .references(() => postTags.id, { onDelete: 'cascade' }),
  },
  (t) => ({
    pk: primaryKey({ columns: [t.postId, t.tagId] }),
    tagIdx: index('post_post_tags_tag_id_idx').on(t.tagId),
  }),
);

export const follows = pgTable(
  'follows',
  {
    id: serial('id').primaryKey(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    followerBlogId: integer('follower_blog_id')
      .notNull()
      .references(() => blogs.id, { onDelete: 'cascade' }),
    followeeBlogId: integer('followee_blog_id')
      .notNull()
      .references(() => blogs.id, { onDelete: 'cascade' }),
    notificationsEnabled: boolean('notifications_enabled').notNull().default(false),
    muted: boolean('muted').notNull().default(false),
  },
  (t) => ({
    pair: unique('follows_follower_blog_id_followee_blog_id_key').on(t.followerBlogId, t.followeeBlogId),
  }),
);

export type BlogRow = typeof blogs.$inferSelect;
export type PostRow = typeof posts.$inferSelect;
export type FileRow = typeof files.$inferSelect;
export type PostTagRow = typeof postTags.$inferSelect;
export type FollowRow = typeof follows.$inferSelect;
export type UserRow = typeof users.$inferSelect;
