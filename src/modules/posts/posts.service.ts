import { BadRequestException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { emptyPage, mapPage, toPage, type Page, type PageRequest } from '../../common/pagination/page';
import { AppConfigService } from '../app/app-config.service';
import type { Principal } from '../auth/principal';
import type { Blog } from '../blogs/blog.types';
import { BlogsService } from '../blogs/blogs.service';
import { TransactionManager } from '../database/transaction-manager';
import type { FileRecord, UploadedFilePart } from '../files/file.types';
import { FilesService } from '../files/files.service';
import { CacheInvalidationService } from '../redis/cache-invalidation.service';
import { CacheService } from '../redis/cache.service';
import { CacheNamespaces, stableJsonHash } from '../redis/redis-keys';
import { PostTagsService } from '../tags/post-tags.service';
import { normalizeTagNames } from '../tags/tag-names';
import { planAttachments } from './attachment-plan';
import { toPostResponseDto, type PostListQuery, type PostRequestDto, type PostResponseDto } from './post.dto';
import { PostSearchIndex } from './post-search-index';
import { isPostCategory, type Post, type PostCategory, type PostFilter } from './post.types';
import { PostsRepository } from './posts.repository';
import { assertCanManagePost } from './posts.policy';
import { extractSearchTerms } from './search-terms';

@Injectable()
export class PostsService {
  private readonly logger = new Logger(PostsService.name);

  constructor(
    private readonly posts: PostsRepository,
    private readonly searchIndex: PostSearchIndex,
    private readonly blogs: BlogsService,
    private readonly tags: PostTagsService,
    private readonly files: FilesService,
    private readonly tx: TransactionManager,
    private readonly cache: CacheService,
    private readonly cacheInvalidation: CacheInvalidationService,
    private readonly appConfig: AppConfigService,
  ) {}

  private toDto(post: Post): PostResponseDto {
    return toPostResponseDto(post, this.appConfig.assetsPublicBaseUrl());
  }

  private assertValidUploads(files: ReadonlyArray<UploadedFilePart>) {
    const max = this.appConfig.uploadMaxFiles();
    if (files.length > max) throw new BadRequestException(`At most ${max} files can be uploaded at once.`);
    for (const upload of files) this.files.validate(upload);
  }

  /**
   * Runs `write` in one transaction. Objects stored through `storeUploads` during a write that
   * fails are removed again, so a rolled-back write leaves no bytes behind.
   */
  private async writeWithUploads<T>(write: (stored: FileRecord[]) => Promise<T>): Promise<T> {
    const stored: FileRecord[] = [];
    try {
      return await this.tx.run(() => write(stored));
    } catch (err) {
      await this.files.deleteObjects(stored.map((f) => f.storageKey));
      throw err;
    }
  }

  private async storeUploads(
    files: ReadonlyArray<UploadedFilePart>,
    blog: Blog,
    stored: FileRecord[],
  ): Promise<FileRecord[]> {
    const uploaded: FileRecord[] = [];
    for (const upload of files) {
      const file = await this.files.createFile(upload, blog);
      stored.push(file);
      uploaded.push(file);
    }
    return uploaded;
  }

  async getPost(id: number): Promise<Post> {
    const post = await this.posts.findById(id);
    if (!post) throw new NotFoundException(`Post with id ${id} is not found.`);
    return post;
  }

  async getPostResponseDto(id: number): Promise<PostResponseDto> {
    return await this.cache.getOrSetJson({
      namespace: CacheNamespaces.posts,
      key: id,
      ttlSeconds: this.appConfig.cachePostsTtlSeconds(),
      compute: async () => this.toDto(await this.getPost(id)),
    });
  }

  async createNewPost(request: PostRequestDto, files: ReadonlyArray<UploadedFilePart>, blog: Blog): Promise<PostResponseDto> {
    this.assertValidUploads(files);
    // Load the parent before writing anything so a bad id leaves no orphaned uploads.
    const parent = request.parentPostId != null ? await this.getPost(request.parentPostId) : null;

    const created = await this.writeWithUploads(async (stored) => {
      const attachments = await this.storeUploads(files, blog, stored);
      const postTags = await this.tags.findOrCreateAll(request.postTags ?? []);
      return await this.posts.create({
        title: request.title,
        content: request.content ?? '',
        sensitive: request.sensitive ?? false,
        published: request.published ?? false,
        category: parent ? 'REPLY' : 'ROOT',
        parentPostId: parent?.id ?? null,
        blog,
        attachments,
        postTags,
      });
    });

    this.logger.debug(`Created post id=${created.id} blogId=${blog.id} attachments=${created.attachments.length}`);
    await this.cacheInvalidation.bumpForPostWrite({ postIds: [created.id, parent?.id] });
    return this.toDto(created);
  }

  async updatePost(
    request: PostRequestDto,
    id: number,
    files: ReadonlyArray<UploadedFilePart>,
    principal: Principal,
  ): Promise<PostResponseDto> {
    const post = await this.getPost(id);
    assertCanManagePost(principal, post);
    this.assertValidUploads(files);

    const plan = planAttachments({
      current: post.attachments.map((f) => f.id),
      retained: request.attachments,
      insertions: request.attachmentInsertions,
      uploads: files.length,
    });

    const currentById = new Map(post.attachments.map((f) => [f.id, f]));
    const removedKeys = plan.removed.flatMap((fileId) => currentById.get(fileId)?.storageKey ?? []);

    const updated = await this.writeWithUploads(async (stored) => {
      for (const fileId of plan.removed) await this.files.deleteFile(fileId);
      const uploaded = await this.storeUploads(files, post.blog, stored);
      const attachments = plan.slots.flatMap((slot) => {
        const file = slot.kind === 'existing' ? currentById.get(slot.fileId) : uploaded[slot.index];
        return file ? [file] : [];
      });

      const added = await this.tags.findOrCreateAll(request.postTags ?? []);
      const tagIds = new Set(post.postTags.map((t) => t.id));
      const postTags = [...post.postTags, ...added.filter((t) => !tagIds.has(t.id))];

      return await this.posts.update({
        ...post,
        title: request.title,
        content: request.content ?? '',
        sensitive: request.sensitive ?? false,
        published: request.published ?? false,
        attachments,
        postTags,
      });
    });

    await this.files.deleteObjects(removedKeys);
    this.logger.debug(
      `Updated post id=${updated.id} removedFiles=${plan.removed.length} uploadedFiles=${files.length}`,
    );
    await this.cacheInvalidation.bumpForPostWrite({ postIds: [updated.id, updated.parentPostId] });
    return this.toDto(updated);
  }

  async deletePost(id: number, principal: Principal): Promise<void> {
    await this.deletePostEntity(await this.getPost(id), principal);
  }

  async deletePostEntity(post: Post, principal: Principal): Promise<void> {
    assertCanManagePost(principal, post);
    const replyIds = await this.tx.run(async () => {
      for (const file of post.attachments) await this.files.deleteFile(file.id);
      // Replies lose their parent link; their cached entries go stale with it.
      const ids = await this.posts.findReplyIds(post.id);
      await this.posts.delete(post.id);
      return ids;
    });
    await this.files.deleteObjects(post.attachments.map((f) => f.storageKey));
    this.logger.debug(`Deleted post id=${post.id} files=${post.attachments.length} replies=${replyIds.length}`);
    await this.cacheInvalidation.bumpForPostWrite({ postIds: [post.id, post.parentPostId, ...replyIds] });
  }

  private parseCategory(raw: string | null | undefined): PostCategory {
    const value = (raw ?? '').trim().toUpperCase();
    if (!value) return 'ROOT';
    if (!isPostCategory(value)) throw new BadRequestException(`Unknown post category: ${raw}.`);
    return value;
  }

  async getPosts(query: PostListQuery, page: PageRequest): Promise<Page<PostResponseDto>> {
    const category = this.parseCategory(query.category);
    const blogNames = Array.from(new Set((query.blogNames ?? []).map((n) => n.trim()).filter(Boolean)));
    const tagNames = normalizeTagNames(query.tagNames ?? []);

    return await this.cache.getOrSetJson({
      namespace: CacheNamespaces.postsPage,
      key: stableJsonHash({ kind: 'list', blogNames, tagNames, category, page: page.page, size: page.size }),
      ttlSeconds: this.appConfig.cachePostsTtlSeconds(),
      compute: async () => {
        const filter: PostFilter = { category };
        if (blogNames.length > 0) {
          const blogs: Blog[] = [];
          for (const name of blogNames) blogs.push(await this.blogs.getBlogByName(name));
          filter.blogIds = blogs.map((b) => b.id);
        }
        if (tagNames.length > 0) {
          const tags = await this.tags.getTags(tagNames);
          if (tags.length === 0) return emptyPage<PostResponseDto>(page);
          filter.tagIds = tags.map((t) => t.id);
        }
        return mapPage(await this.posts.findAll(filter, page), (p) => this.toDto(p));
      },
    });
  }

  async getReplies(postId: number, page: PageRequest): Promise<Page<PostResponseDto>> {
    const parent = await this.getPost(postId);
    return await this.cache.getOrSetJson({
      namespace: CacheNamespaces.postsPage,
      key: stableJsonHash({ kind: 'replies', parentPostId: parent.id, page: page.page, size: page.size }),
      ttlSeconds: this.appConfig.cachePostsTtlSeconds(),
      compute: async () =>
        mapPage(await this.posts.findAll({ category: 'REPLY', parentPostId: parent.id }, page), (p) => this.toDto(p)),
    });
  }

  async searchPosts(query: string, page: PageRequest): Promise<Page<PostResponseDto>> {
    const terms = extractSearchTerms(query);
    if (terms.length === 0) return emptyPage(page);
    const hits = await this.searchIndex.search(terms, page);
    const found = await this.posts.findByIds(hits.postIds);
    return toPage(
      found.map((p) => this.toDto(p)),
      page,
      hits.total,
    );
  }
}
