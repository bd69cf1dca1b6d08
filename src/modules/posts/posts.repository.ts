import type { Page, PageRequest } from '../../common/pagination/page';
import type { NewPost, Post, PostFilter } from './post.types';

export abstract class PostsRepository {
  abstract findById(id: number): Promise<Post | null>;
  /** Posts in the order of `ids`; missing ids are skipped. */
  abstract findByIds(ids: number[]): Promise<Post[]>;
  /** Newest first. */
  abstract findAll(filter: PostFilter, page: PageRequest): Promise<Page<Post>>;
  abstract create(post: NewPost): Promise<Post>;
  /** Replaces scalar fields, the attachment list (positions 0..n-1) and the tag set. */
  abstract update(post: Post): Promise<Post>;
  abstract findReplyIds(parentPostId: number): Promise<number[]>;
  /** Replies are kept with their parent link cleared. */
  abstract delete(id: number): Promise<void>;
}
