import type { PostTag } from './post-tag.types';

export abstract class PostTagsRepository {
  abstract findByNames(names: string[]): Promise<PostTag[]>;
  /** Inserts the name if absent and returns the stored tag either way. */
  abstract upsertByName(name: string): Promise<PostTag>;
}
