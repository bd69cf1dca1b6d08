import { Injectable } from '@nestjs/common';
import type { PostTag } from './post-tag.types';
import { PostTagsRepository } from './post-tags.repository';
import { normalizeTagName, normalizeTagNames } from './tag-names';

@Injectable()
export class PostTagsService {
  constructor(private readonly tags: PostTagsRepository) {}

  async findOrCreateByName(name: string): Promise<PostTag | null> {
    const normalized = normalizeTagName(name);
    if (!normalized) return null;
    return await this.tags.upsertByName(normalized);
  }

  async findOrCreateAll(names: ReadonlyArray<string>): Promise<PostTag[]> {
    const out: PostTag[] = [];
    for (const name of normalizeTagNames(names)) {
      out.push(await this.tags.upsertByName(name));
    }
    return out;
  }

  /** Existing tags among `names`; never creates. */
  async getTags(names: ReadonlyArray<string>): Promise<PostTag[]> {
    return await this.tags.findByNames(normalizeTagNames(names));
  }
}
