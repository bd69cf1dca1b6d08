import { Injectable } from '@nestjs/common';
import { CacheService } from './cache.service';
import { CacheNamespaces } from './redis-keys';

@Injectable()
export class CacheInvalidationService {
  constructor(private readonly cache: CacheService) {}

  private normalizePostIds(postIds: Array<number | null | undefined>): number[] {
    return Array.from(new Set(postIds.filter((id): id is number => typeof id === 'number' && Number.isInteger(id) && id > 0)));
  }

  /**
   * Post writes can affect:
   * - listing pages (any filter may include the post)
   * - the per-post entries of the written post and of a reply's parent
   */
  async bumpForPostWrite(params: { postIds: Array<number | null | undefined> }): Promise<void> {
    const ids = this.normalizePostIds(params.postIds ?? []);
    await Promise.all([
      this.cache.invalidateAll(CacheNamespaces.postsPage),
      ...ids.map((id) => this.cache.invalidate(CacheNamespaces.posts, id)),
    ]);
  }
}
