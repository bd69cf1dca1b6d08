import { Injectable } from '@nestjs/common';
import { eq, inArray } from 'drizzle-orm';
import { DatabaseService } from '../database/database.service';
import { postTags } from '../database/schema';
import type { PostTag } from './post-tag.types';
import { PostTagsRepository } from './post-tags.repository';

@Injectable()
export class DrizzlePostTagsRepository extends PostTagsRepository {
  constructor(private readonly database: DatabaseService) {
    super();
  }

  async findByNames(names: string[]): Promise<PostTag[]> {
    if (names.length === 0) return [];
    return await this.database
      .client()
      .select({ id: postTags.id, name: postTags.name })
      .from(postTags)
      .where(inArray(postTags.name, names));
  }

  async upsertByName(name: string): Promise<PostTag> {
    const db = this.database.client();
    // Concurrent creators race on the unique name; the loser reads the winner's row.
    await db.insert(postTags).values({ name }).onConflictDoNothing({ target: postTags.name });
    const [row] = await db.select({ id: postTags.id, name: postTags.name }).from(postTags).where(eq(postTags.name, name)).limit(1);
    if (!row) throw new Error(`Tag "${name}" missing after upsert.`);
    return row;
  }
}
