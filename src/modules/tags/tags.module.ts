import { Module } from '@nestjs/common';
import { DrizzlePostTagsRepository } from './drizzle-post-tags.repository';
import { PostTagsRepository } from './post-tags.repository';
import { PostTagsService } from './post-tags.service';

@Module({
  providers: [PostTagsService, { provide: PostTagsRepository, useClass: DrizzlePostTagsRepository }],
  exports: [PostTagsService],
})
export class TagsModule {}
