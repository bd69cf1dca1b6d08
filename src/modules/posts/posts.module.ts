import { Module } from '@nestjs/common';
import { MulterModule } from '@nestjs/platform-express';
import { AppConfigModule } from '../app/app-config.module';
import { AppConfigService } from '../app/app-config.service';
import { AuthModule } from '../auth/auth.module';
import { BlogsModule } from '../blogs/blogs.module';
import { FilesModule } from '../files/files.module';
import { uploadMulterOptions } from '../files/upload-limits';
import { TagsModule } from '../tags/tags.module';
import { DrizzlePostsRepository } from './drizzle-posts.repository';
import { PostSearchIndex } from './post-search-index';
import { PostgresPostSearchIndex } from './postgres-post-search-index';
import { PostsController } from './posts.controller';
import { PostsRepository } from './posts.repository';
import { PostsService } from './posts.service';

@Module({
  imports: [
    AppConfigModule,
    AuthModule,
    BlogsModule,
    FilesModule,
    TagsModule,
    MulterModule.registerAsync({
      imports: [AppConfigModule],
      inject: [AppConfigService],
      useFactory: uploadMulterOptions,
    }),
  ],
  controllers: [PostsController],
  providers: [
    PostsService,
    { provide: PostsRepository, useClass: DrizzlePostsRepository },
    { provide: PostSearchIndex, useClass: PostgresPostSearchIndex },
  ],
  exports: [PostsService],
})
export class PostsModule {}
