import { Module } from '@nestjs/common';
import { AuthModule } from '../auth/auth.module';
import { BlogsModule } from '../blogs/blogs.module';
import { DrizzleFollowsRepository } from './drizzle-follows.repository';
import { FollowsController } from './follows.controller';
import { FollowsRepository } from './follows.repository';
import { FollowsService } from './follows.service';

@Module({
  imports: [AuthModule, BlogsModule],
  controllers: [FollowsController],
  providers: [FollowsService, { provide: FollowsRepository, useClass: DrizzleFollowsRepository }],
  exports: [FollowsService],
})
export class FollowsModule {}
