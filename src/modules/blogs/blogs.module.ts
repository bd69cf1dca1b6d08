import { Module } from '@nestjs/common';
import { UsersModule } from '../users/users.module';
import { BlogsController } from './blogs.controller';
import { BlogsRepository } from './blogs.repository';
import { BlogsService } from './blogs.service';
import { DrizzleBlogsRepository } from './drizzle-blogs.repository';

@Module({
  imports: [UsersModule],
  controllers: [BlogsController],
  providers: [BlogsService, { provide: BlogsRepository, useClass: DrizzleBlogsRepository }],
  exports: [BlogsService],
})
export class BlogsModule {}
