import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  Param,
  ParseIntPipe,
  Post,
  Put,
  Query,
  UploadedFiles,
  UseGuards,
  UseInterceptors,
} from '@nestjs/common';
import { FilesInterceptor } from '@nestjs/platform-express';
import { Throttle } from '@nestjs/throttler';
import { z } from 'zod';
import { pageRequestSchema, toPageRequest } from '../../common/pagination/page';
import { rateLimitLimit, rateLimitTtl } from '../../common/throttling/rate-limit.resolver';
import { AuthGuard } from '../auth/auth.guard';
import { CurrentPrincipal } from '../auth/current-principal.decorator';
import { OptionalAuthGuard } from '../auth/optional-auth.guard';
import type { Principal } from '../auth/principal';
import { BlogsService } from '../blogs/blogs.service';
import type { UploadedFilePart } from '../files/file.types';
import { postListQuerySchema, postRequestSchema } from './post.dto';
import { PostsService } from './posts.service';

// Hard ceiling per request; size and count limits from config come from MulterModule in PostsModule.
const MULTIPART_MAX_FILES = 20;

const searchSchema = pageRequestSchema.extend({
  q: z.string().max(500).optional(),
});

@Controller('posts')
export class PostsController {
  constructor(
    private readonly posts: PostsService,
    private readonly blogs: BlogsService,
  ) {}

  @Get()
  async list(@Query() query: unknown) {
    const filter = postListQuerySchema.parse(query);
    const page = toPageRequest(pageRequestSchema.parse(query));
    return { data: await this.posts.getPosts(filter, page) };
  }

  @Get('search')
  async search(@Query() query: unknown) {
    const parsed = searchSchema.parse(query);
    return { data: await this.posts.searchPosts(parsed.q ?? '', toPageRequest(parsed)) };
  }

  @Get(':id')
  async getById(@Param('id', ParseIntPipe) id: number) {
    return { data: await this.posts.getPostResponseDto(id) };
  }

  @Get(':id/replies')
  async replies(@Param('id', ParseIntPipe) id: number, @Query() query: unknown) {
    const page = toPageRequest(pageRequestSchema.parse(query));
    return { data: await this.posts.getReplies(id, page) };
  }

  @UseGuards(AuthGuard)
  @Throttle({
    default: {
      limit: rateLimitLimit('postWrite', 30),
      ttl: rateLimitTtl('postWrite', 60),
    },
  })
  @UseInterceptors(FilesInterceptor('files', MULTIPART_MAX_FILES))
  @Post()
  async create(
    @Body() body: unknown,
    @UploadedFiles() files: UploadedFilePart[] | undefined,
    @CurrentPrincipal() principal: Principal,
  ) {
    const request = postRequestSchema.parse(body);
    const blog = await this.blogs.getActiveBlog(principal);
    return { data: await this.posts.createNewPost(request, files ?? [], blog) };
  }

  // Optional session: anonymous callers get 403 from the ownership check.
  @UseGuards(OptionalAuthGuard)
  @Throttle({
    default: {
      limit: rateLimitLimit('postWrite', 30),
      ttl: rateLimitTtl('postWrite', 60),
    },
  })
  @UseInterceptors(FilesInterceptor('files', MULTIPART_MAX_FILES))
  @Put(':id')
  async update(
    @Param('id', ParseIntPipe) id: number,
    @Body() body: unknown,
    @UploadedFiles() files: UploadedFilePart[] | undefined,
    @CurrentPrincipal() principal: Principal,
  ) {
    const request = postRequestSchema.parse(body);
    return { data: await this.posts.updatePost(request, id, files ?? [], principal) };
  }

  @UseGuards(OptionalAuthGuard)
  @Throttle({
    default: {
      limit: rateLimitLimit('postWrite', 30),
      ttl: rateLimitTtl('postWrite', 60),
    },
  })
  @Delete(':id')
  @HttpCode(200)
  async delete(@Param('id', ParseIntPipe) id: number, @CurrentPrincipal() principal: Principal) {
    await this.posts.deletePost(id, principal);
    return { data: { success: true } };
  }
}
