import { Body, Controller, Delete, Get, HttpCode, Param, Patch, Post, Query, UseGuards } from '@nestjs/common';
import { Throttle } from '@nestjs/throttler';
import { pageRequestSchema, toPageRequest } from '../../common/pagination/page';
import { rateLimitLimit, rateLimitTtl } from '../../common/throttling/rate-limit.resolver';
import { AuthGuard } from '../auth/auth.guard';
import { CurrentPrincipal } from '../auth/current-principal.decorator';
import type { Principal } from '../auth/principal';
import { followSettingsSchema } from './follow.dto';
import { FollowsService } from './follows.service';

@Controller('follows')
export class FollowsController {
  constructor(private readonly follows: FollowsService) {}

  @Get(':blogName/following')
  async following(@Param('blogName') blogName: string, @Query() query: unknown) {
    const page = toPageRequest(pageRequestSchema.parse(query));
    return { data: await this.follows.listFollowing(blogName, page) };
  }

  @Get(':blogName/followers')
  async followers(@Param('blogName') blogName: string, @Query() query: unknown) {
    const page = toPageRequest(pageRequestSchema.parse(query));
    return { data: await this.follows.listFollowers(blogName, page) };
  }

  @UseGuards(AuthGuard)
  @Throttle({
    default: {
      limit: rateLimitLimit('interact', 180),
      ttl: rateLimitTtl('interact', 60),
    },
  })
  @Post(':blogName')
  async follow(@Param('blogName') blogName: string, @CurrentPrincipal() principal: Principal) {
    return { data: await this.follows.follow(principal, blogName) };
  }

  @UseGuards(AuthGuard)
  @Patch(':blogName')
  async update(
    @Param('blogName') blogName: string,
    @Body() body: unknown,
    @CurrentPrincipal() principal: Principal,
  ) {
    const settings = followSettingsSchema.parse(body);
    return { data: await this.follows.updateFollow(principal, blogName, settings) };
  }

  @UseGuards(AuthGuard)
  @Throttle({
    default: {
      limit: rateLimitLimit('interact', 180),
      ttl: rateLimitTtl('interact', 60),
    },
  })
  @Delete(':blogName')
  @HttpCode(200)
  async unfollow(@Param('blogName') blogName: string, @CurrentPrincipal() principal: Principal) {
    await this.follows.unfollow(principal, blogName);
    return { data: { success: true } };
  }
}
