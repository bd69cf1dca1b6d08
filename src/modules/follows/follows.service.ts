import { BadRequestException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { mapPage, type Page, type PageRequest } from '../../common/pagination/page';
import type { Principal } from '../auth/principal';
import { BlogsService } from '../blogs/blogs.service';
import { TransactionManager } from '../database/transaction-manager';
import { toFollowResponseDto, type FollowResponseDto } from './follow.dto';
import type { FollowSettings } from './follow.types';
import { FollowsRepository } from './follows.repository';

/** Blog-to-blog follows. The acting side is always the principal's active blog. */
@Injectable()
export class FollowsService {
  private readonly logger = new Logger(FollowsService.name);

  constructor(
    private readonly follows: FollowsRepository,
    private readonly blogs: BlogsService,
    private readonly tx: TransactionManager,
  ) {}

  async follow(principal: Principal, blogName: string): Promise<FollowResponseDto> {
    const follower = await this.blogs.getActiveBlog(principal);
    const followee = await this.blogs.getBlogByName(blogName);
    if (follower.id === followee.id) throw new BadRequestException('You cannot follow yourself.');

    const existing = await this.follows.find(follower.id, followee.id);
    if (existing) return toFollowResponseDto(existing);

    const created = await this.tx.run(async () => await this.follows.create(follower, followee));
    this.logger.debug(`Blog ${follower.id} followed blog ${followee.id}`);
    return toFollowResponseDto(created);
  }

  async unfollow(principal: Principal, blogName: string): Promise<void> {
    const follower = await this.blogs.getActiveBlog(principal);
    const followee = await this.blogs.getBlogByName(blogName);
    await this.tx.run(async () => await this.follows.delete(follower.id, followee.id));
  }

  async updateFollow(principal: Principal, blogName: string, settings: FollowSettings): Promise<FollowResponseDto> {
    const follower = await this.blogs.getActiveBlog(principal);
    const followee = await this.blogs.getBlogByName(blogName);
    const follow = await this.follows.find(follower.id, followee.id);
    if (!follow) throw new NotFoundException(`Blog ${follower.blogName} does not follow ${followee.blogName}.`);

    const updated = await this.tx.run(
      async () =>
        await this.follows.update({
          ...follow,
          notificationsEnabled: settings.notificationsEnabled ?? follow.notificationsEnabled,
          muted: settings.muted ?? follow.muted,
        }),
    );
    return toFollowResponseDto(updated);
  }

  async listFollowing(blogName: string, page: PageRequest): Promise<Page<FollowResponseDto>> {
    const blog = await this.blogs.getBlogByName(blogName);
    return mapPage(await this.follows.listByFollower(blog.id, page), toFollowResponseDto);
  }

  async listFollowers(blogName: string, page: PageRequest): Promise<Page<FollowResponseDto>> {
    const blog = await this.blogs.getBlogByName(blogName);
    return mapPage(await this.follows.listByFollowee(blog.id, page), toFollowResponseDto);
  }
}
