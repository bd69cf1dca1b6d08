import { ForbiddenException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { TransactionManager } from '../database/transaction-manager';
import type { Principal } from '../auth/principal';
import type { User } from '../users/user.types';
import { UsersService } from '../users/users.service';
import { toBlogResponseDto, type BlogResponseDto } from './blog.dto';
import type { Blog, NewBlog } from './blog.types';
import { BlogsRepository } from './blogs.repository';

function isPersisted(blog: Blog | NewBlog): blog is Blog {
  return 'id' in blog;
}

@Injectable()
export class BlogsService {
  private readonly logger = new Logger(BlogsService.name);

  constructor(
    private readonly blogs: BlogsRepository,
    private readonly users: UsersService,
    private readonly tx: TransactionManager,
  ) {}

  async save(blog: Blog | NewBlog): Promise<Blog> {
    return isPersisted(blog) ? await this.blogs.update(blog) : await this.blogs.create(blog);
  }

  /** Every new user gets a public blog named after them, set as their active blog. */
  async createDefaultBlogForUser(user: User): Promise<Blog> {
    return await this.tx.run(async () => {
      const blog = await this.save({
        blogName: user.username,
        preferredBlogName: user.username,
        isPrivate: false,
        userId: user.id,
      });
      await this.users.save({ ...user, activeBlogId: blog.id });
      this.logger.debug(`Created default blog id=${blog.id} for userId=${user.id}`);
      return blog;
    });
  }

  async getBlog(id: number): Promise<Blog> {
    const blog = await this.blogs.findById(id);
    if (!blog) throw new NotFoundException(`Blog with id ${id} is not found.`);
    return blog;
  }

  async getBlogByName(blogName: string): Promise<Blog> {
    const name = (blogName ?? '').trim();
    const blog = name ? await this.blogs.findByBlogName(name) : null;
    if (!blog) throw new NotFoundException(`Blog with name ${name} is not found.`);
    return blog;
  }

  /** The blog a principal acts as when writing. */
  async getActiveBlog(principal: Principal): Promise<Blog> {
    if (principal.kind === 'anonymous') throw new ForbiddenException('User is anonymous.');
    if (principal.activeBlogId == null) throw new NotFoundException('User has no active blog.');
    return await this.getBlog(principal.activeBlogId);
  }

  async getBlogResponseDto(id: number): Promise<BlogResponseDto> {
    return toBlogResponseDto(await this.getBlog(id));
  }

  async getBlogResponseDtoByName(blogName: string): Promise<BlogResponseDto> {
    return toBlogResponseDto(await this.getBlogByName(blogName));
  }
}
