import { Controller, Get, Param, ParseIntPipe } from '@nestjs/common';
import { BlogsService } from './blogs.service';

@Controller('blogs')
export class BlogsController {
  constructor(private readonly blogs: BlogsService) {}

  @Get('id/:id')
  async byId(@Param('id', ParseIntPipe) id: number) {
    return { data: await this.blogs.getBlogResponseDto(id) };
  }

  @Get(':blogName')
  async byName(@Param('blogName') blogName: string) {
    return { data: await this.blogs.getBlogResponseDtoByName(blogName) };
  }
}
