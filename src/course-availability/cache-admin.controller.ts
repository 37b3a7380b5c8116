import { Controller, Get, HttpCode, Inject, Post, Query } from '@nestjs/common';
import { SkillAvailability } from '../common/types';
import { COURSE_CACHE } from '../common/tokens';
import { DynamicCourseCache } from './dynamic-course-cache';
import { TopItemsQueryDto } from './dto-top-items-query.dto';

@Controller('api/course-availability/cache')
export class CacheAdminController {
  constructor(@Inject(COURSE_CACHE) private readonly cache: DynamicCourseCache<SkillAvailability>) {}

  @Get('stats')
  async stats() {
    return this.cache.getStats();
  }

  @Get('top-items')
  async topItems(@Query() query: TopItemsQueryDto) {
    return this.cache.getTopItems(query.limit ?? 10);
  }

  @Post('clear')
  @HttpCode(200)
  async clear() {
    await this.cache.clear();
    return { cleared: true };
  }

  @Post('cleanup')
  @HttpCode(200)
  async cleanup() {
    const removed = await this.cache.cleanupExpired();
    return { removed };
  }
}
