import { Inject, Injectable, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { SkillAvailability } from '../common/types';
import { COURSE_AVAILABILITY_CONFIG, COURSE_CACHE } from '../common/tokens';
import { CourseAvailabilityConfig } from './course-availability.config';
import { DynamicCourseCache } from './dynamic-course-cache';

// Expired entries are only dropped lazily on read; keys that are never read
// again stay in memory until this sweep removes them.
@Injectable()
export class CacheSweepService implements OnModuleInit, OnModuleDestroy {
  private timer: NodeJS.Timeout | null = null;
  private running = false;

  constructor(
    @Inject(COURSE_AVAILABILITY_CONFIG) private readonly config: CourseAvailabilityConfig,
    @Inject(COURSE_CACHE) private readonly cache: DynamicCourseCache<SkillAvailability>,
  ) {}

  onModuleInit(): void {
    if (this.config.cacheEnabled) this.start();
  }

  onModuleDestroy(): void {
    this.stop();
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.sweepInBackground(), this.config.cacheCleanupIntervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  async sweep(): Promise<number> {
    if (this.running) return 0;
    this.running = true;
    try {
      return await this.cache.cleanupExpired();
    } finally {
      this.running = false;
    }
  }

  private sweepInBackground(): void {
    this.sweep().catch((error: unknown) => {
      console.error('[CacheSweepService] Background cleanup failed', error);
    });
  }
}
