import { Module } from '@nestjs/common';
import { CourseVectorStoreService } from '../common/services/course-vector-store.service';
import { EmbeddingService } from '../common/services/embedding.service';
import { TelemetryService } from '../common/services/telemetry.service';
import {
  COURSE_AVAILABILITY_CONFIG,
  COURSE_CACHE,
  COURSE_SEARCH_PROVIDER,
  COURSE_SELECTOR,
  EMBEDDING_PROVIDER,
  TELEMETRY_SINK,
} from '../common/tokens';
import { SkillAvailability, TelemetrySink } from '../common/types';
import { CacheAdminController } from './cache-admin.controller';
import { CacheSweepService } from './cache-sweep.service';
import { CourseAvailabilityConfig, loadCourseAvailabilityConfig } from './course-availability.config';
import { CourseAvailabilityController } from './course-availability.controller';
import { CourseAvailabilityService } from './course-availability.service';
import { createCourseSelector } from './course-selector';
import { DynamicCourseCache } from './dynamic-course-cache';
import { QuotaPolicy } from './quota-policy';

@Module({
  controllers: [CourseAvailabilityController, CacheAdminController],
  providers: [
    EmbeddingService,
    CourseVectorStoreService,
    TelemetryService,
    { provide: COURSE_AVAILABILITY_CONFIG, useFactory: () => loadCourseAvailabilityConfig() },
    {
      provide: QuotaPolicy,
      useFactory: (config: CourseAvailabilityConfig) =>
        new QuotaPolicy(config.thresholds, config.quotas, config.minThreshold),
      inject: [COURSE_AVAILABILITY_CONFIG],
    },
    {
      // the one process-wide cache instance
      provide: COURSE_CACHE,
      useFactory: (config: CourseAvailabilityConfig, telemetry: TelemetrySink) =>
        new DynamicCourseCache<SkillAvailability>({ maxSize: config.cacheMaxSize, ttlMs: config.cacheTtlMs }, telemetry),
      inject: [COURSE_AVAILABILITY_CONFIG, TELEMETRY_SINK],
    },
    {
      provide: COURSE_SELECTOR,
      useFactory: (config: CourseAvailabilityConfig, policy: QuotaPolicy) =>
        createCourseSelector(config.deficitFillingEnabled, policy, config.maxResults),
      inject: [COURSE_AVAILABILITY_CONFIG, QuotaPolicy],
    },
    { provide: EMBEDDING_PROVIDER, useExisting: EmbeddingService },
    { provide: COURSE_SEARCH_PROVIDER, useExisting: CourseVectorStoreService },
    { provide: TELEMETRY_SINK, useExisting: TelemetryService },
    CourseAvailabilityService,
    CacheSweepService,
  ],
  exports: [CourseAvailabilityService],
})
export class CourseAvailabilityModule {}
