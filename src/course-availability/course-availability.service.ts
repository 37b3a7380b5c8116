import { Inject, Injectable } from '@nestjs/common';
import {
  AvailabilityReport,
  CourseCandidate,
  CourseDetail,
  CourseSearchProvider,
  EmbeddingProvider,
  EnrichedSkillQuery,
  SkillAvailability,
  SkillQuery,
  TelemetrySink,
  normalizeCategory,
} from '../common/types';
import {
  COURSE_AVAILABILITY_CONFIG,
  COURSE_CACHE,
  COURSE_SEARCH_PROVIDER,
  COURSE_SELECTOR,
  EMBEDDING_PROVIDER,
  TELEMETRY_SINK,
} from '../common/tokens';
import { withTimeout } from '../common/utils/with-timeout';
import { buildEmbeddingText, generateCacheKey } from './cache-key';
import { CourseAvailabilityConfig } from './course-availability.config';
import { CourseSelectionStrategy } from './course-selector';
import { DynamicCourseCache } from './dynamic-course-cache';
import { extractEnhancements } from './enhancement';
import { QuotaPolicy } from './quota-policy';

interface PendingSkill {
  index: number;
  skill: SkillQuery;
  cacheKey: string;
}

const UNAVAILABLE: Readonly<SkillAvailability> = {
  has_available_courses: false,
  course_count: 0,
  available_course_ids: [],
  type_diversity: 0,
  course_types: [],
};

@Injectable()
export class CourseAvailabilityService {
  constructor(
    @Inject(COURSE_AVAILABILITY_CONFIG) private readonly config: CourseAvailabilityConfig,
    @Inject(COURSE_CACHE) private readonly cache: DynamicCourseCache<SkillAvailability>,
    @Inject(EMBEDDING_PROVIDER) private readonly embeddings: EmbeddingProvider,
    @Inject(COURSE_SEARCH_PROVIDER) private readonly courseSearch: CourseSearchProvider,
    @Inject(COURSE_SELECTOR) private readonly selector: CourseSelectionStrategy,
    @Inject(TELEMETRY_SINK) private readonly telemetry: TelemetrySink,
    private readonly policy: QuotaPolicy,
  ) {}

  /** Writes the result fields onto each input record and returns those records. */
  async checkAvailability(skills: SkillQuery[]): Promise<EnrichedSkillQuery[]> {
    const report = await this.checkAvailabilityWithEnhancements(skills);
    return report.skills;
  }

  /**
   * Resolves every skill, from cache when possible, and never rejects for
   * collaborator failures: a skill that cannot be resolved is reported with
   * no courses. Each record in `skills` is enriched in place, and the returned
   * list holds those same objects in the same order.
   */
  async checkAvailabilityWithEnhancements(skills: SkillQuery[]): Promise<AvailabilityReport> {
    if (!skills.length) {
      return { skills: [], resume_enhancement_project: {}, resume_enhancement_certification: {} };
    }

    const startedAt = Date.now();
    const results: Array<SkillAvailability | null> = skills.map(() => null);
    const pending: PendingSkill[] = [];

    for (const [index, skill] of skills.entries()) {
      const cacheKey = generateCacheKey(skill, this.policy.thresholdFor(skill.skill_category), this.config.platform);
      const cached = this.config.cacheEnabled ? await this.cache.get(cacheKey) : null;
      if (cached) {
        results[index] = cached;
      } else {
        pending.push({ index, skill, cacheKey });
      }
    }

    const cacheHits = skills.length - pending.length;

    if (pending.length) {
      try {
        const resolved = await this.resolveUncached(pending);
        resolved.forEach((availability, i) => {
          results[pending[i].index] = availability;
        });
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[CourseAvailabilityService] System error while checking ${pending.length} skills`, error);
        this.emit('CourseAvailabilitySystemError', {
          error: message,
          uncached_count: pending.length,
          severity: 'HIGH',
        });
      }
    }

    const enriched = skills.map((skill, index) => Object.assign(skill, this.copyOf(results[index] || UNAVAILABLE)));
    const enhancements = extractEnhancements(enriched);

    const durationMs = Date.now() - startedAt;
    const cacheHitRate = cacheHits / skills.length;
    this.emit('CourseAvailabilityCheck', {
      skill_count: skills.length,
      duration_ms: durationMs,
      cache_hit_rate: cacheHitRate,
      cached_count: cacheHits,
      uncached_count: pending.length,
      cache_enabled: this.config.cacheEnabled,
      selector: this.selector.name,
    });

    const cacheInfo = this.config.cacheEnabled
      ? `(cache hit rate: ${(cacheHitRate * 100).toFixed(1)}%, hits: ${cacheHits})`
      : '(cache disabled)';
    console.log(`[CourseAvailabilityService] Checked ${skills.length} skills in ${durationMs}ms ${cacheInfo}`);

    return {
      skills: enriched,
      resume_enhancement_project: enhancements.projects,
      resume_enhancement_certification: enhancements.certifications,
    };
  }

  /**
   * One embedding round trip for the batch, then one search per skill with
   * its own timeout. Rejects only when the batch as a whole cannot proceed.
   */
  private async resolveUncached(pending: PendingSkill[]): Promise<SkillAvailability[]> {
    const vectors = await this.embeddings.embed(pending.map(({ skill }) => buildEmbeddingText(skill)));
    if (vectors.length !== pending.length) {
      throw new Error(`Embedding provider returned ${vectors.length} vectors for ${pending.length} texts`);
    }

    const settled = await Promise.allSettled(pending.map(({ skill }, i) => this.checkSingleSkill(skill, vectors[i])));

    const resolved: SkillAvailability[] = [];
    for (const [i, outcome] of settled.entries()) {
      const { skill, cacheKey } = pending[i];

      if (outcome.status === 'rejected') {
        const message = outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason);
        console.warn(`[CourseAvailabilityService] Check failed for "${skill.skill_name}": ${message}`);
        this.emit('CourseAvailabilityCheckFailed', {
          skill: skill.skill_name,
          error: message,
          severity: 'MEDIUM',
        });
        resolved.push(this.copyOf(UNAVAILABLE));
        continue;
      }

      if (this.config.cacheEnabled) {
        await this.cache.set(cacheKey, outcome.value);
      }
      resolved.push(outcome.value);
    }

    return resolved;
  }

  private async checkSingleSkill(skill: SkillQuery, vector: number[]): Promise<SkillAvailability> {
    const category = normalizeCategory(skill.skill_category);
    const candidates = await withTimeout(
      this.courseSearch.search({
        vector,
        minThreshold: this.policy.minThreshold,
        category,
        thresholds: this.policy.allThresholds(),
        platform: this.config.platform,
        limit: this.config.candidateLimit,
      }),
      this.config.queryTimeoutMs,
      `Course search for "${skill.skill_name}"`,
    );

    const selection = this.selector.select(candidates, category);
    const availability: SkillAvailability = {
      has_available_courses: selection.ids.length > 0,
      course_count: selection.ids.length,
      available_course_ids: selection.ids,
      type_diversity: selection.typeDiversity,
      course_types: selection.courseTypes,
    };

    if (this.config.courseDetailsEnabled) {
      availability.course_details = selection.selected.map((candidate) => this.toDetail(candidate));
    }

    return availability;
  }

  private toDetail(candidate: CourseCandidate): CourseDetail {
    return {
      id: candidate.id,
      name: candidate.name,
      type: candidate.type,
      provider: candidate.provider,
      description: candidate.description,
      similarity: candidate.similarity,
    };
  }

  private emit(event: string, attributes: Record<string, unknown>): void {
    try {
      this.telemetry.record(event, attributes);
    } catch (error) {
      console.warn(`[CourseAvailabilityService] Telemetry error for ${event}`, error);
    }
  }

  private copyOf(availability: Readonly<SkillAvailability>): SkillAvailability {
    return structuredClone(availability);
  }
}
