import { ResourceType, SkillCategory, isResourceType, normalizeCategory } from '../common/types';
import { DEFAULT_MIN_THRESHOLD, DEFAULT_QUOTAS, DEFAULT_THRESHOLDS, QuotaTable } from './course-availability.config';

export type TypeCounts = Record<ResourceType, number>;

/**
 * Read-only view over the per-category thresholds and quota table.
 * Any category string is accepted; unknown ones resolve to DEFAULT.
 */
export class QuotaPolicy {
  constructor(
    private readonly thresholds: Readonly<Record<SkillCategory, number>> = DEFAULT_THRESHOLDS,
    private readonly quotas: Readonly<QuotaTable> = DEFAULT_QUOTAS,
    readonly minThreshold: number = DEFAULT_MIN_THRESHOLD,
  ) {}

  thresholdFor(category: string | undefined): number {
    return this.thresholds[normalizeCategory(category)];
  }

  allThresholds(): Record<SkillCategory, number> {
    return { ...this.thresholds };
  }

  /** Extended quota: basic plus reserve. */
  quotaFor(category: string | undefined): TypeCounts {
    const row = this.quotas[normalizeCategory(category)];
    return this.countsFrom((type) => row[type].basic + row[type].reserve);
  }

  basicQuotaFor(category: string | undefined): TypeCounts {
    const row = this.quotas[normalizeCategory(category)];
    return this.countsFrom((type) => row[type].basic);
  }

  private countsFrom(pick: (type: ResourceType) => number): TypeCounts {
    return {
      course: pick('course'),
      project: pick('project'),
      certification: pick('certification'),
      specialization: pick('specialization'),
      degree: pick('degree'),
    };
  }
}

/** Unknown types carry no quota. */
export function quotaOf(counts: Partial<TypeCounts>, type: string): number {
  return isResourceType(type) ? counts[type] || 0 : 0;
}
