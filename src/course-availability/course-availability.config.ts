import { ResourceType, SkillCategory } from '../common/types';

export interface TypeQuota {
  basic: number;
  reserve: number;
}

export type QuotaTable = Record<SkillCategory, Record<ResourceType, TypeQuota>>;

export interface CourseAvailabilityConfig {
  cacheEnabled: boolean;
  cacheMaxSize: number;
  cacheTtlMs: number;
  cacheCleanupIntervalMs: number;
  deficitFillingEnabled: boolean;
  courseDetailsEnabled: boolean;
  queryTimeoutMs: number;
  candidateLimit: number;
  maxResults: number;
  platform: string;
  minThreshold: number;
  thresholds: Record<SkillCategory, number>;
  quotas: QuotaTable;
}

export const MAX_RESULTS_PER_SKILL = 25;

export const DEFAULT_THRESHOLDS: Readonly<Record<SkillCategory, number>> = {
  SKILL: 0.3,
  FIELD: 0.25,
  DEFAULT: 0.3,
};

export const DEFAULT_MIN_THRESHOLD = 0.25;

const q = (basic: number, reserve = 0): TypeQuota => ({ basic, reserve });

// SKILL gaps lean on courses and hands-on projects, FIELD gaps on
// specializations and degrees.
export const DEFAULT_QUOTAS: Readonly<QuotaTable> = {
  SKILL: {
    course: q(15, 10),
    project: q(5),
    certification: q(2),
    specialization: q(0),
    degree: q(0),
  },
  FIELD: {
    course: q(5, 10),
    project: q(0),
    certification: q(2),
    specialization: q(12),
    degree: q(4),
  },
  DEFAULT: {
    course: q(10, 10),
    project: q(3),
    certification: q(3),
    specialization: q(3),
    degree: q(1),
  },
};

export function loadCourseAvailabilityConfig(env: NodeJS.ProcessEnv = process.env): CourseAvailabilityConfig {
  const thresholds: Record<SkillCategory, number> = {
    SKILL: readThreshold(env, 'COURSE_THRESHOLD_SKILL', DEFAULT_THRESHOLDS.SKILL),
    FIELD: readThreshold(env, 'COURSE_THRESHOLD_FIELD', DEFAULT_THRESHOLDS.FIELD),
    DEFAULT: readThreshold(env, 'COURSE_THRESHOLD_DEFAULT', DEFAULT_THRESHOLDS.DEFAULT),
  };

  return {
    cacheEnabled: readFlag(env, 'ENABLE_COURSE_CACHE', true),
    cacheMaxSize: readPositiveInt(env, 'COURSE_CACHE_MAX_SIZE', 1000),
    cacheTtlMs: readPositiveInt(env, 'COURSE_CACHE_TTL_MINUTES', 30) * 60_000,
    cacheCleanupIntervalMs: readPositiveInt(env, 'COURSE_CACHE_CLEANUP_INTERVAL_MINUTES', 60) * 60_000,
    deficitFillingEnabled: readFlag(env, 'ENABLE_DEFICIT_FILLING', true),
    courseDetailsEnabled: readFlag(env, 'ENABLE_COURSE_DETAILS', true),
    queryTimeoutMs: readPositiveInt(env, 'COURSE_QUERY_TIMEOUT_MS', 3000),
    candidateLimit: readPositiveInt(env, 'COURSE_CANDIDATE_LIMIT', 80),
    maxResults: Math.min(readPositiveInt(env, 'COURSE_MAX_RESULTS', MAX_RESULTS_PER_SKILL), MAX_RESULTS_PER_SKILL),
    platform: (env.COURSE_PLATFORM || 'coursera').trim() || 'coursera',
    minThreshold: readThreshold(env, 'COURSE_MIN_THRESHOLD', DEFAULT_MIN_THRESHOLD),
    thresholds,
    quotas: readQuotas(env),
  };
}

function readFlag(env: NodeJS.ProcessEnv, name: string, fallback: boolean): boolean {
  const raw = (env[name] || '').trim().toLowerCase();
  if (!raw) return fallback;
  return raw === 'true' || raw === '1' || raw === 'yes';
}

function readPositiveInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = (env[name] || '').trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    console.warn(`[CourseAvailabilityConfig] Ignoring ${name}="${raw}", expected a positive integer`);
    return fallback;
  }
  return value;
}

function readThreshold(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = (env[name] || '').trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    console.warn(`[CourseAvailabilityConfig] Ignoring ${name}="${raw}", expected a number between 0 and 1`);
    return fallback;
  }
  return value;
}

/**
 * Quotas are overridden per cell, e.g. `COURSE_QUOTA_SKILL_COURSE=15:10`
 * (basic 15, reserve 10) or `COURSE_QUOTA_FIELD_DEGREE=3` (basic only).
 */
function readQuotas(env: NodeJS.ProcessEnv): QuotaTable {
  return {
    SKILL: readQuotaRow(env, 'SKILL'),
    FIELD: readQuotaRow(env, 'FIELD'),
    DEFAULT: readQuotaRow(env, 'DEFAULT'),
  };
}

function readQuotaRow(env: NodeJS.ProcessEnv, category: SkillCategory): Record<ResourceType, TypeQuota> {
  const cell = (type: ResourceType): TypeQuota => {
    const name = `COURSE_QUOTA_${category}_${type.toUpperCase()}`;
    return parseQuota(name, env[name]) || { ...DEFAULT_QUOTAS[category][type] };
  };

  return {
    course: cell('course'),
    project: cell('project'),
    certification: cell('certification'),
    specialization: cell('specialization'),
    degree: cell('degree'),
  };
}

function parseQuota(name: string, raw: string | undefined): TypeQuota | null {
  const value = (raw || '').trim();
  if (!value) return null;

  const match = /^(\d+)(?::(\d+))?$/.exec(value);
  if (!match) {
    console.warn(`[CourseAvailabilityConfig] Ignoring ${name}="${value}", expected "basic" or "basic:reserve"`);
    return null;
  }

  return {
    basic: Number(match[1]),
    reserve: match[2] ? Number(match[2]) : 0,
  };
}
