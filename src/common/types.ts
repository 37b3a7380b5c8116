export const SKILL_CATEGORIES = ['SKILL', 'FIELD', 'DEFAULT'] as const;
export type SkillCategory = (typeof SKILL_CATEGORIES)[number];

export const RESOURCE_TYPES = ['course', 'project', 'certification', 'specialization', 'degree'] as const;
export type ResourceType = (typeof RESOURCE_TYPES)[number];

export interface SkillQuery {
  skill_name: string;
  description: string;
  skill_category?: string;
}

export interface CourseCandidate {
  id: string;
  type: ResourceType;
  similarity: number;
  name: string;
  provider: string;
  description: string;
}

export interface CourseDetail {
  id: string;
  name: string;
  type: ResourceType;
  provider: string;
  description: string;
  similarity: number;
}

export interface SkillAvailability {
  has_available_courses: boolean;
  course_count: number;
  available_course_ids: string[];
  type_diversity: number;
  course_types: ResourceType[];
  course_details?: CourseDetail[];
}

export type EnrichedSkillQuery = SkillQuery & SkillAvailability;

export interface EnhancementEntry {
  id: string;
  name: string;
  provider: string;
  description: string;
  related_skill: string;
}

export interface AvailabilityReport {
  skills: EnrichedSkillQuery[];
  resume_enhancement_project: Record<string, EnhancementEntry>;
  resume_enhancement_certification: Record<string, EnhancementEntry>;
}

export interface EmbeddingProvider {
  embed(texts: string[]): Promise<number[][]>;
}

export interface CourseSearchRequest {
  vector: number[];
  minThreshold: number;
  category: SkillCategory;
  thresholds: Record<SkillCategory, number>;
  platform: string;
  limit: number;
}

export interface CourseSearchProvider {
  search(request: CourseSearchRequest): Promise<CourseCandidate[]>;
}

export interface TelemetrySink {
  record(event: string, attributes: Record<string, unknown>): void;
}

export function isSkillCategory(value: unknown): value is SkillCategory {
  return typeof value === 'string' && SKILL_CATEGORIES.some((category) => category === value);
}

export function isResourceType(value: unknown): value is ResourceType {
  return typeof value === 'string' && RESOURCE_TYPES.some((type) => type === value);
}

export function normalizeCategory(value: unknown): SkillCategory {
  const upper = String(value || '').trim().toUpperCase();
  return isSkillCategory(upper) ? upper : 'DEFAULT';
}
