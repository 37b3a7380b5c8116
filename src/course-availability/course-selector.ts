import { CourseCandidate, RESOURCE_TYPES, ResourceType, SkillCategory } from '../common/types';
import { MAX_RESULTS_PER_SKILL } from './course-availability.config';
import { QuotaPolicy, quotaOf } from './quota-policy';

export interface CourseSelection {
  ids: string[];
  selected: CourseCandidate[];
  typeDiversity: number;
  courseTypes: ResourceType[];
  promotedReserve: number;
}

/**
 * Turns one skill's threshold-filtered candidates into its final ranked
 * result. Implementations must return only input candidates, without
 * duplicate ids, and at most `maxResults` of them.
 */
export interface CourseSelectionStrategy {
  readonly name: string;
  select(candidates: readonly CourseCandidate[], category: SkillCategory | string): CourseSelection;
}

export class DeficitFillingSelector implements CourseSelectionStrategy {
  readonly name = 'deficit_filling';

  constructor(
    private readonly policy: QuotaPolicy,
    private readonly maxResults: number = MAX_RESULTS_PER_SKILL,
  ) {}

  select(candidates: readonly CourseCandidate[], category: SkillCategory | string): CourseSelection {
    const groups = groupByType(rankUnique(candidates));
    const basic = this.policy.basicQuotaFor(category);
    const extended = this.policy.quotaFor(category);

    const picked: CourseCandidate[] = [];
    let deficit = 0;

    for (const type of RESOURCE_TYPES) {
      if (type === 'course') continue;
      const quota = quotaOf(basic, type);
      const taken = (groups.get(type) || []).slice(0, quota);
      picked.push(...taken);
      deficit += quota - taken.length;
    }

    const courses = groups.get('course') || [];
    const basicCourses = courses.slice(0, quotaOf(basic, 'course'));
    const reserveCourses = courses.slice(basicCourses.length, quotaOf(extended, 'course'));
    const promotedReserve = deficit > 0 ? Math.min(deficit, reserveCourses.length) : 0;

    // a promoted reserve course may outrank an item kept only to fill its quota
    const ranked = sortBySimilarity([...basicCourses, ...picked, ...reserveCourses.slice(0, promotedReserve)]);
    return describe(ranked.slice(0, this.maxResults), promotedReserve);
  }
}

export class SimilarityRankingSelector implements CourseSelectionStrategy {
  readonly name = 'similarity_ranking';

  constructor(private readonly maxResults: number = MAX_RESULTS_PER_SKILL) {}

  select(candidates: readonly CourseCandidate[]): CourseSelection {
    return describe(rankUnique(candidates).slice(0, this.maxResults), 0);
  }
}

export function createCourseSelector(
  deficitFillingEnabled: boolean,
  policy: QuotaPolicy,
  maxResults: number = MAX_RESULTS_PER_SKILL,
): CourseSelectionStrategy {
  return deficitFillingEnabled ? new DeficitFillingSelector(policy, maxResults) : new SimilarityRankingSelector(maxResults);
}

function sortBySimilarity(candidates: readonly CourseCandidate[]): CourseCandidate[] {
  // Array.prototype.sort is stable, ties keep their input order
  return [...candidates].sort((a, b) => b.similarity - a.similarity);
}

function rankUnique(candidates: readonly CourseCandidate[]): CourseCandidate[] {
  const seen = new Set<string>();
  return sortBySimilarity(candidates).filter((candidate) => {
    if (seen.has(candidate.id)) return false;
    seen.add(candidate.id);
    return true;
  });
}

function groupByType(ranked: readonly CourseCandidate[]): Map<ResourceType, CourseCandidate[]> {
  const groups = new Map<ResourceType, CourseCandidate[]>();
  for (const candidate of ranked) {
    const group = groups.get(candidate.type);
    if (group) {
      group.push(candidate);
    } else {
      groups.set(candidate.type, [candidate]);
    }
  }
  return groups;
}

function describe(selected: CourseCandidate[], promotedReserve: number): CourseSelection {
  const present = new Set(selected.map((c) => c.type));
  const courseTypes = RESOURCE_TYPES.filter((type) => present.has(type));

  return {
    ids: selected.map((c) => c.id),
    selected,
    typeDiversity: courseTypes.length,
    courseTypes,
    promotedReserve,
  };
}
