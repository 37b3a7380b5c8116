import { CourseCandidate, ResourceType } from '../src/common/types';

export function candidate(id: string, type: ResourceType, similarity: number): CourseCandidate {
  return {
    id,
    type,
    similarity,
    name: `Name ${id}`,
    provider: 'Test University',
    description: `About ${id}`,
  };
}

/** `count` candidates of one type with similarity falling from `top` in 0.01 steps. */
export function candidates(prefix: string, type: ResourceType, count: number, top = 0.9): CourseCandidate[] {
  return Array.from({ length: count }, (_, i) => candidate(`${prefix}${i + 1}`, type, Number((top - i * 0.01).toFixed(2))));
}
