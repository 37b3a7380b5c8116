import { createHash } from 'node:crypto';
import { normalizeEmbeddingInput } from '../common/services/embedding.service';
import { SkillQuery, normalizeCategory } from '../common/types';

export const CACHE_KEY_LENGTH = 16;
export const DEFAULT_PLATFORM = 'coursera';

/**
 * Text sent to the embedding provider for a skill, already in the form the
 * provider sends on the wire. The cache key is derived from this same string.
 */
export function buildEmbeddingText(skill: SkillQuery): string {
  return normalizeEmbeddingInput(rawEmbeddingText(skill));
}

function rawEmbeddingText(skill: SkillQuery): string {
  const name = skill.skill_name || '';
  const description = skill.description || '';

  switch (normalizeCategory(skill.skill_category)) {
    case 'SKILL':
      return `${name} course project certificate. ${description}`;
    case 'FIELD':
      return `${name} specialization degree. ${description}`;
    default:
      return `${name} ${description}`;
  }
}

export function generateCacheKey(skill: SkillQuery, threshold: number, platform: string = DEFAULT_PLATFORM): string {
  const parts = [buildEmbeddingText(skill), normalizeCategory(skill.skill_category), threshold.toFixed(2), platform];
  return createHash('md5').update(parts.join('|')).digest('hex').slice(0, CACHE_KEY_LENGTH);
}
