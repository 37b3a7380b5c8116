import { CourseDetail, EnhancementEntry, EnrichedSkillQuery } from '../common/types';

export const MAX_PROJECTS_PER_SKILL = 2;
export const MAX_CERTIFICATIONS_PER_SKILL = 4;
export const ENHANCEMENT_DESCRIPTION_LIMIT = 200;

export interface ResumeEnhancements {
  projects: Record<string, EnhancementEntry>;
  certifications: Record<string, EnhancementEntry>;
}

/**
 * Collects resume enhancement suggestions from every skill's detail records:
 * up to 2 projects and 4 certifications/specializations per skill, keyed by
 * course id across the whole batch (a later skill overwrites an earlier one).
 */
export function extractEnhancements(skills: readonly EnrichedSkillQuery[]): ResumeEnhancements {
  const projects: Record<string, EnhancementEntry> = {};
  const certifications: Record<string, EnhancementEntry> = {};

  for (const skill of skills) {
    let projectCount = 0;
    let certificationCount = 0;

    for (const detail of skill.course_details || []) {
      if (detail.type === 'project' && projectCount < MAX_PROJECTS_PER_SKILL) {
        projects[detail.id] = toEntry(detail, skill.skill_name);
        projectCount += 1;
      } else if (
        (detail.type === 'certification' || detail.type === 'specialization') &&
        certificationCount < MAX_CERTIFICATIONS_PER_SKILL
      ) {
        certifications[detail.id] = toEntry(detail, skill.skill_name);
        certificationCount += 1;
      }
    }
  }

  return { projects, certifications };
}

function toEntry(detail: CourseDetail, relatedSkill: string): EnhancementEntry {
  return {
    id: detail.id,
    name: detail.name,
    provider: detail.provider,
    description: (detail.description || '').slice(0, ENHANCEMENT_DESCRIPTION_LIMIT),
    related_skill: relatedSkill,
  };
}
