import { getLogger } from '@jobmatch/common';
import type { Logger } from 'pino';

import type { ExperienceLevel, FilterCriteria, JobCandidate, PostFilter } from './types';

export const EXPERIENCE_LEVEL_PATTERNS: Readonly<Record<ExperienceLevel, RegExp>> = {
  'Entry Level': /\b(entry|junior|jr|graduate|intern)\b/i,
  Junior: /\b(junior|jr)\b/i,
  'Mid-Level': /\b(mid|middle|intermediate)\b/i,
  Senior: /\b(senior|sr)\b/i,
  Lead: /\b(lead|principal|staff)\b/i,
  Principal: /\b(principal|staff|architect)\b/i,
  Executive: /\b(executive|director|vp|cto|ceo|head)\b/i
};

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function searchableText(job: JobCandidate): string {
  return `${job.title ?? ''} ${job.description ?? ''}`;
}

/** First number in a salary string such as "$100,000 - $150,000". */
export function parseSalaryFloor(salary: string | undefined): number | null {
  if (!salary || salary === 'N/A') {
    return null;
  }

  const match = /\$?([\d,]+)/.exec(salary);
  if (!match) {
    return null;
  }

  const value = Number.parseInt(match[1].replace(/,/g, ''), 10);
  return Number.isFinite(value) ? value : null;
}

/**
 * Narrows fetched jobs by salary floor, experience level, job type and skills.
 * Criteria left empty are not applied; jobs without a salary pass the salary check.
 */
export class KeywordJobFilter implements PostFilter {
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? getLogger({ module: 'job-filter' });
  }

  apply(candidates: readonly JobCandidate[], criteria: FilterCriteria): JobCandidate[] {
    let jobs = [...candidates];
    const { salaryMin = 0, experienceLevels = [], jobTypes = [], requiredSkills = [] } = criteria;

    if (salaryMin > 0) {
      jobs = jobs.filter((job) => {
        const floor = parseSalaryFloor(job.salary);
        return floor === null || floor >= salaryMin;
      });
    }

    if (experienceLevels.length > 0) {
      const patterns = experienceLevels.map((level) => EXPERIENCE_LEVEL_PATTERNS[level]);
      jobs = jobs.filter((job) => patterns.some((pattern) => pattern.test(searchableText(job))));
    }

    if (jobTypes.length > 0) {
      const needles = jobTypes.map((type) => type.toLowerCase());
      jobs = jobs.filter((job) => {
        const jobType = (job.jobType ?? 'Full-time').toLowerCase();
        const text = searchableText(job).toLowerCase();
        return needles.some((needle) => jobType.includes(needle) || text.includes(needle));
      });
    }

    const skills = requiredSkills.map((skill) => skill.trim().toLowerCase()).filter((skill) => skill.length > 0);
    if (skills.length > 0) {
      const patterns = skills.map((skill) => new RegExp(`\\b${escapeRegExp(skill)}\\b`));
      jobs = jobs.filter((job) => {
        const text = searchableText(job).toLowerCase();
        return patterns.some((pattern) => pattern.test(text));
      });
    }

    this.logger.debug({ before: candidates.length, after: jobs.length }, 'Post-filter applied.');
    return jobs;
  }
}
