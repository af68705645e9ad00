import { invalidInputError } from '@jobmatch/common';

import type { ExperienceLevel, FilterCriteria, JobType } from './types';

export const EXPERIENCE_LEVELS: readonly ExperienceLevel[] = [
  'Entry Level',
  'Junior',
  'Mid-Level',
  'Senior',
  'Lead',
  'Principal',
  'Executive'
];

export const JOB_TYPES: readonly JobType[] = ['Full-time', 'Part-time', 'Contract', 'Temporary', 'Internship', 'Permanent'];

export interface CliOptions {
  resumePath: string;
  location?: string;
  keywords?: string;
  maxJobs?: number;
  topN?: number;
  filters?: FilterCriteria;
  output?: string;
  saveArtifacts: boolean;
  help: boolean;
}

export const USAGE = `Usage: recommend <resume> [options]

Ranks job postings against a resume (.txt, .pdf, .docx or .doc).

Options:
  --location <place>        Job location
  --keywords <words>        Search keywords
  --max-jobs <n>            Maximum jobs to fetch
  --top-n <n>               Number of recommendations to show
  --min-salary <amount>     Minimum salary
  --experience <level...>   ${EXPERIENCE_LEVELS.join(', ')}
  --job-type <type...>      ${JOB_TYPES.join(', ')}
  --skills <a,b,c>          Required skills, comma-separated
  --output <file.csv>       Also write recommendations to a CSV file
  --no-artifacts            Do not write stage artifacts to the results directory
  --help                    Show this message`;

function parseInteger(flag: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw invalidInputError(`--${flag} expects a non-negative integer, got "${value}".`, { flag, value });
  }
  return parsed;
}

function pickChoice<T extends string>(flag: string, value: string, choices: readonly T[]): T {
  const match = choices.find((choice) => choice.toLowerCase() === value.toLowerCase());
  if (!match) {
    throw invalidInputError(`--${flag} must be one of: ${choices.join(', ')}.`, { flag, value });
  }
  return match;
}

export function parseCliArgs(argv: readonly string[]): CliOptions {
  const positionals: string[] = [];
  const values: Record<string, string> = {};
  const lists: Record<string, string[]> = {};
  let saveArtifacts = true;
  let help = false;

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (!arg.startsWith('--')) {
      positionals.push(arg);
      continue;
    }

    const flag = arg.slice(2);
    if (flag === 'no-artifacts') {
      saveArtifacts = false;
      continue;
    }
    if (flag === 'help') {
      help = true;
      continue;
    }

    if (flag === 'experience' || flag === 'job-type') {
      const items: string[] = [];
      while (i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
        items.push(argv[i + 1]);
        i += 1;
      }
      if (items.length === 0) {
        throw invalidInputError(`Missing value for flag --${flag}`, { flag });
      }
      lists[flag] = [...(lists[flag] ?? []), ...items];
      continue;
    }

    const value = argv[i + 1];
    if (value === undefined || value.startsWith('--')) {
      throw invalidInputError(`Missing value for flag --${flag}`, { flag });
    }
    values[flag] = value;
    i += 1;
  }

  const known = new Set(['location', 'keywords', 'max-jobs', 'top-n', 'min-salary', 'skills', 'output']);
  const unknown = Object.keys(values).find((flag) => !known.has(flag));
  if (unknown) {
    throw invalidInputError(`Unknown flag --${unknown}`, { flag: unknown });
  }

  if (help) {
    return { resumePath: positionals[0] ?? '', saveArtifacts, help };
  }
  if (positionals.length !== 1) {
    throw invalidInputError('Expected exactly one resume path.', { positionals: positionals.length });
  }

  const filters: FilterCriteria = {};
  if (values['min-salary'] !== undefined) {
    filters.salaryMin = parseInteger('min-salary', values['min-salary']);
  }
  if (lists.experience) {
    filters.experienceLevels = lists.experience.map((level) => pickChoice('experience', level, EXPERIENCE_LEVELS));
  }
  if (lists['job-type']) {
    filters.jobTypes = lists['job-type'].map((type) => pickChoice('job-type', type, JOB_TYPES));
  }
  if (values.skills !== undefined) {
    filters.requiredSkills = values.skills
      .split(',')
      .map((skill) => skill.trim())
      .filter((skill) => skill.length > 0);
  }

  return {
    resumePath: positionals[0],
    location: values.location,
    keywords: values.keywords,
    maxJobs: values['max-jobs'] === undefined ? undefined : parseInteger('max-jobs', values['max-jobs']),
    topN: values['top-n'] === undefined ? undefined : parseInteger('top-n', values['top-n']),
    filters: Object.keys(filters).length > 0 ? filters : undefined,
    output: values.output,
    saveArtifacts,
    help
  };
}
