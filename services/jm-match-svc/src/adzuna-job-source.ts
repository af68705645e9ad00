import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';

import { cancelledError, configurationError, describeError, getLogger } from '@jobmatch/common';
import type { Logger } from 'pino';

import type { AdzunaSettings } from './config';
import type { FetchJobsOptions, JobCandidate, JobSource } from './types';

const PAGE_SIZE = 50;

const JOB_TYPE_LABELS: Readonly<Record<string, string>> = {
  full_time: 'Full-time',
  part_time: 'Part-time',
  contract: 'Contract',
  temporary: 'Temporary',
  permanent: 'Permanent',
  internship: 'Internship'
};

const displayNameSchema = z.object({ display_name: z.string().optional() }).passthrough();

export const adzunaJobSchema = z
  .object({
    id: z.union([z.string(), z.number()]).optional(),
    title: z.string().optional(),
    description: z.string().optional(),
    created: z.string().optional(),
    redirect_url: z.string().optional(),
    salary_min: z.number().nullable().optional(),
    salary_max: z.number().nullable().optional(),
    contract_type: z.string().nullable().optional(),
    contract_time: z.string().nullable().optional(),
    company: displayNameSchema.optional(),
    location: displayNameSchema.optional()
  })
  .passthrough();

const adzunaPageSchema = z
  .object({
    results: z.array(z.unknown()).default([])
  })
  .passthrough();

export type AdzunaJob = z.infer<typeof adzunaJobSchema>;

const NAMED_FIELDS = new Set([
  'id',
  'title',
  'description',
  'created',
  'redirect_url',
  'salary_min',
  'salary_max',
  'contract_type',
  'contract_time',
  'company',
  'location'
]);

function formatDollars(value: number): string {
  return `$${value.toLocaleString('en-US', { maximumFractionDigits: 0 })}`;
}

export function formatSalary(min: number | null | undefined, max: number | null | undefined): string | undefined {
  if (min && max) {
    return `${formatDollars(min)} - ${formatDollars(max)}`;
  }
  if (min) {
    return `${formatDollars(min)}+`;
  }
  return undefined;
}

// A missing field counts as full_time; an explicit null maps to nothing.
function jobTypeLabel(value: string | null | undefined): string | undefined {
  return value === null ? undefined : JOB_TYPE_LABELS[value ?? 'full_time'];
}

export function parseJobType(contractType: string | null | undefined, contractTime: string | null | undefined): string {
  return jobTypeLabel(contractType) ?? jobTypeLabel(contractTime) ?? 'Full-time';
}

export function toJobCandidate(job: AdzunaJob, now: Date = new Date()): JobCandidate {
  const attributes = Object.fromEntries(Object.entries(job).filter(([key]) => !NAMED_FIELDS.has(key)));

  return {
    id: job.id === undefined ? undefined : String(job.id),
    title: job.title ?? 'N/A',
    company: job.company?.display_name ?? 'N/A',
    location: job.location?.display_name ?? 'N/A',
    description: job.description ?? '',
    salary: formatSalary(job.salary_min, job.salary_max),
    url: job.redirect_url,
    source: 'Adzuna',
    postedDate: job.created ?? now.toISOString().slice(0, 10),
    jobType: parseJobType(job.contract_type, job.contract_time),
    attributes
  };
}

export interface AdzunaJobSourceOptions {
  settings: AdzunaSettings;
  http?: AxiosInstance;
  logger?: Logger;
}

/** Pages through the Adzuna job search API, up to 50 results per page. */
export class AdzunaJobSource implements JobSource {
  private readonly appId: string;
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly http: AxiosInstance;
  private readonly logger: Logger;

  constructor({ settings, http, logger }: AdzunaJobSourceOptions) {
    if (!settings.appId || !settings.apiKey) {
      throw configurationError('ADZUNA_APP_ID and ADZUNA_API_KEY must be set to fetch jobs.');
    }

    this.appId = settings.appId;
    this.apiKey = settings.apiKey;
    this.baseUrl = settings.baseUrl.replace(/\/+$/, '');
    this.http = http ?? axios.create({ timeout: settings.timeoutMs });
    this.logger = logger ?? getLogger({ module: 'adzuna-job-source' });
  }

  async fetch(location: string, keywords: string, maxCount: number, options: FetchJobsOptions = {}): Promise<JobCandidate[]> {
    const { signal, onProgress } = options;
    const jobs: JobCandidate[] = [];
    let page = 1;

    try {
      while (jobs.length < maxCount) {
        const requested = Math.min(PAGE_SIZE, maxCount - jobs.length);
        this.logger.info({ page, requested }, 'Fetching jobs from Adzuna.');

        const response = await this.http.get<unknown>(`${this.baseUrl}/${page}`, {
          params: {
            app_id: this.appId,
            app_key: this.apiKey,
            results_per_page: requested,
            what: keywords,
            where: location
          },
          signal
        });

        const { results } = adzunaPageSchema.parse(response.data);
        if (results.length === 0) {
          break;
        }

        for (const raw of results) {
          const parsed = adzunaJobSchema.safeParse(raw);
          if (!parsed.success) {
            this.logger.warn({ page, issues: parsed.error.issues.length }, 'Skipping malformed Adzuna job.');
            continue;
          }
          jobs.push(toJobCandidate(parsed.data));
        }

        onProgress?.(Math.min(jobs.length, maxCount), maxCount);

        if (results.length < requested) {
          break;
        }
        page += 1;
      }
    } catch (error) {
      if (signal?.aborted) {
        throw cancelledError('Job fetch cancelled.', { fetched: jobs.length }, error);
      }
      this.logger.error({ page, fetched: jobs.length, error: describeError(error) }, 'Error fetching from Adzuna API.');
    }

    return jobs.slice(0, maxCount);
  }
}
