import {
  getConfig as getBaseConfig,
  parseBoolean,
  parsePositiveNumber,
  readOptionalString,
  type ServiceConfig
} from '@jobmatch/common';

import type { JobTextMode } from './types';

export interface AdzunaSettings {
  appId?: string;
  apiKey?: string;
  baseUrl: string;
  timeoutMs: number;
}

export interface MatchDefaults {
  location: string;
  keywords: string;
  maxJobs: number;
  topN: number;
  jobText: JobTextMode;
}

export interface ArtifactSettings {
  enabled: boolean;
  resultsDir: string;
}

export interface MatchServiceConfig {
  base: ServiceConfig;
  adzuna: AdzunaSettings;
  defaults: MatchDefaults;
  artifacts: ArtifactSettings;
}

export const DEFAULT_ADZUNA_BASE_URL = 'https://api.adzuna.com/v1/api/jobs/us/search';

let cachedConfig: MatchServiceConfig | null = null;

function resolveJobTextMode(value: string | undefined): JobTextMode {
  return value?.trim().toLowerCase() === 'composite' ? 'composite' : 'description';
}

export function getMatchServiceConfig(): MatchServiceConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  cachedConfig = {
    base: getBaseConfig(),
    adzuna: {
      appId: readOptionalString(process.env.ADZUNA_APP_ID),
      apiKey: readOptionalString(process.env.ADZUNA_API_KEY),
      baseUrl: readOptionalString(process.env.ADZUNA_BASE_URL) ?? DEFAULT_ADZUNA_BASE_URL,
      timeoutMs: parsePositiveNumber(process.env.ADZUNA_TIMEOUT_MS, 10_000)
    },
    defaults: {
      location: readOptionalString(process.env.MATCH_DEFAULT_LOCATION) ?? 'St. Louis, MO',
      keywords: readOptionalString(process.env.MATCH_DEFAULT_KEYWORDS) ?? 'software engineer',
      maxJobs: parsePositiveNumber(process.env.MATCH_MAX_JOBS, 50),
      topN: parsePositiveNumber(process.env.MATCH_TOP_N, 10),
      jobText: resolveJobTextMode(process.env.MATCH_JOB_TEXT)
    },
    artifacts: {
      enabled: parseBoolean(process.env.SAVE_ARTIFACTS, true),
      resultsDir: readOptionalString(process.env.RESULTS_DIR) ?? 'results'
    }
  };

  return cachedConfig;
}

export function resetMatchServiceConfig(): void {
  cachedConfig = null;
}
