import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { resetConfigForTesting } from '@jobmatch/common';

import { DEFAULT_ADZUNA_BASE_URL, getMatchServiceConfig, resetMatchServiceConfig } from '../config';

const ORIGINAL_ENV = { ...process.env };

const MATCH_KEYS = [
  'ADZUNA_APP_ID',
  'ADZUNA_API_KEY',
  'ADZUNA_BASE_URL',
  'ADZUNA_TIMEOUT_MS',
  'MATCH_DEFAULT_LOCATION',
  'MATCH_DEFAULT_KEYWORDS',
  'MATCH_MAX_JOBS',
  'MATCH_TOP_N',
  'MATCH_JOB_TEXT',
  'SAVE_ARTIFACTS',
  'RESULTS_DIR'
];

beforeEach(() => {
  for (const key of MATCH_KEYS) {
    delete process.env[key];
  }
  resetMatchServiceConfig();
  resetConfigForTesting();
});

afterEach(() => {
  process.env = { ...ORIGINAL_ENV };
  resetMatchServiceConfig();
  resetConfigForTesting();
});

describe('getMatchServiceConfig', () => {
  it('uses defaults when nothing is set', () => {
    const config = getMatchServiceConfig();

    expect(config.adzuna).toEqual({
      appId: undefined,
      apiKey: undefined,
      baseUrl: DEFAULT_ADZUNA_BASE_URL,
      timeoutMs: 10_000
    });
    expect(config.defaults).toEqual({
      location: 'St. Louis, MO',
      keywords: 'software engineer',
      maxJobs: 50,
      topN: 10,
      jobText: 'description'
    });
    expect(config.artifacts).toEqual({ enabled: true, resultsDir: 'results' });
  });

  it('reads overrides from the environment', () => {
    process.env.ADZUNA_APP_ID = 'test-app';
    process.env.ADZUNA_API_KEY = 'test-secret';
    process.env.MATCH_MAX_JOBS = '200';
    process.env.MATCH_TOP_N = '0';
    process.env.MATCH_JOB_TEXT = 'Composite';
    process.env.SAVE_ARTIFACTS = 'false';
    process.env.RESULTS_DIR = '/tmp/jm-results';

    const config = getMatchServiceConfig();

    expect(config.adzuna.appId).toBe('test-app');
    expect(config.adzuna.apiKey).toBe('test-secret');
    expect(config.defaults.maxJobs).toBe(200);
    expect(config.defaults.topN).toBe(10);
    expect(config.defaults.jobText).toBe('composite');
    expect(config.artifacts).toEqual({ enabled: false, resultsDir: '/tmp/jm-results' });
  });

  it('caches until reset', () => {
    const first = getMatchServiceConfig();
    process.env.MATCH_DEFAULT_LOCATION = 'Remote';

    expect(getMatchServiceConfig()).toBe(first);
    resetMatchServiceConfig();
    expect(getMatchServiceConfig().defaults.location).toBe('Remote');
  });
});
