import { mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterAll, beforeAll, describe, expect, it, vi } from 'vitest';

import { LocalDeterministicProvider } from '@jobmatch/embed-svc';

import { createDefaultPipeline, getMatchServiceConfig, type JobSource, type MatchServiceConfig } from '../index';

let workDir = '';

beforeAll(async () => {
  workDir = await mkdtemp(path.join(os.tmpdir(), 'match-pipeline-'));
});

afterAll(async () => {
  await rm(workDir, { recursive: true, force: true });
});

function configFor(resultsDir: string): MatchServiceConfig {
  const config = getMatchServiceConfig();
  return {
    ...config,
    adzuna: { ...config.adzuna, appId: 'test-app', apiKey: 'test-secret' },
    artifacts: { enabled: true, resultsDir }
  };
}

describe('createDefaultPipeline', () => {
  it('reads the resume from disk and writes artifacts to the results directory', async () => {
    const resumePath = path.join(workDir, 'resume.txt');
    await writeFile(resumePath, 'Senior Python engineer, 5 years', 'utf8');
    const resultsDir = path.join(workDir, 'results');
    const jobSource: JobSource = {
      fetch: vi.fn(async () => [
        { id: 'design-1', title: 'Designer', description: 'Graphic designer wanted' },
        { id: 'backend-1', title: 'Backend', description: 'Python backend role' }
      ])
    };
    let now = 0;

    const pipeline = createDefaultPipeline({
      config: configFor(resultsDir),
      jobSource,
      embedding: {
        provider: new LocalDeterministicProvider(1536),
        clock: () => now,
        sleep: async (ms) => {
          now += ms;
        }
      }
    });

    const recommendations = await pipeline.run({ resumePath, topN: 1 });

    expect(recommendations.map((recommendation) => [recommendation.id, recommendation.similarity])).toEqual([
      ['backend-1', 0.2582]
    ]);
    expect((await readdir(resultsDir)).sort()).toEqual([
      'job_embeddings.json',
      'job_postings_raw.json',
      'resume_cleaned.txt',
      'resume_embedding.json',
      'similarity_scores.json',
      'similarity_statistics.json',
      'top_recommendations.csv',
      'top_recommendations.json'
    ]);
    await expect(readFile(path.join(resultsDir, 'resume_cleaned.txt'), 'utf8')).resolves.toBe(
      'senior python engineer 5 years'
    );
  });

  it('skips artifacts when saving is turned off', async () => {
    const resultsDir = path.join(workDir, 'unused');
    const resumePath = path.join(workDir, 'short.txt');
    await writeFile(resumePath, 'Python developer', 'utf8');

    const pipeline = createDefaultPipeline({
      config: configFor(resultsDir),
      saveArtifacts: false,
      jobSource: { fetch: async () => [{ title: 'Python role', description: 'Python developer needed' }] },
      embedding: { provider: new LocalDeterministicProvider(1536), sleep: async () => undefined }
    });

    await expect(pipeline.run({ resumePath })).resolves.toHaveLength(1);
    await expect(readdir(resultsDir)).rejects.toMatchObject({ code: 'ENOENT' });
  });
});
