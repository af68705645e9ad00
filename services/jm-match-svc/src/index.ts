import { getLogger } from '@jobmatch/common';
import { createEmbeddingStack, type EmbeddingStackOptions } from '@jobmatch/embed-svc';
import type { Logger } from 'pino';

import { AdzunaJobSource } from './adzuna-job-source';
import { FileArtifactStore } from './artifact-store';
import { getMatchServiceConfig, type MatchServiceConfig } from './config';
import { KeywordJobFilter } from './job-filter';
import { RecommendationPipeline } from './pipeline';
import { FileResumeExtractor } from './resume-extractor';
import { TextNormalizer } from './text-normalizer';
import type { JobSource } from './types';

export * from './adzuna-job-source';
export * from './artifact-store';
export * from './config';
export * from './job-filter';
export * from './pipeline';
export * from './ranker';
export * from './resume-extractor';
export * from './similarity';
export * from './text-normalizer';
export * from './types';

export interface DefaultPipelineOptions {
  config?: MatchServiceConfig;
  embedding?: EmbeddingStackOptions;
  jobSource?: JobSource;
  saveArtifacts?: boolean;
  logger?: Logger;
}

/** Builds the pipeline with the Adzuna source, file-based resume reading and configured embeddings. */
export function createDefaultPipeline(options: DefaultPipelineOptions = {}): RecommendationPipeline {
  const config = options.config ?? getMatchServiceConfig();
  const logger = options.logger ?? getLogger({ module: 'match-svc' });
  const { client, batchEmbedder } = createEmbeddingStack({ logger, ...options.embedding });
  const saveArtifacts = options.saveArtifacts ?? config.artifacts.enabled;

  return new RecommendationPipeline({
    resumeExtractor: new FileResumeExtractor({ logger: logger.child({ component: 'resume-extractor' }) }),
    jobSource:
      options.jobSource ??
      new AdzunaJobSource({ settings: config.adzuna, logger: logger.child({ component: 'adzuna-job-source' }) }),
    client,
    batchEmbedder,
    normalizer: new TextNormalizer(),
    postFilter: new KeywordJobFilter(logger.child({ component: 'job-filter' })),
    artifacts: saveArtifacts
      ? new FileArtifactStore({
          resultsDir: config.artifacts.resultsDir,
          logger: logger.child({ component: 'artifact-store' })
        })
      : undefined,
    defaults: config.defaults,
    logger: logger.child({ component: 'pipeline' })
  });
}
