import {
  describeError,
  emptyResumeError,
  embeddingFailedError,
  getLogger,
  invalidInputError,
  isServiceError,
  noJobsFoundError,
  noJobsMatchFiltersError,
  ServiceError,
  throwIfAborted
} from '@jobmatch/common';
import { countFailed, type BatchEmbedder, type VectorProviderClient } from '@jobmatch/embed-svc';
import type { Logger } from 'pino';

import type { MatchDefaults } from './config';
import { KeywordJobFilter } from './job-filter';
import { topN } from './ranker';
import { similarityAll, similarityStatistics } from './similarity';
import { TextNormalizer } from './text-normalizer';
import type {
  ArtifactPayload,
  ArtifactSink,
  FilterCriteria,
  JobCandidate,
  JobSource,
  PipelineStage,
  PostFilter,
  Recommendation,
  RecommendationRequest,
  ResumeExtractor
} from './types';

export const DEFAULT_MATCH_DEFAULTS: MatchDefaults = {
  location: 'St. Louis, MO',
  keywords: 'software engineer',
  maxJobs: 50,
  topN: 10,
  jobText: 'description'
};

/**
 * Terminal failure of a recommendation run. Keeps the code of the underlying
 * error and records the last stage the run reached.
 */
export class PipelineError extends ServiceError {
  readonly stage: PipelineStage;

  constructor(stage: PipelineStage, error: unknown) {
    const code = isServiceError(error) ? error.code : 'internal';
    const details = isServiceError(error) ? error.details : undefined;
    super(describeError(error), { code, details: { ...details, stage }, cause: error });
    this.name = 'PipelineError';
    this.stage = stage;
  }
}

export interface PipelineDependencies {
  resumeExtractor: ResumeExtractor;
  jobSource: JobSource;
  client: Pick<VectorProviderClient, 'embedOne'>;
  batchEmbedder: Pick<BatchEmbedder, 'embedBatch'>;
  normalizer?: TextNormalizer;
  postFilter?: PostFilter;
  artifacts?: ArtifactSink;
  defaults?: Partial<MatchDefaults>;
  logger?: Logger;
}

function hasCriteria(criteria: FilterCriteria | undefined): criteria is FilterCriteria {
  if (!criteria) {
    return false;
  }
  return (
    (criteria.salaryMin ?? 0) > 0 ||
    (criteria.experienceLevels?.length ?? 0) > 0 ||
    (criteria.jobTypes?.length ?? 0) > 0 ||
    (criteria.requiredSkills?.length ?? 0) > 0
  );
}

/** Resume in, ranked jobs out: embed the resume, embed the jobs, rank by similarity. */
export class RecommendationPipeline {
  private readonly deps: PipelineDependencies;
  private readonly defaults: MatchDefaults;
  private readonly normalizer: TextNormalizer;
  private readonly postFilter: PostFilter;
  private readonly logger: Logger;

  constructor(deps: PipelineDependencies) {
    this.deps = deps;
    this.defaults = { ...DEFAULT_MATCH_DEFAULTS, ...deps.defaults };
    this.normalizer = deps.normalizer ?? new TextNormalizer();
    this.logger = deps.logger ?? getLogger({ module: 'pipeline' });
    this.postFilter = deps.postFilter ?? new KeywordJobFilter(this.logger.child({ component: 'job-filter' }));
  }

  async run(request: RecommendationRequest): Promise<Recommendation[]> {
    const { signal } = request;
    const location = request.location ?? this.defaults.location;
    const keywords = request.keywords ?? this.defaults.keywords;
    const maxJobs = request.maxJobs ?? this.defaults.maxJobs;
    const count = request.topN ?? this.defaults.topN;

    let stage: PipelineStage = 'start';
    const advance = (next: PipelineStage, details: Record<string, unknown>): void => {
      stage = next;
      this.logger.info({ stage: next, ...details }, 'Pipeline stage reached.');
      request.onStage?.({ stage: next, details });
    };

    try {
      advance('start', { resumePath: request.resumePath, location, keywords, maxJobs, topN: count });
      if (!Number.isInteger(maxJobs) || maxJobs < 1) {
        throw invalidInputError('maxJobs must be a positive integer.', { maxJobs });
      }
      if (!Number.isInteger(count) || count < 0) {
        throw invalidInputError('topN must be a non-negative integer.', { topN: count });
      }
      throwIfAborted(signal);

      const rawResume = await this.deps.resumeExtractor.extract(request.resumePath);
      if (!rawResume || rawResume.trim().length === 0) {
        throw emptyResumeError('Failed to extract text from resume.', { resumePath: request.resumePath });
      }
      const resumeText = this.normalizer.clean(rawResume);
      if (resumeText.length === 0) {
        throw emptyResumeError('Resume contains no usable text after cleaning.', { characters: rawResume.length });
      }
      const resumeVector = await this.deps.client.embedOne(resumeText, { signal });
      advance('resume_embedded', { characters: resumeText.length, dimensions: resumeVector.length });
      throwIfAborted(signal);

      const fetched = await this.deps.jobSource.fetch(location, keywords, maxJobs, { signal });
      if (fetched.length === 0) {
        throw noJobsFoundError('No jobs found.', { location, keywords });
      }
      await this.persist('job_postings_raw.json', { format: 'json', data: fetched });

      let jobs: JobCandidate[] = fetched;
      if (hasCriteria(request.filters)) {
        jobs = this.postFilter.apply(fetched, request.filters);
        if (jobs.length === 0) {
          throw noJobsMatchFiltersError('No jobs match filter criteria.', { fetched: fetched.length });
        }
      }

      const jobTexts = jobs.map((job) =>
        this.defaults.jobText === 'composite'
          ? this.normalizer.prepareJobText(job)
          : this.normalizer.clean(job.description ?? '')
      );
      await this.persist('resume_cleaned.txt', { format: 'text', text: resumeText });

      const slots = await this.deps.batchEmbedder.embedBatch(jobTexts, { signal });
      const failed = countFailed(slots);
      if (failed === slots.length) {
        throw embeddingFailedError('Failed to generate job embeddings.', { jobs: jobs.length, failed });
      }
      if (failed > 0) {
        this.logger.warn({ jobs: jobs.length, failed }, 'Some job embeddings failed; they will rank last.');
      }

      await this.persist('resume_embedding.json', {
        format: 'json',
        data: { embedding: resumeVector, dimension: resumeVector.length }
      });
      await this.persist('job_embeddings.json', {
        format: 'json',
        data: { embeddings: slots, count: slots.length, failed, dimension: resumeVector.length }
      });
      advance('jobs_embedded', { fetched: fetched.length, jobs: jobs.length, failed });
      throwIfAborted(signal);

      const scores = similarityAll(resumeVector, slots);
      const recommendations = topN(jobs, scores, count);
      advance('ranked', { scored: scores.length, recommendations: recommendations.length });

      await this.persist('similarity_scores.json', {
        format: 'json',
        data: jobs.map((job, index) => ({
          index: index + 1,
          title: job.title,
          company: job.company,
          location: job.location,
          similarityScore: scores[index]
        }))
      });
      await this.persist('similarity_statistics.json', { format: 'json', data: similarityStatistics(scores) });
      await this.persist('top_recommendations.json', { format: 'json', data: recommendations });
      await this.persist('top_recommendations.csv', { format: 'csv', rows: recommendations.map(toCsvRow) });

      advance('done', { recommendations: recommendations.length });
      return recommendations;
    } catch (error) {
      if (error instanceof PipelineError) {
        throw error;
      }
      this.logger.error({ stage, error: describeError(error) }, 'Recommendation run failed.');
      throw new PipelineError(stage, error);
    }
  }

  private async persist(name: string, payload: ArtifactPayload): Promise<void> {
    if (!this.deps.artifacts) {
      return;
    }

    try {
      await this.deps.artifacts.write(name, payload);
    } catch (error) {
      this.logger.warn({ artifact: name, error: describeError(error) }, 'Failed to write artifact.');
    }
  }
}

export function toCsvRow(recommendation: Recommendation): Record<string, unknown> {
  return {
    rank: recommendation.rank,
    title: recommendation.title,
    company: recommendation.company,
    location: recommendation.location,
    similarity: recommendation.similarity,
    salary: recommendation.salary,
    jobType: recommendation.jobType,
    postedDate: recommendation.postedDate,
    url: recommendation.url,
    source: recommendation.source
  };
}
