export interface JobCandidate {
  id?: string;
  title?: string;
  company?: string;
  location?: string;
  description?: string;
  salary?: string;
  url?: string;
  source?: string;
  postedDate?: string;
  jobType?: string;
  /** Source fields without a named slot above. */
  attributes?: Record<string, unknown>;
}

export interface Recommendation extends JobCandidate {
  /** Cosine similarity rounded to 4 decimals. */
  similarity: number;
  /** 1-based position in the ranked output. */
  rank: number;
}

export type ExperienceLevel = 'Entry Level' | 'Junior' | 'Mid-Level' | 'Senior' | 'Lead' | 'Principal' | 'Executive';

export type JobType = 'Full-time' | 'Part-time' | 'Contract' | 'Temporary' | 'Internship' | 'Permanent';

export interface FilterCriteria {
  salaryMin?: number;
  experienceLevels?: ExperienceLevel[];
  jobTypes?: string[];
  requiredSkills?: string[];
}

export interface RecommendationFilter {
  minSimilarity?: number;
  location?: string;
  company?: string;
}

export interface SimilarityStatistics {
  count: number;
  mean: number;
  median: number;
  std: number;
  min: number;
  max: number;
  q25: number;
  q75: number;
}

export type JobTextMode = 'description' | 'composite';

export type PipelineStage = 'start' | 'resume_embedded' | 'jobs_embedded' | 'ranked' | 'done';

export interface StageEvent {
  stage: PipelineStage;
  details: Record<string, unknown>;
}

export interface RecommendationRequest {
  resumePath: string;
  location?: string;
  keywords?: string;
  maxJobs?: number;
  topN?: number;
  filters?: FilterCriteria;
  signal?: AbortSignal;
  onStage?: (event: StageEvent) => void;
}

export interface FetchJobsOptions {
  signal?: AbortSignal;
  onProgress?: (fetched: number, max: number) => void;
}

export interface JobSource {
  fetch(location: string, keywords: string, maxCount: number, options?: FetchJobsOptions): Promise<JobCandidate[]>;
}

export interface ResumeExtractor {
  extract(path: string): Promise<string | null>;
}

export interface PostFilter {
  apply(candidates: readonly JobCandidate[], criteria: FilterCriteria): JobCandidate[];
}

export type ArtifactPayload =
  | { format: 'json'; data: unknown }
  | { format: 'text'; text: string }
  | { format: 'csv'; rows: ReadonlyArray<Record<string, unknown>> };

export interface ArtifactSink {
  write(name: string, payload: ArtifactPayload): Promise<string>;
}
