#!/usr/bin/env tsx
import { existsSync } from 'node:fs';
import path from 'node:path';
import process from 'node:process';

import { describeError, getLogger } from '@jobmatch/common';

import { FileArtifactStore } from './artifact-store';
import { parseCliArgs, USAGE } from './cli-args';
import { createDefaultPipeline } from './index';
import { toCsvRow } from './pipeline';
import type { Recommendation } from './types';

const RULE = '='.repeat(70);

function printRecommendations(recommendations: readonly Recommendation[]): void {
  console.log(RULE);
  console.log(`TOP ${recommendations.length} JOB RECOMMENDATIONS`);
  console.log(RULE);
  console.log();

  for (const recommendation of recommendations) {
    console.log(`#${recommendation.rank} - ${recommendation.title ?? 'Untitled'}`);
    console.log(`    Company: ${recommendation.company ?? 'N/A'}`);
    console.log(`    Location: ${recommendation.location ?? 'N/A'}`);
    console.log(`    Similarity Score: ${recommendation.similarity.toFixed(3)}`);
    if (recommendation.salary) {
      console.log(`    Salary: ${recommendation.salary}`);
    }
    if (recommendation.jobType) {
      console.log(`    Job Type: ${recommendation.jobType}`);
    }
    if (recommendation.url) {
      console.log(`    URL: ${recommendation.url}`);
    }
    console.log();
  }
}

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    return;
  }

  if (!existsSync(args.resumePath)) {
    throw new Error(`Resume file '${args.resumePath}' not found`);
  }

  const logger = getLogger({ module: 'cli' });
  const pipeline = createDefaultPipeline({ saveArtifacts: args.saveArtifacts, logger });
  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  const recommendations = await pipeline.run({
    resumePath: args.resumePath,
    location: args.location,
    keywords: args.keywords,
    maxJobs: args.maxJobs,
    topN: args.topN,
    filters: args.filters,
    signal: controller.signal,
    onStage: ({ stage, details }) => console.error(`[${stage}] ${JSON.stringify(details)}`)
  });

  printRecommendations(recommendations);

  if (args.output) {
    const target = path.resolve(args.output);
    const store = new FileArtifactStore({ resultsDir: path.dirname(target), logger });
    await store.write(target, { format: 'csv', rows: recommendations.map(toCsvRow) });
    console.log(`Recommendations saved to: ${target}`);
  }
}

main().catch((error: unknown) => {
  console.error(`Error: ${describeError(error)}`);
  process.exit(1);
});
