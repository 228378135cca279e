/**
 * Batch orchestration
 *
 * Jobs run one after another. A failed job is recorded and the batch moves
 * on; only cancellation stops it early.
 */

import type { Dirent, Stats } from 'node:fs';
import { readdir, stat } from 'node:fs/promises';
import path from 'node:path';
import type {
  AssetJob,
  AssetTally,
  BatchSummary,
  JobKind,
  JobReport,
  NormalizationOptions,
} from '@leveler/contracts';
import type { Logger } from '../lib/logger.js';
import { ValidationError, throwIfCancelled } from '../lib/errors.js';
import { CONTAINER_EXTENSION } from '../container/archive.js';
import { VIDEO_EXTENSION } from '../video/probe.js';
import { failedReport, type JobDeps } from './context.js';
import { processPresentation } from './presentationJob.js';
import { processVideo } from './videoJob.js';

export type JobProcessor = (job: AssetJob) => Promise<JobReport>;

export const INPUT_EXTENSIONS: Record<JobKind, string> = {
  presentation: CONTAINER_EXTENSION,
  video: VIDEO_EXTENSION,
};

/**
 * Route a job to its runner
 */
export function processJob(
  job: AssetJob,
  options: NormalizationOptions,
  deps: JobDeps
): Promise<JobReport> {
  switch (job.kind) {
    case 'presentation':
      return processPresentation(job, options, deps);
    case 'video':
      return processVideo(job, options, deps);
  }
}

/**
 * Files in dir whose extension matches, case-insensitively, sorted by name
 */
export async function discoverInputs(dir: string, extension: string): Promise<string[]> {
  let info: Stats;
  try {
    info = await stat(dir);
  } catch {
    throw new ValidationError(`Input directory not found: ${dir}`, dir);
  }
  if (!info.isDirectory()) {
    throw new ValidationError(`Not a directory: ${dir}`, dir);
  }

  const entries: Dirent[] = await readdir(dir, { withFileTypes: true });
  return entries
    .filter((e) => e.isFile() && path.extname(e.name).toLowerCase() === extension)
    .map((e) => e.name)
    .sort()
    .map((name) => path.join(dir, name));
}

/**
 * One job per discovered input, output named after the input
 */
export async function planBatch(kind: JobKind, inputDir: string, outputDir: string): Promise<AssetJob[]> {
  const inputs = await discoverInputs(inputDir, INPUT_EXTENSIONS[kind]);
  return inputs.map((input) => ({ kind, input, output: path.join(outputDir, path.basename(input)) }));
}

export function tallyAssets(reports: JobReport[]): AssetTally {
  const tally: AssetTally = { attempted: 0, normalized: 0, skipped: 0, failed: 0 };
  for (const report of reports) {
    for (const outcome of report.outcomes) {
      tally.attempted++;
      switch (outcome.status) {
        case 'success':
          tally.normalized++;
          break;
        case 'skipped':
          tally.skipped++;
          break;
        case 'failed':
          tally.failed++;
          break;
      }
    }
  }
  return tally;
}

export function summarize(reports: JobReport[]): BatchSummary {
  const count = (status: JobReport['status']) => reports.filter((r) => r.status === status).length;
  const failed = count('failed');
  return {
    total: reports.length,
    succeeded: count('completed'),
    skipped: count('skipped'),
    failed,
    assets: tallyAssets(reports),
    reports,
    exitCode: failed === 0 ? 0 : 1,
  };
}

export async function runBatch(
  jobs: AssetJob[],
  processor: JobProcessor,
  deps: Pick<JobDeps, 'logger' | 'signal'>
): Promise<BatchSummary> {
  const { logger } = deps;
  const reports: JobReport[] = [];

  if (jobs.length === 0) {
    logger.warn('No input files found');
  }

  for (const [index, job] of jobs.entries()) {
    throwIfCancelled(deps.signal);
    if (jobs.length > 1) {
      logger.info({ input: job.input }, `Processing file ${index + 1}/${jobs.length}: ${path.basename(job.input)}`);
    }
    let report: JobReport;
    try {
      report = await processor(job);
    } catch (error) {
      report = failedReport(job, error, deps);
    }
    reports.push(report);
  }

  const summary = summarize(reports);
  logSummary(summary, logger);
  return summary;
}

export function logSummary(summary: BatchSummary, logger: Logger): void {
  const { assets } = summary;
  logger.info(
    { succeeded: summary.succeeded, skipped: summary.skipped, failed: summary.failed, total: summary.total },
    `Jobs: ${summary.succeeded} succeeded, ${summary.skipped} skipped, ${summary.failed} failed of ${summary.total}`
  );
  logger.info(
    { assets },
    `Audio: ${assets.normalized} normalized, ${assets.skipped} skipped, ${assets.failed} failed of ${assets.attempted}`
  );
  if (summary.failed > 0 || summary.skipped > 0 || assets.skipped > 0 || assets.failed > 0) {
    logger.warn('Some files were skipped or failed');
  }
}
