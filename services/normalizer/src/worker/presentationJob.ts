/**
 * Presentation job
 *
 * validate → scratch dir → extract → normalize each audio part → repack.
 * A presentation without audio is copied byte for byte. Per-asset failures
 * are recorded and do not fail the job; validation, extraction and repack
 * failures do.
 */

import path from 'node:path';
import type { AssetJob, JobReport, NormalizationOptions, NormalizationOutcome } from '@leveler/contracts';
import { withScratchDir } from '../lib/scratch.js';
import { throwIfCancelled } from '../lib/errors.js';
import { describeOutcome } from '../lib/format.js';
import { normalizeAudioFiles } from '../audio/normalize.js';
import {
  copyContainerVerbatim,
  extractContainer,
  repackContainer,
  validateContainer,
} from '../container/archive.js';
import { failedReport, mayWriteOutput, skippedExisting, type JobDeps } from './context.js';

export async function processPresentation(
  job: AssetJob,
  options: NormalizationOptions,
  deps: JobDeps
): Promise<JobReport> {
  const { logger } = deps;
  let outcomes: NormalizationOutcome[] = [];

  try {
    await validateContainer(job.input);

    if (!(await mayWriteOutput(job.output, options.force, deps))) {
      logger.info({ output: job.output }, 'Skipped (file exists)');
      return skippedExisting(job);
    }

    return await withScratchDir(logger, async (scratch) => {
      const { treePath, manifest, audioFiles } = await extractContainer(job.input, scratch, logger);

      if (audioFiles.length === 0) {
        logger.warn({ input: job.input }, 'No audio files found, copying the original');
        await copyContainerVerbatim(job.input, job.output);
        logger.info({ output: job.output }, `Output written to: ${job.output}`);
        return { job, status: 'completed', outcomes, copiedVerbatim: true };
      }

      outcomes = await normalizeAudioFiles(audioFiles, options, deps);

      const normalized = outcomes.filter((o) => o.status === 'success').length;
      if (normalized > 0) {
        logger.info(`Normalized ${normalized} of ${audioFiles.length} audio file(s)`);
      } else {
        logger.warn('No audio files were normalized');
      }
      for (const outcome of outcomes) {
        logger.info(`  ${describeOutcome(outcome)}`);
      }
      if (normalized < audioFiles.length) {
        logger.warn(`Skipped or failed ${audioFiles.length - normalized} file(s)`);
      }

      throwIfCancelled(deps.signal);
      await repackContainer(treePath, job.output, logger, manifest);
      logger.info({ output: job.output }, `Success! Output written to: ${path.resolve(job.output)}`);

      return { job, status: 'completed', outcomes };
    });
  } catch (error) {
    return failedReport(job, error, deps, { outcomes });
  }
}
