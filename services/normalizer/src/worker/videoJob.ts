/**
 * Video job
 *
 * probing → extracting_audio → normalizing → remuxing → done
 *
 * Any stage failure is terminal and leaves no output behind. A skipped
 * normalization also fails the job: the remux would only re-encode the
 * original audio.
 */

import path from 'node:path';
import type {
  AssetJob,
  JobReport,
  NormalizationOptions,
  NormalizationOutcome,
  VideoJobStage,
} from '@leveler/contracts';
import { withScratchDir, writeAtomically } from '../lib/scratch.js';
import { throwIfCancelled } from '../lib/errors.js';
import { describeOutcome } from '../lib/format.js';
import { normalizeAudioFile } from '../audio/normalize.js';
import { validateVideoFile } from '../video/probe.js';
import { extractAudio, replaceAudio } from '../video/track.js';
import { failedReport, mayWriteOutput, skippedExisting, type JobDeps } from './context.js';

export async function processVideo(
  job: AssetJob,
  options: NormalizationOptions,
  deps: JobDeps
): Promise<JobReport> {
  const { logger } = deps;
  const name = path.basename(job.input);
  let stage: VideoJobStage = 'probing';
  const outcomes: NormalizationOutcome[] = [];

  try {
    const asset = await validateVideoFile(job.input, deps.runner);
    logger.debug({ asset }, 'Probed video');

    if (!(await mayWriteOutput(job.output, options.force, deps))) {
      logger.info({ output: job.output }, 'Skipped (file exists)');
      return { ...skippedExisting(job), stage };
    }

    return await withScratchDir(logger, async (scratch) => {
      stage = 'extracting_audio';
      logger.info({ input: job.input }, `Extracting audio from: ${name}`);
      const wavPath = path.join(scratch, `${path.parse(name).name}.wav`);
      await extractAudio(job.input, wavPath, deps);

      stage = 'normalizing';
      const outcome: NormalizationOutcome = { ...(await normalizeAudioFile(wavPath, options, deps)), name };
      outcomes.push(outcome);
      if (outcome.status !== 'success') {
        return failedReport(
          job,
          new Error('Audio normalization failed or was skipped'),
          deps,
          { outcomes, stage }
        );
      }

      throwIfCancelled(deps.signal);
      stage = 'remuxing';
      logger.info({ input: job.input }, `Replacing audio in: ${name}`);
      await writeAtomically(job.output, (tmp) => replaceAudio(job.input, wavPath, tmp, deps));

      stage = 'done';
      logger.info({ output: job.output }, `Success! Output written to: ${job.output}`);
      logger.info(`Normalization: ${describeOutcome(outcome)}`);
      return { job, status: 'completed', outcomes, stage };
    });
  } catch (error) {
    return failedReport(job, error, deps, { outcomes, stage });
  }
}
