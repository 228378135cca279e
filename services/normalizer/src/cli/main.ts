/**
 * CLI flow: parse → check tools → plan jobs → run batch → exit code.
 *
 * Exit codes: 0 all jobs completed or skipped, 1 any job failed or the
 * arguments were invalid, 130 interrupted.
 */

import { createInterface } from 'node:readline/promises';
import path from 'node:path';
import type { AssetJob } from '@leveler/contracts';
import { createLogger, type Logger } from '../lib/logger.js';
import { CancelledError, errorMessage } from '../lib/errors.js';
import { formatLufs } from '../lib/format.js';
import { checkFfmpeg, checkFfprobe, run, type CommandRunner } from '../audio/ffmpeg.js';
import { planBatch, processJob, runBatch } from '../worker/batch.js';
import type { ConfirmOverwrite } from '../worker/context.js';
import { USAGE, parseCliArgs, type CliCommand, type ParsedCli } from './args.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INTERRUPTED = 130;

export interface MainDeps {
  runner?: CommandRunner;
  logger?: Logger;
  signal?: AbortSignal;
  confirmOverwrite?: ConfirmOverwrite;
  /** Where usage and argument errors go */
  print?: (text: string) => void;
}

/**
 * y/N prompt on the terminal. Anything but y/yes declines, and so does a
 * non-interactive stdin.
 */
export async function promptOverwrite(outputPath: string): Promise<boolean> {
  if (!process.stdin.isTTY) {
    return false;
  }
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(`File exists: ${outputPath}\nOverwrite? [y/N] `);
    return ['y', 'yes'].includes(answer.trim().toLowerCase());
  } finally {
    rl.close();
  }
}

async function planJobs(command: CliCommand): Promise<AssetJob[]> {
  const { kind, target } = command;
  if (target.mode === 'single') {
    return [{ kind, input: target.input, output: target.output }];
  }
  return planBatch(kind, target.inputDir, target.outputDir);
}

function logBanner(command: CliCommand, logger: Logger): void {
  const { options, target } = command;
  logger.info(`Target loudness: ${formatLufs(options.targetLufs)}`);
  if (options.denoise) {
    logger.info(`Denoising enabled (strength: ${options.denoiseStrength})`);
  }
  if (target.mode === 'batch') {
    logger.info(`Batch mode: ${path.resolve(target.inputDir)} → ${path.resolve(target.outputDir)}`);
  }
}

export async function main(argv: string[], deps: MainDeps = {}): Promise<number> {
  const print = deps.print ?? ((text: string) => console.error(text));

  let parsed: ParsedCli;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    print(`Error: ${errorMessage(error)}\n\n${USAGE}`);
    return EXIT_FAILURE;
  }
  if (parsed.help) {
    print(USAGE);
    return EXIT_OK;
  }

  const command = parsed;
  const logger = deps.logger ?? createLogger('leveler', { verbose: command.options.verbose });
  const runner = deps.runner ?? run;

  for (const warning of command.warnings) {
    logger.warn(warning);
  }
  logBanner(command, logger);

  if (!(await checkFfmpeg(runner))) {
    logger.error('ffmpeg not found. Install ffmpeg or set FFMPEG_PATH.');
    return EXIT_FAILURE;
  }
  if (command.kind === 'video' && !(await checkFfprobe(runner))) {
    logger.error('ffprobe not found. Install ffmpeg or set FFPROBE_PATH.');
    return EXIT_FAILURE;
  }

  const jobDeps = {
    logger,
    runner,
    signal: deps.signal,
    confirmOverwrite: deps.confirmOverwrite ?? promptOverwrite,
  };

  try {
    const jobs = await planJobs(command);
    const summary = await runBatch(jobs, (job) => processJob(job, command.options, jobDeps), jobDeps);
    return summary.exitCode;
  } catch (error) {
    if (error instanceof CancelledError || deps.signal?.aborted) {
      logger.warn('Interrupted');
      return EXIT_INTERRUPTED;
    }
    logger.error({ err: errorMessage(error) }, errorMessage(error));
    return EXIT_FAILURE;
  }
}
