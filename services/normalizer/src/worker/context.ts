// Shared plumbing for job runners
import { access, mkdir } from "node:fs/promises";
import path from "node:path";
import type { AssetJob, JobReport } from "@leveler/contracts";
import type { Logger } from "../lib/logger.js";
import type { CommandRunner } from "../audio/ffmpeg.js";
import { CancelledError, errorMessage } from "../lib/errors.js";

/** Asks whether an existing output may be replaced */
export type ConfirmOverwrite = (outputPath: string) => Promise<boolean>;

export interface JobDeps {
  logger: Logger;
  runner?: CommandRunner;
  signal?: AbortSignal;
  /** Consulted when the output exists and force is off; absent means "no" */
  confirmOverwrite?: ConfirmOverwrite;
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Decide whether the job may write its output. Creates the output
 * directory when it may.
 */
export async function mayWriteOutput(
  outputPath: string,
  force: boolean,
  deps: JobDeps
): Promise<boolean> {
  if ((await exists(outputPath)) && !force) {
    const confirmed = deps.confirmOverwrite ? await deps.confirmOverwrite(outputPath) : false;
    if (!confirmed) {
      return false;
    }
  }
  await mkdir(path.dirname(path.resolve(outputPath)), { recursive: true });
  return true;
}

export function skippedExisting(job: AssetJob): JobReport {
  return {
    job,
    status: "skipped",
    outcomes: [],
    error: `Output exists, not overwritten: ${job.output}`,
  };
}

/**
 * Convert a job-level error into a failed report. Cancellation propagates.
 */
export function failedReport(
  job: AssetJob,
  error: unknown,
  deps: Pick<JobDeps, "logger" | "signal">,
  partial: Partial<JobReport> = {}
): JobReport {
  if (error instanceof CancelledError || deps.signal?.aborted) {
    throw error;
  }
  const message = errorMessage(error);
  deps.logger.error({ input: job.input, err: message }, `Failed to process ${path.basename(job.input)}: ${message}`);
  return { outcomes: [], ...partial, job, status: "failed", error: message };
}
