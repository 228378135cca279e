/**
 * Scratch storage discipline
 *
 * Every job acquires its own scratch directory, and the directory is removed on
 * every exit path: success, failure or cancellation. Final outputs never
 * land in place half-written: they go to a sibling temp name and are renamed
 * once complete.
 */

import { mkdtemp, rename, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { randomBytes } from "node:crypto";
import type { Logger } from "./logger.js";
import { errorMessage } from "./errors.js";

export const SCRATCH_PREFIX = "leveler-";

/**
 * Run fn with a fresh scratch directory, removing it afterwards
 */
export async function withScratchDir<T>(
  logger: Logger,
  fn: (dir: string) => Promise<T>,
  prefix: string = SCRATCH_PREFIX
): Promise<T> {
  const dir = await mkdtemp(path.join(tmpdir(), prefix));
  logger.debug({ dir }, "Scratch directory created");

  try {
    return await fn(dir);
  } finally {
    try {
      await rm(dir, { recursive: true, force: true });
      logger.debug({ dir }, "Scratch directory removed");
    } catch (error) {
      // Never mask the primary error with a cleanup failure
      logger.warn({ dir, err: errorMessage(error) }, "Failed to remove scratch directory");
    }
  }
}

/**
 * Write through a temp sibling of finalPath and rename into place when
 * write resolves. The temp file is removed if write throws.
 */
export async function writeAtomically<T>(
  finalPath: string,
  write: (tempPath: string) => Promise<T>
): Promise<T> {
  const tempPath = path.join(
    path.dirname(finalPath),
    `.${path.basename(finalPath)}.${randomBytes(6).toString("hex")}.partial${path.extname(finalPath)}`
  );

  try {
    const result = await write(tempPath);
    await rename(tempPath, finalPath);
    return result;
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}
