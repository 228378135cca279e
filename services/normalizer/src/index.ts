// Library entry: the engine, the job runners and the batch orchestrator.
// The command line lives in ./cli/index.ts.
export * from './audio/index.js';
export * from './worker/index.js';
export {
  validateContainer,
  extractContainer,
  repackContainer,
  copyContainerVerbatim,
  type ExtractedContainer,
} from './container/archive.js';
export { probeMedia, validateVideoFile } from './video/probe.js';
export { extractAudio, replaceAudio } from './video/track.js';
export { parseOptions, normalizationOptionsSchema, DEFAULT_TARGET_LUFS, DEFAULT_DENOISE_STRENGTH } from './lib/config.js';
export { createLogger, silentLogger, type Logger } from './lib/logger.js';
export * from './lib/errors.js';
export type * from '@leveler/contracts';
