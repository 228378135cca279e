/**
 * Audio engine
 *
 * In-process WAV decode/encode, BS.1770 integrated loudness, spectral-gating
 * denoise, and an ffmpeg bridge for every other codec family.
 */

export { run, requireOk, runFfmpeg, checkFfmpeg, checkFfprobe, FfmpegCommand } from './ffmpeg.js';
export type { CommandRunner, RunOptions, SpawnResult, BuiltCommand } from './ffmpeg.js';
export { CODECS, AUDIO_EXTENSIONS, codecFamilyOf, isAudioFile, encoderArgsFor, type CodecSpec } from './codecs.js';
export { decodeWav, encodeWav, readWavFile, writeWavFile, type PcmBuffer, type PcmBitDepth } from './pcm.js';
export {
  measureIntegratedLoudness,
  computeGainDb,
  applyGain,
  levelPcm,
  type LevelResult,
} from './loudness.js';
export { denoisePcm, type DenoiseResult } from './denoise.js';
export {
  decodeToPcmWav,
  encodeFromPcmWav,
  probeAudioLayout,
  INTERMEDIATE_LAYOUT,
  type AudioLayout,
  type BridgeDeps,
} from './transcode.js';
export {
  normalizeAudioFile,
  normalizeAudioFiles,
  type AssetOptions,
  type NormalizeDeps,
} from './normalize.js';
