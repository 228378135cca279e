/**
 * Per-asset normalization pipeline
 *
 * decode → [denoise] → measure → gain → encode, in place.
 * Native formats are decoded in process; bridged formats round-trip through
 * an intermediate PCM WAV. Every path ends in exactly one outcome, and the
 * file is only rewritten when a gain was applied.
 */

import path from 'node:path';
import type {
  AudioAsset,
  CodecFamily,
  NormalizationOptions,
  NormalizationOutcome,
} from '@leveler/contracts';
import type { Logger } from '../lib/logger.js';
import { errorMessage, errorName, throwIfCancelled } from '../lib/errors.js';
import { writeAtomically } from '../lib/scratch.js';
import { formatDb, formatLufs } from '../lib/format.js';
import { CODECS, codecFamilyOf } from './codecs.js';
import { denoisePcm } from './denoise.js';
import { levelPcm, type LevelResult } from './loudness.js';
import { readWavFile, writeWavFile, type PcmBuffer } from './pcm.js';
import {
  decodeToPcmWav,
  encodeFromPcmWav,
  INTERMEDIATE_LAYOUT,
  probeAudioLayout,
  withIntermediateWav,
  type BridgeDeps,
} from './transcode.js';

export type AssetOptions = Pick<NormalizationOptions, 'targetLufs' | 'denoise' | 'denoiseStrength'>;

export interface NormalizeDeps extends BridgeDeps {
  logger: Logger;
}

/**
 * Build the AudioAsset record for a level attempt
 */
export function describeAsset(name: string, codec: CodecFamily, pcm: PcmBuffer, level: LevelResult): AudioAsset {
  return {
    name,
    codec,
    sampleRate: pcm.sampleRate,
    channels: pcm.channels.length,
    durationSec: level.durationSec,
    loudnessLufs: level.loudnessLufs,
    gainDb: level.status === 'leveled' ? level.gainDb : null,
  };
}

/**
 * Optional denoise, then measure and level. Denoise failures fall back to
 * the original PCM.
 */
export function processPcm(
  name: string,
  pcm: PcmBuffer,
  options: AssetOptions,
  logger: Logger
): LevelResult {
  let working = pcm;

  if (options.denoise) {
    logger.debug({ file: name, strength: options.denoiseStrength }, 'Applying denoising');
    const denoised = denoisePcm(pcm, options.denoiseStrength);
    if (denoised.ok) {
      working = denoised.pcm;
      logger.debug({ file: name }, 'Denoising complete');
    } else {
      logger.warn(
        { file: name, err: denoised.error.message },
        'Denoising failed, continuing without denoising'
      );
    }
  }

  return levelPcm(working, options.targetLufs, logger);
}

function skippedOutcome(name: string, level: Extract<LevelResult, { status: 'skipped' }>): NormalizationOutcome {
  return { status: 'skipped', name, reason: level.reason, detail: level.detail };
}

function successOutcome(
  name: string,
  level: Extract<LevelResult, { status: 'leveled' }>,
  targetLufs: number
): NormalizationOutcome {
  return {
    status: 'success',
    name,
    originalLufs: level.loudnessLufs,
    targetLufs,
    gainDb: level.gainDb,
    durationSec: level.durationSec,
  };
}

async function normalizeNative(
  filePath: string,
  codec: CodecFamily,
  options: AssetOptions,
  deps: NormalizeDeps
): Promise<NormalizationOutcome> {
  const name = path.basename(filePath);
  const pcm = await readWavFile(filePath);
  deps.logger.debug(
    { file: name, sampleRate: pcm.sampleRate, channels: pcm.channels.length, bitDepth: pcm.bitDepth },
    'Loaded audio'
  );

  const level = processPcm(name, pcm, options, deps.logger);
  deps.logger.debug({ file: name, asset: describeAsset(name, codec, pcm, level) }, 'Level result');
  if (level.status === 'skipped') {
    return skippedOutcome(name, level);
  }

  throwIfCancelled(deps.signal);
  await writeAtomically(filePath, (tmp) => writeWavFile(tmp, level.pcm));
  return successOutcome(name, level, options.targetLufs);
}

async function normalizeBridged(
  filePath: string,
  codec: CodecFamily,
  options: AssetOptions,
  deps: NormalizeDeps
): Promise<NormalizationOutcome> {
  const name = path.basename(filePath);
  const layout = CODECS[codec].keepsSourceLayout ? await probeAudioLayout(filePath, deps) : undefined;

  return withIntermediateWav(deps.logger, async (wavPath) => {
    deps.logger.debug({ file: name, layout: layout ?? INTERMEDIATE_LAYOUT }, 'Converting to PCM for processing');
    await decodeToPcmWav(filePath, wavPath, deps, layout);

    const pcm = await readWavFile(wavPath);
    const level = processPcm(name, pcm, options, deps.logger);
    deps.logger.debug({ file: name, asset: describeAsset(name, codec, pcm, level) }, 'Level result');
    if (level.status === 'skipped') {
      return skippedOutcome(name, level);
    }

    await writeWavFile(wavPath, level.pcm);
    throwIfCancelled(deps.signal);

    deps.logger.debug({ file: name, codec }, 'Converting normalized audio back');
    await writeAtomically(filePath, (tmp) => encodeFromPcmWav(wavPath, tmp, deps, layout));
    return successOutcome(name, level, options.targetLufs);
  });
}

/**
 * Normalize one audio file in place and report what happened.
 * Never throws for per-asset problems; cancellation is rethrown.
 */
export async function normalizeAudioFile(
  filePath: string,
  options: AssetOptions,
  deps: NormalizeDeps
): Promise<NormalizationOutcome> {
  const name = path.basename(filePath);
  deps.logger.info({ file: name }, `Processing: ${name}`);

  const codec = codecFamilyOf(filePath);
  if (codec === null) {
    const ext = path.extname(filePath).toLowerCase() || '(none)';
    deps.logger.warn({ file: name }, `Unsupported audio format '${ext}', skipping`);
    return { status: 'skipped', name, reason: 'unsupported_format', detail: `unsupported format ${ext}` };
  }

  try {
    throwIfCancelled(deps.signal);
    const spec = CODECS[codec];
    let outcome: NormalizationOutcome;
    switch (spec.handling) {
      case 'native':
        outcome = await normalizeNative(filePath, codec, options, deps);
        break;
      case 'bridged':
        outcome = await normalizeBridged(filePath, codec, options, deps);
        break;
    }

    if (outcome.status === 'success') {
      deps.logger.info(
        { file: name, originalLufs: outcome.originalLufs, gainDb: outcome.gainDb },
        `Normalized ${name}: ${formatLufs(outcome.originalLufs)} → ${formatLufs(outcome.targetLufs)} (${formatDb(outcome.gainDb)})`
      );
    } else if (outcome.status === 'skipped') {
      deps.logger.warn({ file: name, reason: outcome.reason }, `Skipping ${name}: ${outcome.detail}`);
    }
    return outcome;
  } catch (error) {
    if (deps.signal?.aborted) throw error;
    deps.logger.error({ file: name, err: errorMessage(error) }, `Failed to normalize ${name}`);
    return { status: 'failed', name, reason: errorMessage(error), errorName: errorName(error) };
  }
}

/**
 * Normalize files one after another, one outcome each
 */
export async function normalizeAudioFiles(
  filePaths: string[],
  options: AssetOptions,
  deps: NormalizeDeps
): Promise<NormalizationOutcome[]> {
  const outcomes: NormalizationOutcome[] = [];
  for (const filePath of filePaths) {
    outcomes.push(await normalizeAudioFile(filePath, options, deps));
  }
  return outcomes;
}
