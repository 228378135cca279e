/**
 * Integrated loudness measurement (ITU-R BS.1770-4) and gain application
 *
 * Measures gated integrated loudness of decoded PCM in process:
 * - K-weighting: high shelf (+4 dB @ 1500 Hz) then high pass (38 Hz)
 * - 400 ms blocks, 75% overlap
 * - Absolute gate at -70 LUFS, relative gate 10 LU below the gated mean
 */

import type { Logger } from '../lib/logger.js';
import { clonePcm, durationSec, frameCount, type PcmBuffer } from './pcm.js';

/** Shorter audio cannot fill a single gating block */
export const MIN_MEASURABLE_SECONDS = 0.4;

const BLOCK_SECONDS = 0.4;
const BLOCK_OVERLAP = 0.75;
const ABSOLUTE_GATE_LUFS = -70;
const RELATIVE_GATE_LU = -10;
const LOUDNESS_OFFSET = -0.691;

/** Channel weights: L, R, C, Ls, Rs */
const CHANNEL_WEIGHTS = [1.0, 1.0, 1.0, 1.41, 1.41];

/** Gains beyond this are logged, never refused */
export const LARGE_GAIN_DB = 20;

export interface Biquad {
  b0: number;
  b1: number;
  b2: number;
  a1: number;
  a2: number;
}

/**
 * High-shelf biquad (RBJ cookbook), normalized so a0 = 1
 */
export function highShelf(sampleRate: number, gainDb: number, q: number, fc: number): Biquad {
  const A = Math.pow(10, gainDb / 40);
  const w0 = (2 * Math.PI * fc) / sampleRate;
  const alpha = Math.sin(w0) / (2 * q);
  const cos = Math.cos(w0);
  const sqrtA2alpha = 2 * Math.sqrt(A) * alpha;

  const a0 = (A + 1) - (A - 1) * cos + sqrtA2alpha;
  return {
    b0: (A * ((A + 1) + (A - 1) * cos + sqrtA2alpha)) / a0,
    b1: (-2 * A * ((A - 1) + (A + 1) * cos)) / a0,
    b2: (A * ((A + 1) + (A - 1) * cos - sqrtA2alpha)) / a0,
    a1: (2 * ((A - 1) - (A + 1) * cos)) / a0,
    a2: ((A + 1) - (A - 1) * cos - sqrtA2alpha) / a0,
  };
}

/**
 * Second-order high-pass biquad (RBJ cookbook), normalized so a0 = 1
 */
export function highPass(sampleRate: number, q: number, fc: number): Biquad {
  const w0 = (2 * Math.PI * fc) / sampleRate;
  const alpha = Math.sin(w0) / (2 * q);
  const cos = Math.cos(w0);

  const a0 = 1 + alpha;
  return {
    b0: (1 + cos) / 2 / a0,
    b1: -(1 + cos) / a0,
    b2: (1 + cos) / 2 / a0,
    a1: (-2 * cos) / a0,
    a2: (1 - alpha) / a0,
  };
}

/**
 * K-weighting stages for a sample rate
 */
export function kWeightingFilters(sampleRate: number): [Biquad, Biquad] {
  return [
    highShelf(sampleRate, 4.0, 1 / Math.sqrt(2), 1500.0),
    highPass(sampleRate, 0.5, 38.0),
  ];
}

/**
 * Direct form I filtering, zero initial state
 */
export function applyBiquad(input: Float64Array, f: Biquad): Float64Array {
  const out = new Float64Array(input.length);
  let x1 = 0, x2 = 0, y1 = 0, y2 = 0;
  for (let i = 0; i < input.length; i++) {
    const x0 = input[i];
    const y0 = f.b0 * x0 + f.b1 * x1 + f.b2 * x2 - f.a1 * y1 - f.a2 * y2;
    out[i] = y0;
    x2 = x1; x1 = x0;
    y2 = y1; y1 = y0;
  }
  return out;
}

function blockLoudness(weightedSum: number): number {
  return LOUDNESS_OFFSET + 10 * Math.log10(weightedSum);
}

/**
 * Integrated loudness in LUFS.
 *
 * Returns -Infinity when no block passes the absolute gate (digital
 * silence). Non-finite samples propagate to NaN.
 *
 * @throws RangeError if the audio is shorter than one gating block
 */
export function measureIntegratedLoudness(pcm: PcmBuffer): number {
  const numChannels = pcm.channels.length;
  if (numChannels === 0) {
    throw new RangeError('PCM buffer has no channels');
  }
  if (numChannels > CHANNEL_WEIGHTS.length) {
    throw new RangeError(`Loudness measurement supports up to ${CHANNEL_WEIGHTS.length} channels, got ${numChannels}`);
  }

  const rate = pcm.sampleRate;
  const totalSec = durationSec(pcm);
  if (totalSec < BLOCK_SECONDS) {
    throw new RangeError(`Audio must be at least ${BLOCK_SECONDS}s long to measure loudness`);
  }

  const [shelf, hp] = kWeightingFilters(rate);
  const filtered = pcm.channels.map((channel) => applyBiquad(applyBiquad(channel, shelf), hp));

  const step = 1 - BLOCK_OVERLAP;
  const numBlocks = Math.round((totalSec - BLOCK_SECONDS) / (BLOCK_SECONDS * step)) + 1;
  const blockLength = BLOCK_SECONDS * rate;
  const length = frameCount(pcm);

  // z[channel][block] = mean square of the filtered block
  const z: Float64Array[] = filtered.map(() => new Float64Array(numBlocks));
  for (let j = 0; j < numBlocks; j++) {
    const lower = Math.floor(BLOCK_SECONDS * (j * step) * rate);
    const upper = Math.min(length, Math.floor(BLOCK_SECONDS * (j * step + 1) * rate));
    for (let c = 0; c < numChannels; c++) {
      const samples = filtered[c];
      let sum = 0;
      for (let i = lower; i < upper; i++) {
        sum += samples[i] * samples[i];
      }
      z[c][j] = sum / blockLength;
    }
  }

  const blockLufs = new Float64Array(numBlocks);
  for (let j = 0; j < numBlocks; j++) {
    let weighted = 0;
    for (let c = 0; c < numChannels; c++) {
      weighted += CHANNEL_WEIGHTS[c] * z[c][j];
    }
    blockLufs[j] = blockLoudness(weighted);
  }

  const gatedMean = (gate: (l: number) => boolean): number => {
    const passing: number[] = [];
    for (let j = 0; j < numBlocks; j++) {
      if (gate(blockLufs[j])) passing.push(j);
    }
    let weighted = 0;
    for (let c = 0; c < numChannels; c++) {
      let sum = 0;
      for (const j of passing) sum += z[c][j];
      // An empty gate contributes zero energy, which yields -Infinity
      const mean = passing.length > 0 ? sum / passing.length : 0;
      weighted += CHANNEL_WEIGHTS[c] * mean;
    }
    return weighted;
  };

  const absoluteGated = gatedMean((l) => l >= ABSOLUTE_GATE_LUFS);
  const relativeGate = blockLoudness(absoluteGated) + RELATIVE_GATE_LU;
  const gated = gatedMean((l) => l > relativeGate && l > ABSOLUTE_GATE_LUFS);

  return blockLoudness(gated);
}

export function computeGainDb(targetLufs: number, measuredLufs: number): number {
  return targetLufs - measuredLufs;
}

/**
 * Scale every sample by the linear equivalent of gainDb. No clamping:
 * values beyond full scale are left for the encoder.
 */
export function applyGain(pcm: PcmBuffer, gainDb: number): PcmBuffer {
  const factor = Math.pow(10, gainDb / 20);
  const out = clonePcm(pcm);
  for (const channel of out.channels) {
    for (let i = 0; i < channel.length; i++) {
      channel[i] *= factor;
    }
  }
  return out;
}

export type LevelResult =
  | {
      status: 'leveled';
      pcm: PcmBuffer;
      loudnessLufs: number;
      gainDb: number;
      durationSec: number;
    }
  | {
      status: 'skipped';
      reason: 'too_short' | 'unmeasurable';
      detail: string;
      loudnessLufs: number | null;
      durationSec: number;
    };

/**
 * Measure and bring pcm to targetLufs
 */
export function levelPcm(pcm: PcmBuffer, targetLufs: number, logger?: Logger): LevelResult {
  const duration = durationSec(pcm);

  if (duration < MIN_MEASURABLE_SECONDS) {
    return {
      status: 'skipped',
      reason: 'too_short',
      detail: `audio too short (${duration.toFixed(2)}s) for loudness measurement`,
      loudnessLufs: null,
      durationSec: duration,
    };
  }

  const loudness = measureIntegratedLoudness(pcm);
  logger?.debug({ loudnessLufs: loudness }, 'Measured integrated loudness');

  if (!Number.isFinite(loudness)) {
    return {
      status: 'skipped',
      reason: 'unmeasurable',
      detail: 'cannot measure loudness (silent or invalid audio)',
      loudnessLufs: Number.isNaN(loudness) ? null : loudness,
      durationSec: duration,
    };
  }

  const gainDb = computeGainDb(targetLufs, loudness);
  if (Math.abs(gainDb) > LARGE_GAIN_DB) {
    logger?.info({ gainDb, loudnessLufs: loudness, targetLufs }, 'Applying large gain change');
  }

  return {
    status: 'leveled',
    pcm: applyGain(pcm, gainDb),
    loudnessLufs: loudness,
    gainDb,
    durationSec: duration,
  };
}
