/**
 * Stationary spectral-gating noise reduction
 *
 * The noise profile is estimated from the signal itself: per frequency bin,
 * the mean plus 1.5 standard deviations of the dB magnitude over time. Bins
 * above the threshold are signal, the rest are attenuated in proportion to
 * strength. The gate is smoothed across ±500 Hz and ±50 ms before use.
 *
 * Denoising is best-effort: failures come back as a result value and the
 * caller carries on with the original audio.
 */

import { DenoiseError, errorMessage } from '../lib/errors.js';
import { hannWindow, OverlapAdd, stftFrameCount, stftFrames } from './fft.js';
import { clonePcm, frameCount, type PcmBuffer } from './pcm.js';

export const N_FFT = 1024;
export const HOP_LENGTH = N_FFT / 4;
export const N_STD_THRESHOLD = 1.5;
export const FREQ_SMOOTH_HZ = 500;
export const TIME_SMOOTH_MS = 50;
const TOP_DB = 80;

export type DenoiseResult =
  | { ok: true; pcm: PcmBuffer }
  | { ok: false; error: DenoiseError };

/**
 * Triangular kernel of length 2n + 1, peak 1 at the centre
 */
export function triangularKernel(n: number): Float64Array {
  const k = new Float64Array(2 * n + 1);
  for (let i = 0; i <= n; i++) {
    const v = (i + 1) / (n + 1);
    k[i] = v;
    k[2 * n - i] = v;
  }
  return k;
}

function normalize(kernel: Float64Array): Float64Array {
  let sum = 0;
  for (const v of kernel) sum += v;
  return kernel.map((v) => v / sum);
}

/** dB magnitude of one frame, floored at TOP_DB below the frame's peak */
function frameDb(re: Float64Array, im: Float64Array, out: Float64Array): Float64Array {
  let max = -Infinity;
  for (let b = 0; b < out.length; b++) {
    const v = 20 * Math.log10(Math.hypot(re[b], im[b]) + Number.EPSILON);
    out[b] = v;
    if (v > max) max = v;
  }
  const floor = max - TOP_DB;
  for (let b = 0; b < out.length; b++) {
    if (out[b] < floor) out[b] = floor;
  }
  return out;
}

/**
 * Per-bin threshold: mean + N_STD_THRESHOLD · std of the dB magnitude over
 * every frame, accumulated without keeping the frames (Welford).
 */
function noiseThreshold(signal: Float64Array, window: Float64Array, bins: number): Float64Array {
  const mean = new Float64Array(bins);
  const m2 = new Float64Array(bins);
  const db = new Float64Array(bins);
  let count = 0;

  for (const frame of stftFrames(signal, N_FFT, HOP_LENGTH, window)) {
    frameDb(frame.re, frame.im, db);
    count++;
    for (let b = 0; b < bins; b++) {
      const delta = db[b] - mean[b];
      mean[b] += delta / count;
      m2[b] += delta * (db[b] - mean[b]);
    }
  }

  const threshold = new Float64Array(bins);
  for (let b = 0; b < bins; b++) {
    threshold[b] = mean[b] + N_STD_THRESHOLD * Math.sqrt(m2[b] / count);
  }
  return threshold;
}

/**
 * Denoise one channel. strength must already be validated.
 *
 * Two passes over the STFT: the first estimates the threshold, the second
 * gates each frame once the frames within the time-smoothing radius on
 * either side are known. Only that many frames are held at once.
 */
export function denoiseChannel(signal: Float64Array, sampleRate: number, strength: number): Float64Array {
  if (strength === 0 || signal.length === 0) {
    return Float64Array.from(signal);
  }
  for (const v of signal) {
    if (!Number.isFinite(v)) {
      throw new DenoiseError('signal contains non-finite samples');
    }
  }

  const window = hannWindow(N_FFT);
  const bins = (N_FFT >> 1) + 1;
  const frames = stftFrameCount(signal.length, HOP_LENGTH);
  const threshold = noiseThreshold(signal, window, bins);

  const nGradFreq = Math.floor(FREQ_SMOOTH_HZ / (sampleRate / (N_FFT / 2)));
  const nGradTime = Math.floor(TIME_SMOOTH_MS / ((HOP_LENGTH / sampleRate) * 1000));
  const freqKernel = normalize(triangularKernel(nGradFreq));
  const timeKernel = normalize(triangularKernel(nGradTime));

  // Ring buffers over the last 2 · nGradTime + 1 frames
  const span = timeKernel.length;
  const masks = Array.from({ length: span }, () => new Float32Array(bins));
  const spectraRe = Array.from({ length: span }, () => new Float64Array(bins));
  const spectraIm = Array.from({ length: span }, () => new Float64Array(bins));

  const db = new Float64Array(bins);
  const binary = new Float32Array(bins);
  const gate = new Float64Array(bins);
  const ola = new OverlapAdd(N_FFT, HOP_LENGTH, window, signal.length);

  const emit = (g: number): void => {
    gate.fill(0);
    for (let k = -nGradTime; k <= nGradTime; k++) {
      const idx = g + k;
      if (idx < 0 || idx >= frames) continue;
      const w = timeKernel[k + nGradTime];
      const row = masks[idx % span];
      for (let b = 0; b < bins; b++) gate[b] += row[b] * w;
    }
    const re = spectraRe[g % span];
    const im = spectraIm[g % span];
    for (let b = 0; b < bins; b++) {
      const gain = gate[b] * strength + (1 - strength);
      re[b] *= gain;
      im[b] *= gain;
    }
    ola.push(re, im);
  };

  for (const frame of stftFrames(signal, N_FFT, HOP_LENGTH, window)) {
    const f = frame.index;
    const slot = f % span;
    spectraRe[slot].set(frame.re);
    spectraIm[slot].set(frame.im);

    frameDb(frame.re, frame.im, db);
    for (let b = 0; b < bins; b++) binary[b] = db[b] > threshold[b] ? 1 : 0;

    const row = masks[slot];
    for (let b = 0; b < bins; b++) {
      let acc = 0;
      for (let k = -nGradFreq; k <= nGradFreq; k++) {
        const idx = b + k;
        if (idx >= 0 && idx < bins) acc += binary[idx] * freqKernel[k + nGradFreq];
      }
      row[b] = acc;
    }

    if (f >= nGradTime) emit(f - nGradTime);
  }
  for (let g = Math.max(0, frames - nGradTime); g < frames; g++) emit(g);

  return ola.finish();
}

/**
 * Denoise every channel independently. The output has the same channel
 * count, order and length as the input.
 */
export function denoisePcm(pcm: PcmBuffer, strength: number): DenoiseResult {
  if (!(strength >= 0 && strength <= 1)) {
    return { ok: false, error: new DenoiseError(`strength must be between 0.0 and 1.0, got ${strength}`) };
  }
  if (strength === 0) {
    return { ok: true, pcm: clonePcm(pcm) };
  }

  try {
    const channels = pcm.channels.map((channel) => denoiseChannel(channel, pcm.sampleRate, strength));
    const out: PcmBuffer = { channels, sampleRate: pcm.sampleRate, bitDepth: pcm.bitDepth };
    if (frameCount(out) !== frameCount(pcm)) {
      return { ok: false, error: new DenoiseError('denoised length does not match input') };
    }
    return { ok: true, pcm: out };
  } catch (error) {
    const denoiseError = error instanceof DenoiseError ? error : new DenoiseError(errorMessage(error));
    return { ok: false, error: denoiseError };
  }
}
