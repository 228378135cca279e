/**
 * Unit tests for spectral-gating denoise and the FFT it runs on
 */

import { describe, it, expect } from 'vitest';
import { fft, hannWindow, OverlapAdd, stftFrameCount, stftFrames } from '../../src/audio/fft.js';
import { denoisePcm, triangularKernel, N_FFT, HOP_LENGTH } from '../../src/audio/denoise.js';
import { DenoiseError } from '../../src/lib/errors.js';
import type { PcmBuffer } from '../../src/audio/pcm.js';
import { noise, rms } from '../helpers.js';

describe('fft', () => {
  it('should transform an impulse to a flat spectrum', () => {
    const re = Float64Array.from([1, 0, 0, 0, 0, 0, 0, 0]);
    const im = new Float64Array(8);
    fft(re, im);
    for (let k = 0; k < 8; k++) {
      expect(re[k]).toBeCloseTo(1, 12);
      expect(im[k]).toBeCloseTo(0, 12);
    }
  });

  it('should invert with 1/n scaling', () => {
    const source = noise(16, 1, 7);
    const re = Float64Array.from(source);
    const im = new Float64Array(16);
    fft(re, im);
    fft(re, im, true);
    for (let i = 0; i < 16; i++) {
      expect(re[i]).toBeCloseTo(source[i], 10);
    }
  });

  const roundTrip = (signal: Float64Array): Float64Array => {
    const window = hannWindow(N_FFT);
    const ola = new OverlapAdd(N_FFT, HOP_LENGTH, window, signal.length);
    for (const frame of stftFrames(signal, N_FFT, HOP_LENGTH, window)) {
      ola.push(frame.re, frame.im);
    }
    return ola.finish();
  };

  it.each([5000, 100, 1])('should reconstruct %i samples through the streaming stft', (length) => {
    const signal = noise(length, 0.5, 3);
    const out = roundTrip(signal);

    expect(out).toHaveLength(length);
    let maxError = 0;
    for (let i = 0; i < signal.length; i++) {
      maxError = Math.max(maxError, Math.abs(out[i] - signal[i]));
    }
    expect(maxError).toBeLessThan(1e-9);
  });

  it('should yield one frame per hop plus one', () => {
    expect(stftFrameCount(5000, HOP_LENGTH)).toBe(20);
    expect(Array.from(stftFrames(noise(5000, 0.5), N_FFT, HOP_LENGTH, hannWindow(N_FFT)))).toHaveLength(20);
  });

  it('should reject a hop that does not divide the FFT length', () => {
    expect(() => new OverlapAdd(1024, 300, hannWindow(1024), 10)).toThrow(RangeError);
  });
});

describe('triangularKernel', () => {
  it('should peak at the centre', () => {
    expect(Array.from(triangularKernel(2))).toEqual([1 / 3, 2 / 3, 1, 2 / 3, 1 / 3]);
  });
});

describe('denoisePcm', () => {
  const noisy = (channels: number): PcmBuffer => ({
    channels: Array.from({ length: channels }, (_, c) => noise(48000, 0.1, c + 1)),
    sampleRate: 48000,
    bitDepth: '16',
  });

  it('should keep channel count, order and length', () => {
    const input = noisy(2);
    const result = denoisePcm(input, 0.5);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.pcm.channels).toHaveLength(2);
    expect(result.pcm.channels[0]).toHaveLength(48000);
    expect(result.pcm.channels[1]).toHaveLength(48000);
    expect(result.pcm.sampleRate).toBe(48000);
    expect(result.pcm.bitDepth).toBe('16');
  });

  it('should return an exact copy at strength 0', () => {
    const input = noisy(1);
    const result = denoisePcm(input, 0);

    if (!result.ok) throw result.error;
    expect(result.pcm.channels[0]).toEqual(input.channels[0]);
    expect(result.pcm.channels[0]).not.toBe(input.channels[0]);
  });

  it('should attenuate stationary noise at full strength', () => {
    const input = noisy(1);
    const result = denoisePcm(input, 1);

    if (!result.ok) throw result.error;
    expect(rms(result.pcm.channels[0])).toBeLessThan(rms(input.channels[0]) * 0.25);
  });

  it('should attenuate less at lower strength', () => {
    const input = noisy(1);
    const half = denoisePcm(input, 0.5);
    const full = denoisePcm(input, 1);

    if (!half.ok || !full.ok) throw new Error('denoise failed');
    expect(rms(half.pcm.channels[0])).toBeGreaterThan(rms(full.pcm.channels[0]));
  });

  it.each([1.5, -0.1, Number.NaN])('should reject strength %s', (strength) => {
    const result = denoisePcm(noisy(1), strength);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(DenoiseError);
    expect(result.error.message).toBe(`strength must be between 0.0 and 1.0, got ${strength}`);
  });

  it('should report non-finite input as a failure', () => {
    const input = noisy(1);
    input.channels[0][100] = Number.NaN;

    const result = denoisePcm(input, 0.5);
    expect(result).toMatchObject({ ok: false });
    if (result.ok) return;
    expect(result.error.message).toBe('signal contains non-finite samples');
  });

  it(
    'should denoise minutes of audio without holding the spectrogram',
    () => {
      const seconds = 180;
      const input: PcmBuffer = { channels: [noise(16000 * seconds, 0.1, 9)], sampleRate: 16000, bitDepth: '16' };
      const before = process.memoryUsage().rss;

      const result = denoisePcm(input, 0.5);

      const grownMb = (process.memoryUsage().rss - before) / 2 ** 20;
      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.pcm.channels[0]).toHaveLength(16000 * seconds);
      // the output channel alone is ~22 MB
      expect(grownMb).toBeLessThan(150);
    },
    60_000
  );
});
