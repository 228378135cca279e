/**
 * Unit tests for the per-asset pipeline
 *
 * Native WAV files are processed for real; bridged formats run against a
 * scripted runner that stands in for ffmpeg and moves WAV bytes around.
 */

import { copyFile, readdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { normalizeAudioFile, normalizeAudioFiles } from '../../src/audio/normalize.js';
import { measureIntegratedLoudness } from '../../src/audio/loudness.js';
import { decodeWav, readWavFile } from '../../src/audio/pcm.js';
import { CancelledError } from '../../src/lib/errors.js';
import { silentLogger } from '../../src/lib/logger.js';
import {
  inputOf,
  isProbe,
  makeTempDir,
  ok,
  outputOf,
  scriptedRunner,
  silence,
  sine,
  wavBytes,
} from '../helpers.js';

const options = { targetLufs: -16, denoise: false, denoiseStrength: 0.5 };
const logger = silentLogger();

/**
 * ffmpeg stand-in: "decoding" copies the source bytes (which are really WAV)
 * to the intermediate, "encoding" copies the intermediate to the output.
 */
const passthroughRunner = () =>
  scriptedRunner(async (_cmd, args) => {
    await copyFile(inputOf(args), outputOf(args));
    return ok();
  });

describe('normalizeAudioFile', () => {
  let dir: string;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    ({ dir, cleanup } = await makeTempDir());
  });

  afterEach(async () => {
    await cleanup();
  });

  it('should level a WAV file in place', async () => {
    const file = path.join(dir, 'narration1.wav');
    await writeFile(file, wavBytes(sine({ amplitude: 0.1, channels: 2 })));

    const outcome = await normalizeAudioFile(file, options, { logger });

    expect(outcome.status).toBe('success');
    if (outcome.status !== 'success') return;
    expect(outcome.name).toBe('narration1.wav');
    expect(outcome.targetLufs).toBe(-16);
    expect(outcome.gainDb).toBeCloseTo(-16 - outcome.originalLufs, 12);
    expect(outcome.durationSec).toBe(1);

    const written = await readWavFile(file);
    expect(written.channels).toHaveLength(2);
    expect(written.sampleRate).toBe(48000);
    expect(written.bitDepth).toBe('16');
    expect(measureIntegratedLoudness(written)).toBeCloseTo(-16, 1);
  });

  it('should leave no temp files beside the output', async () => {
    const file = path.join(dir, 'a.wav');
    await writeFile(file, wavBytes(sine()));

    await normalizeAudioFile(file, options, { logger });

    expect(await readdir(dir)).toEqual(['a.wav']);
  });

  it('should leave a too-short file untouched', async () => {
    const file = path.join(dir, 'blip.wav');
    const original = wavBytes(sine({ seconds: 0.2 }));
    await writeFile(file, original);

    const outcome = await normalizeAudioFile(file, options, { logger });

    expect(outcome).toEqual({
      status: 'skipped',
      name: 'blip.wav',
      reason: 'too_short',
      detail: 'audio too short (0.20s) for loudness measurement',
    });
    expect(new Uint8Array(await readFile(file))).toEqual(original);
  });

  it('should skip silent audio as unmeasurable', async () => {
    const file = path.join(dir, 'quiet.wav');
    await writeFile(file, wavBytes(silence(1)));

    const outcome = await normalizeAudioFile(file, options, { logger });

    expect(outcome).toMatchObject({ status: 'skipped', reason: 'unmeasurable' });
  });

  it('should skip unknown extensions without reading them', async () => {
    const file = path.join(dir, 'voice.opus');
    await writeFile(file, 'opus bytes');

    const outcome = await normalizeAudioFile(file, options, { logger });

    expect(outcome).toEqual({
      status: 'skipped',
      name: 'voice.opus',
      reason: 'unsupported_format',
      detail: 'unsupported format .opus',
    });
  });

  it('should report a corrupt WAV as failed', async () => {
    const file = path.join(dir, 'broken.wav');
    await writeFile(file, 'RIFF but not really');

    const outcome = await normalizeAudioFile(file, options, { logger });

    expect(outcome.status).toBe('failed');
  });

  it('should denoise before leveling when enabled', async () => {
    const file = path.join(dir, 'hiss.wav');
    await writeFile(file, wavBytes(sine({ amplitude: 0.2 })));

    const outcome = await normalizeAudioFile(file, { ...options, denoise: true, denoiseStrength: 0.3 }, { logger });

    expect(outcome.status).toBe('success');
  });

  it('should round-trip bridged formats through the transcoder', async () => {
    const file = path.join(dir, 'narration2.mp3');
    await writeFile(file, wavBytes(sine({ amplitude: 0.05, channels: 2 })));
    const runner = passthroughRunner();

    const outcome = await normalizeAudioFile(file, options, { logger, runner });

    expect(outcome.status).toBe('success');
    expect(runner).toHaveBeenCalledTimes(2);

    const [decodeArgs, encodeArgs] = runner.mock.calls.map((call) => call[1]);
    expect(inputOf(decodeArgs)).toBe(file);
    expect(decodeArgs).toEqual(expect.arrayContaining(['pcm_s16le', '48000']));
    expect(encodeArgs).toEqual(expect.arrayContaining(['libmp3lame', '192k']));
    // Encoder writes a temp sibling that is then renamed over the source
    expect(path.dirname(outputOf(encodeArgs))).toBe(dir);
    expect(outputOf(encodeArgs)).not.toBe(file);

    const written = decodeWav(await readFile(file));
    expect(measureIntegratedLoudness(written)).toBeCloseTo(-16, 1);
    expect(await readdir(dir)).toEqual(['narration2.mp3']);
  });

  it('should bring a FLAC back at its own rate, channel count and depth', async () => {
    const file = path.join(dir, 'narration5.flac');
    await writeFile(file, wavBytes(sine({ amplitude: 0.05, sampleRate: 44100, channels: 1, bitDepth: '24' })));
    const runner = scriptedRunner(async (_cmd, args) => {
      if (isProbe(args)) {
        return ok(JSON.stringify({ streams: [{ sample_rate: '44100', channels: 1, bits_per_raw_sample: '24', sample_fmt: 's32' }] }));
      }
      await copyFile(inputOf(args), outputOf(args));
      return ok();
    });

    const outcome = await normalizeAudioFile(file, options, { logger, runner });

    expect(outcome.status).toBe('success');
    expect(runner).toHaveBeenCalledTimes(3);
    const [, decodeArgs, encodeArgs] = runner.mock.calls.map((call) => call[1]);
    expect(decodeArgs).toEqual(expect.arrayContaining(['pcm_s24le', '44100']));
    expect(decodeArgs).not.toContain('48000');
    expect(encodeArgs).toEqual(expect.arrayContaining(['flac', '-sample_fmt', 's32', '-ar', '44100', '-ac', '1']));

    const written = decodeWav(await readFile(file));
    expect(written.sampleRate).toBe(44100);
    expect(written.bitDepth).toBe('24');
    expect(written.channels).toHaveLength(1);
    expect(measureIntegratedLoudness(written)).toBeCloseTo(-16, 1);
  });

  it('should fail a bridged asset when the transcoder exits non-zero', async () => {
    const file = path.join(dir, 'narration3.m4a');
    await writeFile(file, 'source bytes');
    const runner = scriptedRunner(() => ({ code: 1, stdout: '', stderr: 'moov atom not found' }));

    const outcome = await normalizeAudioFile(file, options, { logger, runner });

    expect(outcome).toMatchObject({ status: 'failed', name: 'narration3.m4a', errorName: 'TranscodeError' });
    expect(await readFile(file, 'utf8')).toBe('source bytes');
  });

  it('should keep the source when the encode step fails', async () => {
    const file = path.join(dir, 'narration4.ogg');
    const original = wavBytes(sine({ amplitude: 0.05 }));
    await writeFile(file, original);
    let call = 0;
    const runner = scriptedRunner(async (_cmd, args) => {
      call++;
      if (call === 1) {
        await copyFile(inputOf(args), outputOf(args));
        return ok();
      }
      await writeFile(outputOf(args), 'half an ogg');
      return { code: 1, stdout: '', stderr: 'encoder died' };
    });

    const outcome = await normalizeAudioFile(file, options, { logger, runner });

    expect(outcome.status).toBe('failed');
    expect(new Uint8Array(await readFile(file))).toEqual(original);
    expect(await readdir(dir)).toEqual(['narration4.ogg']);
  });

  it('should rethrow when the run was cancelled', async () => {
    const file = path.join(dir, 'a.wav');
    await writeFile(file, wavBytes(sine()));
    const controller = new AbortController();
    controller.abort();

    await expect(normalizeAudioFile(file, options, { logger, signal: controller.signal })).rejects.toThrow(
      CancelledError
    );
  });

  it('should produce one outcome per file, in order', async () => {
    const files = ['b.wav', 'a.opus', 'c.wav'].map((name) => path.join(dir, name));
    await writeFile(files[0], wavBytes(sine()));
    await writeFile(files[1], 'x');
    await writeFile(files[2], wavBytes(silence(1)));

    const outcomes = await normalizeAudioFiles(files, options, { logger });

    expect(outcomes.map((o) => [o.name, o.status])).toEqual([
      ['b.wav', 'success'],
      ['a.opus', 'skipped'],
      ['c.wav', 'skipped'],
    ]);
  });
});
