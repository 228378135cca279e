// Unit tests for configuration, scratch storage, formatting and logging
import { access, readdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { describe, it, expect, vi } from 'vitest';
import {
  ffmpegBinary,
  ffprobeBinary,
  normalizationOptionsSchema,
  parseOptions,
  readEnv,
} from '../../src/lib/config.js';
import { SCRATCH_PREFIX, withScratchDir, writeAtomically } from '../../src/lib/scratch.js';
import { describeOutcome, formatDb, formatLufs } from '../../src/lib/format.js';
import { createLogger, silentLogger } from '../../src/lib/logger.js';
import { CancelledError, errorMessage, throwIfCancelled } from '../../src/lib/errors.js';
import { makeTempDir } from '../helpers.js';

describe('options', () => {
  it('should fill defaults', () => {
    expect(parseOptions({})).toEqual({
      targetLufs: -16,
      denoise: false,
      denoiseStrength: 0.5,
      force: false,
      verbose: false,
    });
  });

  it('should accept the range bounds', () => {
    expect(parseOptions({ targetLufs: -70, denoiseStrength: 0 }).targetLufs).toBe(-70);
    expect(parseOptions({ targetLufs: 0, denoiseStrength: 1 }).denoiseStrength).toBe(1);
  });

  it('should reject values outside the ranges', () => {
    expect(normalizationOptionsSchema.safeParse({ targetLufs: -71 }).success).toBe(false);
    expect(normalizationOptionsSchema.safeParse({ targetLufs: 0.5 }).success).toBe(false);
    expect(normalizationOptionsSchema.safeParse({ denoiseStrength: 1.01 }).success).toBe(false);
  });
});

describe('environment', () => {
  it('should fall back to binaries on PATH', () => {
    const env = readEnv({});
    expect(ffmpegBinary(env)).toBe('ffmpeg');
    expect(ffprobeBinary(env)).toBe('ffprobe');
  });

  it('should derive ffprobe from a configured ffmpeg path', () => {
    const env = readEnv({ FFMPEG_PATH: '/opt/ffmpeg/bin/ffmpeg' });
    expect(ffmpegBinary(env)).toBe('/opt/ffmpeg/bin/ffmpeg');
    expect(ffprobeBinary(env)).toBe('/opt/ffmpeg/bin/ffprobe');
  });

  it('should prefer an explicit ffprobe path', () => {
    expect(ffprobeBinary(readEnv({ FFMPEG_PATH: '/a/ffmpeg', FFPROBE_PATH: '/b/probe' }))).toBe('/b/probe');
  });

  it('should treat empty values as unset and reject unknown log levels', () => {
    expect(readEnv({ FFMPEG_PATH: '' })).toEqual({});
    expect(() => readEnv({ LOG_LEVEL: 'chatty' })).toThrow();
  });
});

describe('scratch storage', () => {
  it('should remove the scratch directory after success', async () => {
    let seen = '';
    const result = await withScratchDir(silentLogger(), async (dir) => {
      seen = dir;
      await writeFile(path.join(dir, 'x'), 'x');
      return 42;
    });

    expect(result).toBe(42);
    expect(path.basename(seen).startsWith(SCRATCH_PREFIX)).toBe(true);
    await expect(access(seen)).rejects.toThrow();
  });

  it('should remove the scratch directory after failure and keep the error', async () => {
    let seen = '';
    await expect(
      withScratchDir(silentLogger(), async (dir) => {
        seen = dir;
        throw new Error('step failed');
      })
    ).rejects.toThrow('step failed');
    await expect(access(seen)).rejects.toThrow();
  });

  it('should rename into place only when the write completes', async () => {
    const { dir, cleanup } = await makeTempDir();
    try {
      const target = path.join(dir, 'out.wav');
      await writeAtomically(target, (tmp) => writeFile(tmp, 'done'));
      expect(await readdir(dir)).toEqual(['out.wav']);

      await expect(
        writeAtomically(target, async (tmp) => {
          await writeFile(tmp, 'half');
          throw new Error('interrupted');
        })
      ).rejects.toThrow('interrupted');
      expect(await readdir(dir)).toEqual(['out.wav']);
    } finally {
      await cleanup();
    }
  });

  it('should keep the extension on the temp path', async () => {
    const { dir, cleanup } = await makeTempDir();
    try {
      let temp = '';
      await writeAtomically(path.join(dir, 'talk.mp4'), async (tmp) => {
        temp = tmp;
        await writeFile(tmp, '');
      });
      expect(path.extname(temp)).toBe('.mp4');
      expect(path.basename(temp).startsWith('.talk.mp4.')).toBe(true);
    } finally {
      await cleanup();
    }
  });
});

describe('formatting', () => {
  it('should format loudness and gain to one decimal', () => {
    expect(formatLufs(-23)).toBe('-23.0 LUFS');
    expect(formatDb(7)).toBe('+7.0 dB');
    expect(formatDb(-3.25)).toBe('-3.3 dB');
    expect(formatDb(0)).toBe('0.0 dB');
  });

  it('should describe each outcome on one line', () => {
    expect(
      describeOutcome({
        status: 'success',
        name: 'narration1.wav',
        originalLufs: -23,
        targetLufs: -16,
        gainDb: 7,
        durationSec: 4,
      })
    ).toBe('narration1.wav: -23.0 LUFS → -16.0 LUFS (+7.0 dB)');
    expect(
      describeOutcome({ status: 'skipped', name: 'b.wav', reason: 'unmeasurable', detail: 'silent' })
    ).toBe('b.wav: skipped (silent)');
    expect(
      describeOutcome({ status: 'failed', name: 'c.mp3', reason: 'ffmpeg died', errorName: 'TranscodeError' })
    ).toBe('c.mp3: failed (ffmpeg died)');
  });
});

describe('logging', () => {
  it('should write JSON lines with name, level label and message', () => {
    const lines: string[] = [];
    const logger = createLogger('leveler-test', { destination: { write: (line: string) => lines.push(line) } });

    logger.info({ file: 'a.wav' }, 'Processing');

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({
      level: 'info',
      name: 'leveler-test',
      file: 'a.wav',
      msg: 'Processing',
    });
  });

  it('should emit debug lines only when verbose', () => {
    const write = vi.fn();
    createLogger('quiet', { destination: { write } }).debug('hidden');
    createLogger('loud', { verbose: true, destination: { write } }).debug('shown');

    expect(write).toHaveBeenCalledTimes(1);
  });
});

describe('errors', () => {
  it('should throw CancelledError only once aborted', () => {
    const controller = new AbortController();
    expect(() => throwIfCancelled(controller.signal)).not.toThrow();
    controller.abort();
    expect(() => throwIfCancelled(controller.signal)).toThrow(CancelledError);
    expect(() => throwIfCancelled(undefined)).not.toThrow();
  });

  it('should stringify non-Error values', () => {
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(new Error('wrapped'))).toBe('wrapped');
  });
});
