/**
 * Transcode bridge
 *
 * Moves bridged formats to and from an intermediate PCM WAV through ffmpeg.
 * The default intermediate layout is fixed: 48 kHz, stereo, signed 16-bit.
 * Lossless families are bridged at the layout ffprobe reports for the
 * source, and encoded back at that layout.
 * A non-zero exit fails the asset; nothing is retried.
 */

import path from 'node:path';
import { z } from 'zod';
import type { Logger } from '../lib/logger.js';
import { ffprobeBinary } from '../lib/config.js';
import { withScratchDir } from '../lib/scratch.js';
import { FfmpegCommand, requireOk, run, runFfmpeg, type CommandRunner } from './ffmpeg.js';
import { encoderArgsFor } from './codecs.js';

export const INTERMEDIATE_SAMPLE_RATE = 48000;
export const INTERMEDIATE_CHANNELS = 2;
export const INTERMEDIATE_CODEC = 'pcm_s16le';

export type IntegerDepth = 16 | 24 | 32;

export interface AudioLayout {
  sampleRate: number;
  channels: number;
  bitDepth: IntegerDepth;
}

export const INTERMEDIATE_LAYOUT: Readonly<AudioLayout> = {
  sampleRate: INTERMEDIATE_SAMPLE_RATE,
  channels: INTERMEDIATE_CHANNELS,
  bitDepth: 16,
};

export interface BridgeDeps {
  runner?: CommandRunner;
  signal?: AbortSignal;
}

const audioStreamSchema = z.object({
  sample_rate: z.coerce.number().int().positive(),
  channels: z.number().int().positive(),
  bits_per_raw_sample: z.union([z.string(), z.number()]).optional(),
  sample_fmt: z.string().optional(),
});

const layoutProbeSchema = z.object({
  streams: z.array(audioStreamSchema).min(1),
});

/** Smallest integer PCM depth that holds the stream's samples */
function depthOf(stream: z.infer<typeof audioStreamSchema>): IntegerDepth {
  let bits = Number(stream.bits_per_raw_sample);
  if (!Number.isFinite(bits) || bits <= 0) {
    // ffprobe reports 0 or N/A when the codec leaves it unset
    bits = stream.sample_fmt?.startsWith('s16') || stream.sample_fmt?.startsWith('u8') ? 16 : 32;
  }
  if (bits <= 16) return 16;
  if (bits <= 24) return 24;
  return 32;
}

/**
 * Sample rate, channel count and bit depth of the first audio stream
 */
export async function probeAudioLayout(inputPath: string, deps: BridgeDeps = {}): Promise<AudioLayout> {
  const runner = deps.runner ?? run;
  const result = await runner(
    ffprobeBinary(),
    [
      '-v',
      'error',
      '-select_streams',
      'a:0',
      '-show_entries',
      'stream=sample_rate,channels,bits_per_raw_sample,sample_fmt',
      '-of',
      'json',
      inputPath,
    ],
    { timeoutMs: 30_000, signal: deps.signal }
  );
  requireOk(result, `ffprobe ${path.basename(inputPath)}`);

  let json: unknown;
  try {
    json = JSON.parse(result.stdout);
  } catch {
    throw new Error(`ffprobe returned unreadable output for ${path.basename(inputPath)}`);
  }
  const parsed = layoutProbeSchema.safeParse(json);
  if (!parsed.success) {
    throw new Error(`No audio stream found in: ${path.basename(inputPath)}`);
  }

  const [stream] = parsed.data.streams;
  return { sampleRate: stream.sample_rate, channels: stream.channels, bitDepth: depthOf(stream) };
}

/**
 * Forward conversion: any ffmpeg-readable audio → PCM WAV at `layout`
 */
export async function decodeToPcmWav(
  inputPath: string,
  outputPath: string,
  deps: BridgeDeps = {},
  layout: Readonly<AudioLayout> = INTERMEDIATE_LAYOUT
): Promise<void> {
  const command = new FfmpegCommand()
    .input(inputPath)
    .noVideo()
    .audioCodec(`pcm_s${layout.bitDepth}le`)
    .sampleRate(layout.sampleRate)
    .channels(layout.channels)
    .overwrite()
    .quiet()
    .output(outputPath)
    .build({ requireFormat: true });

  await runFfmpeg(command, `ffmpeg decode ${path.basename(inputPath)}`, deps.runner ?? run, deps.signal);
}

/**
 * Backward conversion: PCM WAV → the codec implied by outputPath's extension.
 * With a layout, the output is pinned to its rate, channels and depth.
 */
export async function encodeFromPcmWav(
  inputWav: string,
  outputPath: string,
  deps: BridgeDeps = {},
  layout?: Readonly<AudioLayout>
): Promise<void> {
  const command = new FfmpegCommand()
    .input(inputWav)
    .noVideo()
    .encoderArgs(encoderArgsFor(outputPath))
    .overwrite()
    .quiet()
    .output(outputPath);

  if (layout !== undefined) {
    command
      .encoderArgs(['-sample_fmt', layout.bitDepth === 16 ? 's16' : 's32'])
      .sampleRate(layout.sampleRate)
      .channels(layout.channels);
    if (layout.bitDepth === 24) {
      command.encoderArgs(['-bits_per_raw_sample', '24']);
    }
  }

  await runFfmpeg(
    command.build({ requireFormat: layout !== undefined }),
    `ffmpeg encode ${path.basename(outputPath)}`,
    deps.runner ?? run,
    deps.signal
  );
}

/**
 * Hand fn a path for an intermediate WAV. The file and its directory are
 * removed however fn exits.
 */
export async function withIntermediateWav<T>(
  logger: Logger,
  fn: (wavPath: string) => Promise<T>
): Promise<T> {
  return withScratchDir(logger, (dir) => fn(path.join(dir, 'intermediate.wav')), 'leveler-pcm-');
}
