/**
 * track.ts: audio track extraction and replacement for video files
 *
 * The video stream is never re-encoded: replacement stream-copies it and
 * only encodes the processed audio. The output runs to the shorter of the
 * two streams so there is no trailing silence or frozen frame.
 */

import path from "node:path";
import { ValidationError } from "../lib/errors.js";
import { FfmpegCommand, run, runFfmpeg, type CommandRunner } from "../audio/ffmpeg.js";
import {
  INTERMEDIATE_CHANNELS,
  INTERMEDIATE_CODEC,
  INTERMEDIATE_SAMPLE_RATE,
} from "../audio/transcode.js";
import { LOSSY_BITRATE } from "../audio/codecs.js";
import { probeMedia } from "./probe.js";

export const REMUX_AUDIO_CODEC = "aac";
export const REMUX_AUDIO_BITRATE = LOSSY_BITRATE;

export interface TrackDeps {
  runner?: CommandRunner;
  signal?: AbortSignal;
}

/**
 * Extract the audio stream as 48 kHz stereo 16-bit PCM WAV.
 *
 * @throws ValidationError if the video has no audio stream; raised before
 *   anything is written
 */
export async function extractAudio(
  videoPath: string,
  wavPath: string,
  deps: TrackDeps = {}
): Promise<void> {
  const runner = deps.runner ?? run;
  const asset = await probeMedia(videoPath, runner);
  if (!asset.hasAudio) {
    throw new ValidationError(`Video file has no audio track: ${path.basename(videoPath)}`, videoPath);
  }

  const command = new FfmpegCommand()
    .input(videoPath)
    .noVideo()
    .audioCodec(INTERMEDIATE_CODEC)
    .sampleRate(INTERMEDIATE_SAMPLE_RATE)
    .channels(INTERMEDIATE_CHANNELS)
    .overwrite()
    .quiet()
    .output(wavPath)
    .build({ requireFormat: true });

  await runFfmpeg(command, `ffmpeg audio extraction ${path.basename(videoPath)}`, runner, deps.signal);
}

/**
 * Remux videoPath with the processed audio from wavPath into outputPath
 */
export async function replaceAudio(
  videoPath: string,
  wavPath: string,
  outputPath: string,
  deps: TrackDeps = {}
): Promise<void> {
  const command = new FfmpegCommand()
    .input(videoPath)
    .input(wavPath)
    .videoCodec("copy")
    .audioCodec(REMUX_AUDIO_CODEC)
    .audioBitrate(REMUX_AUDIO_BITRATE)
    .map("0:v:0")
    .map("1:a:0")
    .shortest()
    .overwrite()
    .quiet()
    .output(outputPath)
    .build();

  await runFfmpeg(command, `ffmpeg audio replacement ${path.basename(videoPath)}`, deps.runner ?? run, deps.signal);
}
