/**
 * probe.ts: stream metadata inspection via ffprobe
 *
 * Tells the video job whether a file carries the audio and video streams it
 * needs, and which codecs they use. Called before any temp file exists, so a
 * rejected video leaves nothing behind.
 */

import type { Stats } from "node:fs";
import { stat } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { VideoAsset } from "@leveler/contracts";
import { ffprobeBinary } from "../lib/config.js";
import { ValidationError, errorMessage } from "../lib/errors.js";
import { requireOk, run, type CommandRunner } from "../audio/ffmpeg.js";

export const VIDEO_EXTENSION = ".mp4";

const streamSchema = z.object({
  codec_type: z.string().optional(),
  codec_name: z.string().optional(),
  duration: z.union([z.string(), z.number()]).optional(),
});

const probeOutputSchema = z.object({
  streams: z.array(streamSchema).default([]),
});

export type ProbeOutput = z.infer<typeof probeOutputSchema>;

/**
 * Fold ffprobe's JSON into a VideoAsset
 */
export function parseProbeOutput(videoPath: string, stdout: string): VideoAsset {
  let json: unknown;
  try {
    json = JSON.parse(stdout);
  } catch {
    throw new ValidationError(`ffprobe returned unreadable output for ${path.basename(videoPath)}`, videoPath);
  }
  const data = probeOutputSchema.parse(json);

  const asset: VideoAsset = {
    path: videoPath,
    hasAudio: false,
    hasVideo: false,
    videoCodec: null,
    audioCodec: null,
    durationSec: 0,
  };

  for (const stream of data.streams) {
    const duration = stream.duration === undefined ? NaN : Number(stream.duration);
    if (stream.codec_type === "video") {
      asset.hasVideo = true;
      asset.videoCodec = stream.codec_name ?? null;
    } else if (stream.codec_type === "audio") {
      asset.hasAudio = true;
      asset.audioCodec = stream.codec_name ?? null;
    } else {
      continue;
    }
    if (Number.isFinite(duration)) {
      asset.durationSec = Math.max(asset.durationSec, duration);
    }
  }

  return asset;
}

export async function probeMedia(
  videoPath: string,
  runner: CommandRunner = run
): Promise<VideoAsset> {
  const result = await runner(ffprobeBinary(), [
    "-v",
    "error",
    "-show_entries",
    "stream=codec_type,codec_name,duration",
    "-of",
    "json",
    videoPath,
  ], { timeoutMs: 30_000 });
  requireOk(result, `ffprobe ${path.basename(videoPath)}`);

  return parseProbeOutput(videoPath, result.stdout);
}

/**
 * Check the file exists, is an .mp4, and carries both a video and an audio
 * stream. Returns the probe so callers need not run it again.
 */
export async function validateVideoFile(
  videoPath: string,
  runner: CommandRunner = run
): Promise<VideoAsset> {
  let info: Stats;
  try {
    info = await stat(videoPath);
  } catch {
    throw new ValidationError(`File not found: ${videoPath}`, videoPath);
  }
  if (!info.isFile()) {
    throw new ValidationError(`Not a file: ${videoPath}`, videoPath);
  }

  const ext = path.extname(videoPath).toLowerCase();
  if (ext !== VIDEO_EXTENSION) {
    throw new ValidationError(
      `Unsupported format: ${ext || "(none)"} (only ${VIDEO_EXTENSION} supported)`,
      videoPath
    );
  }

  let asset: VideoAsset;
  try {
    asset = await probeMedia(videoPath, runner);
  } catch (error) {
    throw new ValidationError(`Failed to probe video file: ${errorMessage(error)}`, videoPath);
  }

  if (!asset.hasVideo) {
    throw new ValidationError(`No video stream found in: ${path.basename(videoPath)}`, videoPath);
  }
  if (!asset.hasAudio) {
    throw new ValidationError(`No audio stream found in: ${path.basename(videoPath)}`, videoPath);
  }

  return asset;
}
