/**
 * Codec family table
 *
 * Closed enumeration of the audio formats found in presentation media
 * folders. Each family says whether it is handled in process ("native") or
 * through the ffmpeg bridge ("bridged"), and which encoder arguments bring
 * the intermediate PCM back to it.
 *
 * Only WAV is native: there is no in-process FLAC or Vorbis codec in the
 * dependency set, so those round-trip through ffmpeg like the lossy formats.
 * FLAC is lossless, so its round trip keeps the source sample rate, channel
 * count and bit depth instead of the fixed intermediate layout.
 */

import path from 'node:path';
import type { CodecFamily, CodecHandling } from '@leveler/contracts';

export interface CodecSpec {
  family: CodecFamily;
  handling: CodecHandling;
  /** Encoder arguments for PCM → this family (bridged only) */
  encoder: readonly string[] | null;
  /** Bridge at the source layout rather than the fixed intermediate */
  keepsSourceLayout: boolean;
}

/** Lossy encodes all use one bitrate tier */
export const LOSSY_BITRATE = '192k';

export const COPY_ENCODER: readonly string[] = ['-c:a', 'copy'];

export const CODECS: Readonly<Record<CodecFamily, CodecSpec>> = {
  wav: { family: 'wav', handling: 'native', encoder: null, keepsSourceLayout: true },
  flac: { family: 'flac', handling: 'bridged', encoder: ['-c:a', 'flac'], keepsSourceLayout: true },
  ogg: { family: 'ogg', handling: 'bridged', encoder: ['-c:a', 'libvorbis', '-b:a', LOSSY_BITRATE], keepsSourceLayout: false },
  mp3: { family: 'mp3', handling: 'bridged', encoder: ['-c:a', 'libmp3lame', '-b:a', LOSSY_BITRATE], keepsSourceLayout: false },
  m4a: { family: 'm4a', handling: 'bridged', encoder: ['-c:a', 'aac', '-b:a', LOSSY_BITRATE], keepsSourceLayout: false },
  aac: { family: 'aac', handling: 'bridged', encoder: ['-c:a', 'aac', '-b:a', LOSSY_BITRATE], keepsSourceLayout: false },
  wma: { family: 'wma', handling: 'bridged', encoder: ['-c:a', 'wmav2', '-b:a', LOSSY_BITRATE], keepsSourceLayout: false },
};

export const AUDIO_EXTENSIONS: ReadonlySet<string> = new Set(
  Object.keys(CODECS).map((family) => `.${family}`)
);

function isCodecFamily(value: string): value is CodecFamily {
  return Object.prototype.hasOwnProperty.call(CODECS, value);
}

/**
 * Classify a file by its extension (case-insensitive), null if unrecognized
 */
export function codecFamilyOf(filePath: string): CodecFamily | null {
  const ext = path.extname(filePath).toLowerCase().replace(/^\./, '');
  return isCodecFamily(ext) ? ext : null;
}

export function isAudioFile(filePath: string): boolean {
  return codecFamilyOf(filePath) !== null;
}

/**
 * Encoder arguments for writing PCM into the format implied by outputPath.
 * Unlisted formats fall back to stream copy.
 */
export function encoderArgsFor(outputPath: string): readonly string[] {
  const family = codecFamilyOf(outputPath);
  if (family === null) return COPY_ENCODER;
  return CODECS[family].encoder ?? COPY_ENCODER;
}
