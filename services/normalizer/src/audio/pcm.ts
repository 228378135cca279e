/**
 * In-process PCM codec for WAV
 *
 * Decodes WAV files into planar Float64 channels scaled to full scale = 1.0,
 * and encodes them back at the bit depth they were read with.
 */

import { readFile, writeFile } from 'node:fs/promises';
import { createRequire } from 'node:module';
import { z } from 'zod';

// wavefile's main entry is a CommonJS bundle with no named ESM exports, and
// bundlers pick its untranspiled "module" entry instead. require() loads the
// same build everywhere.
const require = createRequire(import.meta.url);
const { WaveFile }: typeof import('wavefile') = require('wavefile');

export type PcmBitDepth = '8' | '16' | '24' | '32' | '32f' | '64';

export interface PcmBuffer {
  /** Planar channels, all the same length */
  channels: Float64Array[];
  sampleRate: number;
  bitDepth: PcmBitDepth;
}

const pcmBitDepthSchema = z.enum(['8', '16', '24', '32', '32f', '64']);

const fmtChunkSchema = z.object({
  numChannels: z.number().int().positive(),
  sampleRate: z.number().int().positive(),
});

/**
 * Full-scale magnitude for integer depths, null for float depths
 */
function integerScale(bitDepth: PcmBitDepth): number | null {
  switch (bitDepth) {
    case '8': return 128;
    case '16': return 32768;
    case '24': return 8388608;
    case '32': return 2147483648;
    case '32f':
    case '64':
      return null;
  }
}

export function frameCount(pcm: PcmBuffer): number {
  return pcm.channels[0]?.length ?? 0;
}

export function durationSec(pcm: PcmBuffer): number {
  return frameCount(pcm) / pcm.sampleRate;
}

/**
 * Deep copy, so callers can modify the result without touching the source
 */
export function clonePcm(pcm: PcmBuffer): PcmBuffer {
  return {
    channels: pcm.channels.map((channel) => Float64Array.from(channel)),
    sampleRate: pcm.sampleRate,
    bitDepth: pcm.bitDepth,
  };
}

/**
 * Decode a WAV byte buffer
 */
export function decodeWav(bytes: Uint8Array): PcmBuffer {
  const wave = new WaveFile(bytes);
  const fmt = fmtChunkSchema.parse(wave.fmt);

  const depth = pcmBitDepthSchema.safeParse(wave.bitDepth);
  if (!depth.success) {
    throw new Error(`Unsupported WAV encoding (bit depth code "${wave.bitDepth}")`);
  }
  const bitDepth = depth.data;

  const raw = wave.getSamples(false, Float64Array);
  const planar = Array.isArray(raw) ? raw : [raw];
  if (planar.length !== fmt.numChannels) {
    throw new Error(`WAV declares ${fmt.numChannels} channel(s) but holds ${planar.length}`);
  }

  const scale = integerScale(bitDepth);
  const channels = planar.map((source) => {
    const channel = Float64Array.from(source);
    if (scale === null) return channel;
    // 8-bit WAV is unsigned
    const offset = bitDepth === '8' ? 128 : 0;
    for (let i = 0; i < channel.length; i++) {
      channel[i] = (channel[i] - offset) / scale;
    }
    return channel;
  });

  return { channels, sampleRate: fmt.sampleRate, bitDepth };
}

/**
 * Encode planar PCM to WAV bytes at pcm.bitDepth.
 *
 * Integer depths cannot hold values beyond full scale, so quantization
 * saturates at the integer range. Float depths keep overs as they are.
 */
export function encodeWav(pcm: PcmBuffer): Uint8Array {
  const scale = integerScale(pcm.bitDepth);
  const offset = pcm.bitDepth === '8' ? 128 : 0;

  const channels = pcm.channels.map((source) => {
    if (scale === null) return source;
    const out = new Float64Array(source.length);
    const min = -scale;
    const max = scale - 1;
    for (let i = 0; i < source.length; i++) {
      const quantized = Math.round(source[i] * scale);
      out[i] = Math.min(max, Math.max(min, quantized)) + offset;
    }
    return out;
  });

  const wave = new WaveFile();
  wave.fromScratch(
    channels.length,
    pcm.sampleRate,
    pcm.bitDepth,
    channels.length === 1 ? channels[0] : channels
  );
  return wave.toBuffer();
}

export async function readWavFile(filePath: string): Promise<PcmBuffer> {
  return decodeWav(await readFile(filePath));
}

export async function writeWavFile(filePath: string, pcm: PcmBuffer): Promise<void> {
  await writeFile(filePath, encodeWav(pcm));
}
