/**
 * Shared fixtures for unit tests: synthesized PCM, temp directories,
 * presentation archives and a scripted command runner.
 */

import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import JSZip from 'jszip';
import { vi } from 'vitest';
import type { CommandRunner, SpawnResult } from '../src/audio/ffmpeg.js';
import { encodeWav, type PcmBitDepth, type PcmBuffer } from '../src/audio/pcm.js';

export interface SineOptions {
  freq?: number;
  amplitude?: number;
  seconds?: number;
  sampleRate?: number;
  channels?: number;
  bitDepth?: PcmBitDepth;
}

export function sine(opts: SineOptions = {}): PcmBuffer {
  const { freq = 1000, amplitude = 0.1, seconds = 1, sampleRate = 48000, channels = 1, bitDepth = '16' } = opts;
  const length = Math.round(seconds * sampleRate);
  const channel = new Float64Array(length);
  for (let i = 0; i < length; i++) {
    channel[i] = amplitude * Math.sin((2 * Math.PI * freq * i) / sampleRate);
  }
  return {
    channels: Array.from({ length: channels }, () => Float64Array.from(channel)),
    sampleRate,
    bitDepth,
  };
}

export function silence(seconds: number, sampleRate = 48000, channels = 1): PcmBuffer {
  const length = Math.round(seconds * sampleRate);
  return {
    channels: Array.from({ length: channels }, () => new Float64Array(length)),
    sampleRate,
    bitDepth: '16',
  };
}

/** Deterministic uniform noise in [-amplitude, amplitude] */
export function noise(length: number, amplitude: number, seed = 1): Float64Array {
  let state = seed >>> 0;
  const out = new Float64Array(length);
  for (let i = 0; i < length; i++) {
    // mulberry32
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    const r = ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    out[i] = (r * 2 - 1) * amplitude;
  }
  return out;
}

export function rms(signal: Float64Array): number {
  let sum = 0;
  for (const v of signal) sum += v * v;
  return Math.sqrt(sum / signal.length);
}

export function wavBytes(pcm: PcmBuffer): Uint8Array {
  return encodeWav(pcm);
}

/**
 * Temp directory removed by the returned cleanup
 */
export async function makeTempDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await mkdtemp(path.join(tmpdir(), 'leveler-test-'));
  return { dir, cleanup: () => rm(dir, { recursive: true, force: true }) };
}

/**
 * Write a presentation archive holding the given entries, in insertion order
 */
export async function writeContainer(
  filePath: string,
  entries: Record<string, Uint8Array | string>
): Promise<void> {
  const zip = new JSZip();
  for (const [name, data] of Object.entries(entries)) {
    zip.file(name, data);
  }
  const bytes = await zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
  await writeFile(filePath, bytes);
}

export async function loadContainer(filePath: string): Promise<JSZip> {
  return JSZip.loadAsync(await readFile(filePath));
}

export function ok(stdout = ''): SpawnResult {
  return { code: 0, stdout, stderr: '' };
}

/**
 * vi.fn runner whose behaviour is scripted per call
 */
export function scriptedRunner(
  handler: (cmd: string, args: string[]) => Promise<SpawnResult> | SpawnResult
) {
  return vi.fn<CommandRunner>(async (cmd, args) => handler(cmd, args));
}

/** Last argument of an ffmpeg invocation is its output path */
export function outputOf(args: string[]): string {
  return args[args.length - 1];
}

/** Path following the n-th -i flag */
export function inputOf(args: string[], n = 0): string {
  let seen = 0;
  for (let i = 0; i < args.length - 1; i++) {
    if (args[i] === '-i') {
      if (seen === n) return args[i + 1];
      seen++;
    }
  }
  throw new Error(`no input #${n} in ${args.join(' ')}`);
}

export function isProbe(args: string[]): boolean {
  return args.includes('-show_entries');
}

export function probeJson(streams: Array<{ codec_type: string; codec_name: string; duration?: string }>): string {
  return JSON.stringify({ streams });
}
