/**
 * FFmpeg command execution wrapper
 *
 * Provides typed command building and execution with timeout and cancellation.
 * NEVER relies on FFmpeg defaults - sample rate, channel count, codec and
 * overwrite behaviour are always explicit.
 */

import { spawn } from 'node:child_process';
import { CommandBuildError, TranscodeError } from '../lib/errors.js';
import { ffmpegBinary, ffprobeBinary } from '../lib/config.js';

export type SpawnResult = {
  code: number;
  stdout: string;
  stderr: string;
};

export interface RunOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Anything that can execute a command line. The default spawns a child
 * process; tests substitute an in-process stand-in.
 */
export type CommandRunner = (
  cmd: string,
  args: string[],
  opts?: RunOptions
) => Promise<SpawnResult>;

/**
 * Execute a command with proper timeout and output capture
 */
export async function run(
  cmd: string,
  args: string[],
  opts?: RunOptions
): Promise<SpawnResult> {
  const timeoutMs = opts?.timeoutMs ?? 10 * 60 * 1000; // 10 minutes default

  return await new Promise((resolve, reject) => {
    const child = spawn(cmd, args, {
      cwd: opts?.cwd,
      env: opts?.env ?? process.env,
      stdio: ['ignore', 'pipe', 'pipe'],
      signal: opts?.signal,
    });

    let stdout = '';
    let stderr = '';

    const timer = setTimeout(() => {
      child.kill('SIGKILL');
      reject(new Error(`Command timed out after ${timeoutMs}ms: ${cmd} ${args.join(' ')}`));
    }, timeoutMs);

    child.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    child.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('error', (err) => {
      clearTimeout(timer);
      reject(err);
    });

    child.on('close', (code) => {
      clearTimeout(timer);
      resolve({
        code: code ?? -1,
        stdout,
        stderr,
      });
    });
  });
}

/**
 * Throw if command did not exit with code 0
 */
export function requireOk(result: SpawnResult, context: string): void {
  if (result.code !== 0) {
    throw new TranscodeError(context, result.code, result.stderr, result.stdout);
  }
}

/**
 * Check if FFmpeg is available on the system
 */
export async function checkFfmpeg(runner: CommandRunner = run): Promise<boolean> {
  try {
    const result = await runner(ffmpegBinary(), ['-version'], { timeoutMs: 5000 });
    return result.code === 0;
  } catch {
    return false;
  }
}

/**
 * Check if FFprobe is available on the system
 */
export async function checkFfprobe(runner: CommandRunner = run): Promise<boolean> {
  try {
    const result = await runner(ffprobeBinary(), ['-version'], { timeoutMs: 5000 });
    return result.code === 0;
  } catch {
    return false;
  }
}

// ============================================================================
// Command builder
// ============================================================================

export interface BuiltCommand {
  cmd: string;
  args: string[];
}

/**
 * Typed ffmpeg invocation. build() refuses to produce a command line that is
 * missing an input, an output, the overwrite flag or quiet logging, so no
 * invocation can prompt interactively or flood stderr.
 *
 * ```ts
 * new FfmpegCommand()
 *   .input(src).noVideo().audioCodec('pcm_s16le').sampleRate(48000).channels(2)
 *   .overwrite().quiet().output(dst)
 *   .build({ requireFormat: true });
 * ```
 */
export class FfmpegCommand {
  private readonly inputs: string[] = [];
  private outputPath: string | null = null;
  private overwriteFlag = false;
  private quietFlag = false;
  private rate: number | null = null;
  private channelCount: number | null = null;
  private readonly codecArgs: string[] = [];
  private readonly streamArgs: string[] = [];

  input(path: string): this {
    this.inputs.push(path);
    return this;
  }

  output(path: string): this {
    this.outputPath = path;
    return this;
  }

  overwrite(): this {
    this.overwriteFlag = true;
    return this;
  }

  /** Suppress everything except errors */
  quiet(): this {
    this.quietFlag = true;
    return this;
  }

  sampleRate(hz: number): this {
    if (!Number.isInteger(hz) || hz <= 0) {
      throw new RangeError(`Invalid sample rate: ${hz}`);
    }
    this.rate = hz;
    return this;
  }

  channels(count: number): this {
    if (!Number.isInteger(count) || count <= 0) {
      throw new RangeError(`Invalid channel count: ${count}`);
    }
    this.channelCount = count;
    return this;
  }

  audioCodec(codec: string): this {
    this.codecArgs.push('-c:a', codec);
    return this;
  }

  audioBitrate(bitrate: string): this {
    this.codecArgs.push('-b:a', bitrate);
    return this;
  }

  /** Raw encoder arguments, e.g. from the codec table */
  encoderArgs(args: readonly string[]): this {
    this.codecArgs.push(...args);
    return this;
  }

  videoCodec(codec: string): this {
    this.codecArgs.push('-c:v', codec);
    return this;
  }

  noVideo(): this {
    this.streamArgs.push('-vn');
    return this;
  }

  map(spec: string): this {
    this.streamArgs.push('-map', spec);
    return this;
  }

  shortest(): this {
    this.streamArgs.push('-shortest');
    return this;
  }

  /**
   * @param opts.requireFormat - also demand explicit sample rate and channel count
   */
  build(opts: { requireFormat?: boolean; binary?: string } = {}): BuiltCommand {
    const missing: string[] = [];
    if (this.inputs.length === 0) missing.push('-i');
    if (this.outputPath === null) missing.push('output');
    if (!this.overwriteFlag) missing.push('-y');
    if (!this.quietFlag) missing.push('-loglevel');
    if (opts.requireFormat) {
      if (this.rate === null) missing.push('-ar');
      if (this.channelCount === null) missing.push('-ac');
    }
    if (missing.length > 0 || this.outputPath === null) {
      throw new CommandBuildError(missing);
    }

    const args: string[] = ['-hide_banner', '-nostdin'];
    for (const input of this.inputs) {
      args.push('-i', input);
    }
    args.push(...this.streamArgs);
    args.push(...this.codecArgs);
    if (this.rate !== null) args.push('-ar', String(this.rate));
    if (this.channelCount !== null) args.push('-ac', String(this.channelCount));
    args.push('-loglevel', 'error');
    args.push('-y', this.outputPath);

    return { cmd: opts.binary ?? ffmpegBinary(), args };
  }
}

/**
 * Build, run and require a zero exit
 */
export async function runFfmpeg(
  command: BuiltCommand,
  context: string,
  runner: CommandRunner = run,
  signal?: AbortSignal
): Promise<SpawnResult> {
  const result = await runner(command.cmd, command.args, {
    timeoutMs: 30 * 60 * 1000,
    signal,
  });
  requireOk(result, context);
  return result;
}
