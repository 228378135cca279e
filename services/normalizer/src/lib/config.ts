// Option and environment validation using Zod
import { z } from "zod";
import type { NormalizationOptions } from "@leveler/contracts";

// ============================================================================
// Normalization options
// ============================================================================

export const DEFAULT_TARGET_LUFS = -16.0;
export const DEFAULT_DENOISE_STRENGTH = 0.5;

export const normalizationOptionsSchema = z.object({
  targetLufs: z
    .number()
    .min(-70, "Target loudness must be between -70 and 0 LUFS")
    .max(0, "Target loudness must be between -70 and 0 LUFS")
    .default(DEFAULT_TARGET_LUFS),
  denoise: z.boolean().default(false),
  denoiseStrength: z
    .number()
    .min(0, "Denoise strength must be between 0.0 and 1.0")
    .max(1, "Denoise strength must be between 0.0 and 1.0")
    .default(DEFAULT_DENOISE_STRENGTH),
  force: z.boolean().default(false),
  verbose: z.boolean().default(false),
});

export type NormalizationOptionsInput = z.input<typeof normalizationOptionsSchema>;

export function parseOptions(input: NormalizationOptionsInput): NormalizationOptions {
  return normalizationOptionsSchema.parse(input);
}

// ============================================================================
// Environment
// ============================================================================

export const envSchema = z.object({
  FFMPEG_PATH: z.string().min(1).optional(),
  FFPROBE_PATH: z.string().min(1).optional(),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .optional(),
});

export type Env = z.infer<typeof envSchema>;

export function readEnv(source: NodeJS.ProcessEnv = process.env): Env {
  return envSchema.parse({
    FFMPEG_PATH: source.FFMPEG_PATH || undefined,
    FFPROBE_PATH: source.FFPROBE_PATH || undefined,
    LOG_LEVEL: source.LOG_LEVEL || undefined,
  });
}

/**
 * Resolved lazily so values loaded after import are honoured.
 * Falls back to the binaries on PATH.
 */
export function ffmpegBinary(env: Env = readEnv()): string {
  return env.FFMPEG_PATH ?? "ffmpeg";
}

export function ffprobeBinary(env: Env = readEnv()): string {
  if (env.FFPROBE_PATH) return env.FFPROBE_PATH;
  if (!env.FFMPEG_PATH) return "ffprobe";
  return env.FFMPEG_PATH.replace("ffmpeg.exe", "ffprobe.exe").replace(/ffmpeg$/, "ffprobe");
}
