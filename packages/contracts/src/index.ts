// Shared contract definitions for the narration leveler.
// Defines the shapes passed between the engine, the job runners and the CLI.
// Type-only: nothing here exists at runtime.

// ============================================================================
// Codec families
// ============================================================================

/**
 * Audio codec families recognized inside presentation media folders.
 * Closed set: every handler switches over it exhaustively.
 */
export type CodecFamily = "wav" | "flac" | "ogg" | "mp3" | "m4a" | "wma" | "aac";

/** "native" is decoded/encoded in process; "bridged" round-trips through ffmpeg */
export type CodecHandling = "native" | "bridged";

// ============================================================================
// Assets
// ============================================================================

export interface AudioAsset {
  /** Source path or container-relative name */
  name: string;
  codec: CodecFamily;
  sampleRate: number;
  channels: number;
  durationSec: number;
  /** Integrated loudness, null until measured */
  loudnessLufs: number | null;
  /** Applied gain, null until a valid measurement exists */
  gainDb: number | null;
}

export interface VideoAsset {
  path: string;
  hasAudio: boolean;
  hasVideo: boolean;
  videoCodec: string | null;
  audioCodec: string | null;
  /** Longest stream duration in seconds */
  durationSec: number;
}

export interface ContainerManifest {
  /** Entry paths in archive order, "/" separated, directories end with "/" */
  entries: string[];
  /** Subset of entries eligible for replacement */
  mediaAudio: string[];
}

// ============================================================================
// Outcomes
// ============================================================================

export type SkipReason = "too_short" | "unmeasurable" | "unsupported_format";

export interface NormalizationSuccess {
  status: "success";
  name: string;
  originalLufs: number;
  targetLufs: number;
  gainDb: number;
  durationSec: number;
}

export interface NormalizationSkipped {
  status: "skipped";
  name: string;
  reason: SkipReason;
  detail: string;
}

export interface NormalizationFailed {
  status: "failed";
  name: string;
  reason: string;
  errorName: string;
}

export type NormalizationOutcome =
  | NormalizationSuccess
  | NormalizationSkipped
  | NormalizationFailed;

// ============================================================================
// Jobs
// ============================================================================

export type JobKind = "presentation" | "video";

export interface AssetJob {
  kind: JobKind;
  /** Input container or video path */
  input: string;
  /** Final output path, written only after the whole pipeline succeeds */
  output: string;
}

export type VideoJobStage =
  | "probing"
  | "extracting_audio"
  | "normalizing"
  | "remuxing"
  | "done";

export type JobStatus = "completed" | "skipped" | "failed";

export interface JobReport {
  job: AssetJob;
  status: JobStatus;
  /** One outcome per audio asset the job touched */
  outcomes: NormalizationOutcome[];
  /** Set when status is "failed" or "skipped" */
  error?: string;
  /** Last stage reached by a video job */
  stage?: VideoJobStage;
  /** True when the output is a byte copy of the input */
  copiedVerbatim?: boolean;
}

// ============================================================================
// Batch results
// ============================================================================

export interface AssetTally {
  attempted: number;
  normalized: number;
  skipped: number;
  failed: number;
}

export interface BatchSummary {
  total: number;
  succeeded: number;
  skipped: number;
  failed: number;
  assets: AssetTally;
  reports: JobReport[];
  /** 0 iff no job failed */
  exitCode: number;
}

// ============================================================================
// Options
// ============================================================================

export interface NormalizationOptions {
  /** Target integrated loudness, -70..0 LUFS */
  targetLufs: number;
  denoise: boolean;
  /** 0 = no reduction, 1 = maximum */
  denoiseStrength: number;
  /** Overwrite outputs without asking */
  force: boolean;
  verbose: boolean;
}
