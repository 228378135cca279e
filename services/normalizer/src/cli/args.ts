// Command-line parsing. Flag syntax is handled by node:util parseArgs;
// value ranges are checked by the same zod schema the library uses.
import { parseArgs } from "node:util";
import { ZodError } from "zod";
import type { JobKind, NormalizationOptions } from "@leveler/contracts";
import { parseOptions, type NormalizationOptionsInput } from "../lib/config.js";
import { ValidationError, errorMessage } from "../lib/errors.js";

export const USAGE = `Usage:
  leveler presentation <input.pptx> <output.pptx> [options]
  leveler presentation --input-dir <dir> --output-dir <dir> [options]
  leveler video <input.mp4> <output.mp4> [options]
  leveler video --input-dir <dir> --output-dir <dir> [options]

Options:
  --target-lufs <n>        Target integrated loudness, -70..0 (default -16)
  --denoise                Reduce stationary background noise before leveling
  --denoise-strength <n>   Noise reduction strength, 0..1 (default 0.5)
  -f, --force              Overwrite existing outputs without asking
  -v, --verbose            Debug logging
  -h, --help               Show this help`;

export type CliTarget =
  | { mode: "single"; input: string; output: string }
  | { mode: "batch"; inputDir: string; outputDir: string };

export interface CliCommand {
  kind: JobKind;
  target: CliTarget;
  options: NormalizationOptions;
  /** Non-fatal remarks about the flags given */
  warnings: string[];
}

export type ParsedCli = { help: true } | ({ help: false } & CliCommand);

function isJobKind(value: string | undefined): value is JobKind {
  return value === "presentation" || value === "video";
}

function toNumber(flag: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(value)) {
    throw new ValidationError(`--${flag} must be a number, got '${raw}'`);
  }
  return value;
}

const NUMERIC_FLAGS = new Set(["--target-lufs", "--denoise-strength"]);
const NEGATIVE_NUMBER = /^-(\d|\.\d)/;

/**
 * parseArgs reads "-14" after a string option as a flag, so fold
 * `--target-lufs -14` into `--target-lufs=-14` first.
 */
export function joinNegativeValues(argv: readonly string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--") {
      out.push(...argv.slice(i));
      break;
    }
    const next = argv[i + 1];
    if (NUMERIC_FLAGS.has(arg) && next !== undefined && NEGATIVE_NUMBER.test(next)) {
      out.push(`${arg}=${next}`);
      i++;
    } else {
      out.push(arg);
    }
  }
  return out;
}

function readArgv(argv: string[]) {
  try {
    return parseArgs({
      args: joinNegativeValues(argv),
      allowPositionals: true,
      strict: true,
      options: {
        "input-dir": { type: "string" },
        "output-dir": { type: "string" },
        "target-lufs": { type: "string" },
        denoise: { type: "boolean", default: false },
        "denoise-strength": { type: "string" },
        force: { type: "boolean", short: "f", default: false },
        verbose: { type: "boolean", short: "v", default: false },
        help: { type: "boolean", short: "h", default: false },
      },
    });
  } catch (error) {
    throw new ValidationError(errorMessage(error));
  }
}

export function parseCliArgs(argv: string[]): ParsedCli {
  const { values, positionals } = readArgv(argv);
  if (values.help) {
    return { help: true };
  }

  const [kind, ...paths] = positionals;
  if (!isJobKind(kind)) {
    throw new ValidationError(
      kind === undefined ? "Missing command" : `Unknown command '${kind}'`
    );
  }

  const inputDir = values["input-dir"];
  const outputDir = values["output-dir"];
  let target: CliTarget;
  if (inputDir !== undefined || outputDir !== undefined) {
    if (inputDir === undefined || outputDir === undefined) {
      throw new ValidationError("--input-dir and --output-dir must be given together");
    }
    if (paths.length > 0) {
      throw new ValidationError("Positional paths cannot be combined with --input-dir/--output-dir");
    }
    target = { mode: "batch", inputDir, outputDir };
  } else {
    if (paths.length !== 2) {
      throw new ValidationError(`Expected <input> <output>, got ${paths.length} path(s)`);
    }
    const [input, output] = paths;
    target = { mode: "single", input, output };
  }

  const raw: NormalizationOptionsInput = {
    targetLufs: toNumber("target-lufs", values["target-lufs"]),
    denoise: values.denoise,
    denoiseStrength: toNumber("denoise-strength", values["denoise-strength"]),
    force: values.force,
    verbose: values.verbose,
  };

  let options: NormalizationOptions;
  try {
    options = parseOptions(raw);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ValidationError(error.issues.map((issue) => issue.message).join("; "));
    }
    throw error;
  }

  const warnings: string[] = [];
  if (values["denoise-strength"] !== undefined && !values.denoise) {
    warnings.push("--denoise-strength has no effect without --denoise");
  }

  return { help: false, kind, target, options, warnings };
}
