// Error taxonomy for the normalization pipeline.
//
// Measurement skips (too short, silent) are not errors: they are outcome
// variants. Everything here either fails an asset, fails a job, or (for
// DenoiseError) is reported through a result value and recovered from.

/** Bad input path, wrong format, missing required stream */
export class ValidationError extends Error {
  constructor(message: string, public readonly path?: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/** External transcoder or prober exited non-zero */
export class TranscodeError extends Error {
  constructor(
    public readonly context: string,
    public readonly exitCode: number,
    public readonly stderr: string,
    public readonly stdout: string = ""
  ) {
    super(
      `${context} failed (code=${exitCode}).` +
        (stderr ? `\nSTDERR:\n${stderr.slice(0, 2000)}` : "")
    );
    this.name = "TranscodeError";
  }
}

/** Archive unreadable, not a ZIP, or an entry escapes the extraction root */
export class ContainerIntegrityError extends Error {
  constructor(message: string, public readonly path?: string) {
    super(message);
    this.name = "ContainerIntegrityError";
  }
}

/** An external command was built without one of its required flags */
export class CommandBuildError extends Error {
  constructor(public readonly missing: string[]) {
    super(`ffmpeg command is missing required flags: ${missing.join(", ")}`);
    this.name = "CommandBuildError";
  }
}

export class DenoiseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DenoiseError";
  }
}

/** The run was interrupted (SIGINT) */
export class CancelledError extends Error {
  constructor(message = "Operation cancelled") {
    super(message);
    this.name = "CancelledError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorName(error: unknown): string {
  return error instanceof Error ? error.name : "Error";
}

/**
 * Throw CancelledError if the signal has fired
 */
export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError();
  }
}
