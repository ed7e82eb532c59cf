export interface BenchErrorOptions {
  code: string;
  cause?: unknown;
}

export class BenchError extends Error {
  public readonly code: string;
  public override readonly cause?: unknown;

  constructor(message: string, options: BenchErrorOptions) {
    super(message);
    this.name = this.constructor.name;
    this.code = options.code;
    this.cause = options.cause;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      cause: this.cause instanceof Error ? this.cause.message : this.cause
    };
  }
}

/**
 * Bad registry data, bad configuration, or a missing corpus directory.
 */
export class ConfigError extends BenchError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: "CONFIG_INVALID", cause });
  }
}

/**
 * The corpus preparation script exited non-zero or could not be started.
 */
export class PreparationError extends BenchError {
  public readonly corpus: string;
  public readonly exitCode: number | null;

  constructor(corpus: string, exitCode: number | null, cause?: unknown) {
    const status = exitCode === null ? "could not run" : `exited with ${exitCode}`;
    super(`Preparation for corpus '${corpus}' ${status}`, { code: "PREPARATION_FAILED", cause });
    this.corpus = corpus;
    this.exitCode = exitCode;
  }
}

export interface InvocationFailure {
  command: string;
  exitCode: number | null;
  durationSeconds?: number;
  cause?: unknown;
}

/**
 * The analysis tool exited with a status other than 0 or 3.
 */
export class InvocationError extends BenchError {
  public readonly command: string;
  public readonly exitCode: number | null;
  public readonly durationSeconds?: number;

  constructor(failure: InvocationFailure) {
    const status = failure.exitCode === null ? "did not exit normally" : `exited with ${failure.exitCode}`;
    super(`Analysis run ${status}: ${failure.command}`, { code: "INVOCATION_FAILED", cause: failure.cause });
    this.command = failure.command;
    this.exitCode = failure.exitCode;
    this.durationSeconds = failure.durationSeconds;
  }
}

/**
 * Metric upload failed. Reflects the reporting side channel, not the measurement.
 */
export class UploadError extends BenchError {
  public readonly url: string;
  public readonly status?: number;

  constructor(url: string, detail: { status?: number; cause?: unknown }) {
    const reason = detail.status === undefined ? "request failed" : `responded ${detail.status}`;
    super(`Metric upload to ${url} ${reason}`, { code: "UPLOAD_FAILED", cause: detail.cause });
    this.url = url;
    this.status = detail.status;
  }
}
