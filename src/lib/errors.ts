/**
 * Error taxonomy for the pipeline.
 *
 * Only ConfigurationError is fatal to a run. The others are caught by the stage
 * that owns the failing item, which writes an error artifact and moves on.
 */

export class PipelineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or invalid setting; the CLI exits before any work starts. */
export class ConfigurationError extends PipelineError {}

/** The model call failed, or finished without returning text. */
export class CollaboratorError extends PipelineError {
  readonly partialText: string;

  constructor(message: string, options: { cause?: unknown; partialText?: string } = {}) {
    super(message, { cause: options.cause });
    this.partialText = options.partialText ?? "";
  }
}

/** Model text that could not be turned into the expected JSON, even after repair. */
export class MalformedResponseError extends PipelineError {
  readonly raw: string;
  /** The span of the response that was parsed as JSON, when one was isolated. */
  readonly attempted?: string;

  constructor(message: string, raw: string, options: { cause?: unknown; attempted?: string } = {}) {
    super(message, { cause: options.cause });
    this.raw = raw;
    this.attempted = options.attempted;
  }
}

export class FileSystemError extends PipelineError {
  readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, options);
    this.path = path;
  }
}

/** Leading part of whatever response text a failed model call left behind. */
export function responseExcerpt(err: unknown, limit: number): string {
  if (err instanceof MalformedResponseError) return err.raw.slice(0, limit);
  if (err instanceof CollaboratorError) return err.partialText.slice(0, limit);
  return "";
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
