export class ConfigError extends Error {
  missing: string[];

  constructor(message: string, opts: { missing?: string[] } = {}) {
    super(message);
    this.name = "ConfigError";
    this.missing = opts.missing ?? [];
  }
}

export class InputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InputError";
  }
}

export class RemoteJobError extends Error {
  status?: number;
  code?: string;
  url?: string;

  constructor(message: string, opts: { status?: number; code?: string; url?: string; cause?: unknown } = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "RemoteJobError";
    this.status = opts.status;
    this.code = opts.code;
    this.url = opts.url;
  }
}

export class UploadError extends Error {
  path: string;
  state?: string;

  constructor(message: string, opts: { path: string; state?: string; cause?: unknown }) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "UploadError";
    this.path = opts.path;
    this.state = opts.state;
  }
}

export class GenerationError extends Error {
  status?: number;

  constructor(message: string, opts: { status?: number; cause?: unknown } = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "GenerationError";
    this.status = opts.status;
  }
}

export type PipelineErrorCode = "no_urls" | "no_videos" | "no_transcripts";

export class PipelineError extends Error {
  code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string) {
    super(message);
    this.name = "PipelineError";
    this.code = code;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
