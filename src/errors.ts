export type ErrorKind =
  | "ConfigurationError"
  | "FilesystemError"
  | "ChecksumError"
  | "CompressionError"
  | "SizeLimitExceededError"
  | "ImageWriteError"
  | "NotificationError";

export interface BuildErrorRecord {
  kind: ErrorKind;
  code: string;
  message: string;
  file?: string;
  fatal: boolean;
}

export interface BuildErrorOptions {
  file?: string;
  fatal?: boolean;
  cause?: unknown;
}

export const EXIT_SUCCESS = 0;
export const EXIT_CONFIGURATION = 1;
export const EXIT_FILESYSTEM = 2;
export const EXIT_SIZE_LIMIT = 3;
export const EXIT_IMAGE_WRITE = 4;

export abstract class BuildError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly exitCode: number;
  readonly code: string;
  readonly file: string | undefined;
  readonly fatal: boolean;

  protected constructor(
    code: string,
    message: string,
    defaultFatal: boolean,
    options: BuildErrorOptions = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.file = options.file;
    this.fatal = options.fatal ?? defaultFatal;
  }
}

export class ConfigurationError extends BuildError {
  readonly kind = "ConfigurationError";
  readonly exitCode = EXIT_CONFIGURATION;

  constructor(message: string, code = "INVALID_CONFIG", options: BuildErrorOptions = {}) {
    super(code, message, true, options);
  }
}

/** Unreadable or vanished entry. Non-fatal unless escalated (fail-fast, cycles). */
export class FilesystemError extends BuildError {
  readonly kind = "FilesystemError";
  readonly exitCode = EXIT_FILESYSTEM;

  constructor(message: string, code = "READ_FAILED", options: BuildErrorOptions = {}) {
    super(code, message, false, options);
  }

  escalate(): FilesystemError {
    if (this.fatal) return this;
    return new FilesystemError(this.message, this.code, {
      file: this.file,
      fatal: true,
      cause: this.cause,
    });
  }
}

export class ChecksumError extends BuildError {
  readonly kind = "ChecksumError";
  readonly exitCode = EXIT_FILESYSTEM;

  constructor(message: string, options: BuildErrorOptions = {}) {
    super("CHECKSUM_FAILED", message, false, options);
  }
}

export class CompressionError extends BuildError {
  readonly kind = "CompressionError";
  readonly exitCode = EXIT_FILESYSTEM;

  constructor(message: string, options: BuildErrorOptions = {}) {
    super("COMPRESSION_FAILED", message, false, options);
  }
}

export class SizeLimitExceededError extends BuildError {
  readonly kind = "SizeLimitExceededError";
  readonly exitCode = EXIT_SIZE_LIMIT;
  readonly limitBytes: number;
  readonly attemptedBytes: number;

  constructor(limitBytes: number, attemptedBytes: number, options: BuildErrorOptions = {}) {
    super(
      "SIZE_LIMIT_EXCEEDED",
      `Image size budget exceeded: ${attemptedBytes.toString()} bytes > limit of ${limitBytes.toString()} bytes.`,
      true,
      options
    );
    this.limitBytes = limitBytes;
    this.attemptedBytes = attemptedBytes;
  }
}

export class ImageWriteError extends BuildError {
  readonly kind = "ImageWriteError";
  readonly exitCode = EXIT_IMAGE_WRITE;

  constructor(message: string, code = "IMAGE_WRITE_FAILED", options: BuildErrorOptions = {}) {
    super(code, message, true, options);
  }
}

export class NotificationError extends BuildError {
  readonly kind = "NotificationError";
  readonly exitCode = EXIT_SUCCESS;

  constructor(message: string, options: BuildErrorOptions = {}) {
    super("NOTIFICATION_FAILED", message, false, { ...options, fatal: false });
  }
}

export function isBuildError(value: unknown): value is BuildError {
  return value instanceof BuildError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : "unknown error";
}

export function errorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  return typeof err.code === "string" ? err.code : undefined;
}

export function toErrorRecord(error: BuildError): BuildErrorRecord {
  const record: BuildErrorRecord = {
    kind: error.kind,
    code: error.code,
    message: error.message,
    fatal: error.fatal,
  };
  if (error.file !== undefined) {
    record.file = error.file;
  }
  return record;
}
