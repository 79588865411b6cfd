import type { BuildErrorRecord } from "./errors.js";

export type ChecksumAlgorithm = "sha256" | "sha1" | "md5";

/** Per-file encodings: single-member archives, or a bare compressed stream. */
export type CompressionMethod = "zip" | "tar.gz" | "gzip" | "deflate" | "brotli";

export type PayloadEncoding = CompressionMethod | "none";

/** Formats the finished image can be wrapped in as a second pass. */
export type ContainerWrap = "gzip" | "brotli";

export interface SourceEntry {
  readonly absolutePath: string;
  /** POSIX-separated path relative to the source root; doubles as the image path. */
  readonly relativePath: string;
  readonly sizeBytes: number;
  readonly isHidden: boolean;
  /** Lower-cased with a leading dot, or "" when the name has none. */
  readonly extension: string;
}

export interface FilterSet {
  readonly includeExtensions: ReadonlySet<string>;
  readonly excludeNames: ReadonlySet<string>;
  /** Compiled form of the exclude names that are glob patterns. */
  readonly excludeGlobs: ReadonlyMap<string, RegExp>;
  readonly includeHidden: boolean;
}

export interface ProcessedUnit {
  readonly entry: SourceEntry;
  readonly checksumAlgorithm: ChecksumAlgorithm;
  /** Hex digest of the original content, before any compression. */
  readonly checksumDigest: string;
  readonly payload: Buffer;
  readonly compressionMethod: PayloadEncoding;
}

export interface BuildManifest {
  readonly units: readonly ProcessedUnit[];
  readonly totalBytes: number;
  readonly label: string;
}

export interface BuildOutcome {
  success: boolean;
  outputPath: string;
  bytesWritten: number;
  dryRun: boolean;
  errors: BuildErrorRecord[];
  elapsedMs: number;
  label: string | null;
  entryCount: number;
  totalBytes: number;
  imageChecksum: string | null;
  archivePath: string | null;
}
