import * as crypto from "crypto";
import * as fs from "fs";
import { promises as fsp } from "fs";
import * as os from "os";
import * as path from "path";
import { promisify } from "util";
import * as zlib from "zlib";
import { unzipSync, zipSync } from "fflate";
import { extract, pack } from "tar-stream";
import {
  ChecksumError,
  CompressionError,
  FilesystemError,
  errorCode,
  errorMessage,
} from "./errors.js";
import type {
  ChecksumAlgorithm,
  CompressionMethod,
  PayloadEncoding,
  ProcessedUnit,
  SourceEntry,
} from "./types.js";

export interface ProcessOptions {
  checksumAlgorithm: ChecksumAlgorithm;
  /** null stores the original bytes. */
  compression: CompressionMethod | null;
}

export const CHECKSUM_ALGORITHMS: readonly ChecksumAlgorithm[] = ["sha256", "sha1", "md5"];
export const COMPRESSION_METHODS: readonly CompressionMethod[] = [
  "zip",
  "tar.gz",
  "gzip",
  "deflate",
  "brotli",
];

const HASH_CHUNK_SIZE = 1024 * 1024;

// Fixed archive timestamps keep payloads identical across runs. DOS dates start in 1980.
const ZIP_MTIME = new Date(1980, 0, 1);
const TAR_MTIME = new Date(0);

const RESOURCE_EXHAUSTION_CODES = new Set([
  "ENOMEM",
  "ERR_OUT_OF_MEMORY",
  "ERR_BUFFER_TOO_LARGE",
  "ERR_FS_FILE_TOO_LARGE",
  "ERR_STRING_TOO_LONG",
]);

const gzip = promisify(zlib.gzip);
const gunzip = promisify(zlib.gunzip);
const deflate = promisify(zlib.deflate);
const inflate = promisify(zlib.inflate);
const brotliCompress = promisify(zlib.brotliCompress);
const brotliDecompress = promisify(zlib.brotliDecompress);

export function getDefaultConcurrency(): number {
  const available =
    typeof os.availableParallelism === "function" ? os.availableParallelism() : os.cpus().length;
  return Math.max(1, available);
}

/** Failures that take the whole process down rather than one file. */
export function isResourceExhaustion(err: unknown): boolean {
  const code = errorCode(err);
  if (code !== undefined && RESOURCE_EXHAUSTION_CODES.has(code)) return true;
  return err instanceof RangeError && /allocation failed|out of memory/iu.test(err.message);
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === "AbortError";
}

export function computeDigest(content: Buffer, algorithm: ChecksumAlgorithm): string {
  return crypto.createHash(algorithm).update(content).digest("hex");
}

/** Chunked digest of a file on disk; used for the finished image. */
export function fileDigest(filePath: string, algorithm: ChecksumAlgorithm): string {
  const hash = crypto.createHash(algorithm);
  const fileDescriptor = fs.openSync(filePath, "r");
  const buffer = Buffer.allocUnsafe(HASH_CHUNK_SIZE);

  try {
    for (;;) {
      const bytesRead = fs.readSync(fileDescriptor, buffer, 0, buffer.length, null);
      if (bytesRead === 0) {
        break;
      }
      hash.update(buffer.subarray(0, bytesRead));
    }
  } finally {
    fs.closeSync(fileDescriptor);
  }

  return hash.digest("hex");
}

async function readAll(stream: AsyncIterable<unknown>): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    if (typeof chunk === "string") {
      chunks.push(Buffer.from(chunk));
    } else if (chunk instanceof Uint8Array) {
      chunks.push(Buffer.from(chunk));
    }
  }
  return Buffer.concat(chunks);
}

async function tarSingle(content: Buffer, entryName: string): Promise<Buffer> {
  const archive = pack();
  archive.entry({ name: entryName, size: content.length, mode: 0o644, mtime: TAR_MTIME }, content);
  archive.finalize();
  return readAll(archive);
}

function untarSingle(archive: Buffer): Promise<Buffer[]> {
  return new Promise((resolve, reject) => {
    const extractor = extract();
    const contents: Buffer[] = [];
    extractor.on("entry", (header, stream, next) => {
      readAll(stream).then(
        (content) => {
          if (header.type === "file") contents.push(content);
          next();
        },
        (err: unknown) => {
          reject(err);
        }
      );
    });
    extractor.on("error", reject);
    extractor.on("finish", () => {
      resolve(contents);
    });
    extractor.end(archive);
  });
}

function singleMember(members: readonly Uint8Array[], format: string): Buffer {
  const [content] = members;
  if (members.length !== 1 || content === undefined) {
    throw new CompressionError(
      `Expected exactly one file in the ${format} payload, found ${members.length.toString()}`
    );
  }
  return Buffer.from(content);
}

/**
 * Encodes one file's bytes. The archive formats hold a single member named
 * `entryName`; the stream codecs ignore it.
 */
export async function compressPayload(
  content: Buffer,
  method: CompressionMethod,
  entryName: string
): Promise<Buffer> {
  switch (method) {
    case "zip":
      return Buffer.from(zipSync({ [entryName]: [content, { level: 6, mtime: ZIP_MTIME }] }));
    case "tar.gz":
      return gzip(await tarSingle(content, entryName));
    case "gzip":
      return gzip(content);
    case "deflate":
      return deflate(content);
    case "brotli":
      return brotliCompress(content);
  }
}

export async function decompressPayload(payload: Buffer, encoding: PayloadEncoding): Promise<Buffer> {
  switch (encoding) {
    case "none":
      return payload;
    case "zip":
      return singleMember(Object.values(unzipSync(payload)), "zip");
    case "tar.gz":
      return singleMember(await untarSingle(await gunzip(payload)), "tar.gz");
    case "gzip":
      return gunzip(payload);
    case "deflate":
      return inflate(payload);
    case "brotli":
      return brotliDecompress(payload);
  }
}

/**
 * Reads one candidate, digests the original bytes and optionally compresses
 * them. The signal is checked between steps; an abort surfaces as the
 * signal's reason.
 */
export async function processEntry(
  entry: SourceEntry,
  options: ProcessOptions,
  signal?: AbortSignal
): Promise<ProcessedUnit> {
  signal?.throwIfAborted();

  let content: Buffer;
  try {
    content = await fsp.readFile(entry.absolutePath, { signal });
  } catch (err) {
    if (isAbortError(err)) throw err;
    const reason = errorCode(err) === "ENOENT" ? "file vanished" : errorMessage(err);
    throw new FilesystemError(`Cannot read "${entry.relativePath}": ${reason}`, "READ_FAILED", {
      file: entry.relativePath,
      fatal: isResourceExhaustion(err),
      cause: err,
    });
  }

  signal?.throwIfAborted();

  let checksumDigest: string;
  try {
    checksumDigest = computeDigest(content, options.checksumAlgorithm);
  } catch (err) {
    throw new ChecksumError(
      `Cannot compute ${options.checksumAlgorithm} for "${entry.relativePath}": ${errorMessage(err)}`,
      { file: entry.relativePath, fatal: isResourceExhaustion(err), cause: err }
    );
  }

  let payload = content;
  if (options.compression !== null) {
    signal?.throwIfAborted();
    try {
      payload = await compressPayload(
        content,
        options.compression,
        path.posix.basename(entry.relativePath)
      );
    } catch (err) {
      throw new CompressionError(
        `Cannot ${options.compression}-compress "${entry.relativePath}": ${errorMessage(err)}`,
        { file: entry.relativePath, fatal: isResourceExhaustion(err), cause: err }
      );
    }
  }

  return Object.freeze({
    entry,
    checksumAlgorithm: options.checksumAlgorithm,
    checksumDigest,
    payload,
    compressionMethod: options.compression ?? "none",
  });
}
