import * as fs from "fs";
import { promises as fsp } from "fs";
import * as path from "path";
import { pipeline } from "stream/promises";
import * as zlib from "zlib";
import { PlanningImageAuthor } from "./author.js";
import type { ImageAuthor } from "./author.js";
import { ImageWriteError, errorMessage, toErrorRecord } from "./errors.js";
import { fileDigest } from "./processor.js";
import type { BuildManifest, BuildOutcome, ChecksumAlgorithm, ContainerWrap } from "./types.js";

export interface AssembleRequest {
  outputPath: string;
  dryRun: boolean;
  checksumAlgorithm: ChecksumAlgorithm;
  wrap: ContainerWrap | null;
  /** Only called outside dry-run. */
  createAuthor: () => ImageAuthor;
}

const MAX_LABEL_LENGTH = 32;
const ARCHIVE_EXTENSIONS: Record<ContainerWrap, string> = {
  gzip: ".gz",
  brotli: ".br",
};

/** ISO-9660 volume identifiers are upper-case d-characters, at most 32 long. */
export function normalizeVolumeLabel(label: string): string {
  const normalized = label
    .normalize("NFKD")
    .toUpperCase()
    .replace(/[^A-Z0-9_]/gu, "_")
    .slice(0, MAX_LABEL_LENGTH);
  return normalized === "" ? "CDROM" : normalized;
}

export function archivePathFor(outputPath: string, wrap: ContainerWrap): string {
  return `${outputPath}${ARCHIVE_EXTENSIONS[wrap]}`;
}

/** Sibling the image or archive is written to before it replaces the target. */
export function tempPathFor(target: string): string {
  return `${target}.${process.pid.toString()}.tmp`;
}

/** Parent directories implied by the manifest, parents first, each once. */
export function directoriesFor(manifest: BuildManifest): string[] {
  const seen = new Set<string>();
  const directories: string[] = [];
  for (const unit of manifest.units) {
    const segments = unit.entry.relativePath.split("/");
    for (let depth = 1; depth < segments.length; depth += 1) {
      const directory = segments.slice(0, depth).join("/");
      if (seen.has(directory)) continue;
      seen.add(directory);
      directories.push(directory);
    }
  }
  return directories;
}

async function step<T>(description: string, action: () => Promise<T> | T): Promise<T> {
  try {
    return await action();
  } catch (err) {
    throw new ImageWriteError(`Failed to ${description}: ${errorMessage(err)}`, "IMAGE_WRITE_FAILED", {
      cause: err,
    });
  }
}

async function registerManifest(author: ImageAuthor, manifest: BuildManifest): Promise<void> {
  await step("create image", () => author.create());
  for (const directory of directoriesFor(manifest)) {
    await step(`add directory "${directory}"`, () => author.addDirectory(directory));
  }
  for (const unit of manifest.units) {
    const { relativePath } = unit.entry;
    await step(`add file "${relativePath}"`, () => author.addFile(relativePath, unit.payload));
  }
  author.setLabel(normalizeVolumeLabel(manifest.label));
}

async function wrapImage(outputPath: string, archivePath: string, wrap: ContainerWrap): Promise<void> {
  const compressor = wrap === "gzip" ? zlib.createGzip() : zlib.createBrotliCompress();
  await pipeline(fs.createReadStream(outputPath), compressor, fs.createWriteStream(archivePath));
}

async function removeOutputs(paths: string[]): Promise<void> {
  await Promise.all(paths.map((target) => fsp.rm(target, { force: true })));
}

function asWriteError(err: unknown): ImageWriteError {
  return err instanceof ImageWriteError ? err : new ImageWriteError(errorMessage(err));
}

/**
 * Feeds a complete manifest to the image author, or plans it in dry-run mode.
 * Never throws for authoring failures: they come back as an unsuccessful
 * outcome. The image and archive are written to temporary siblings and only
 * renamed over their targets once both are complete, so a failed run leaves
 * any earlier image in place.
 */
export async function assembleImage(
  manifest: BuildManifest,
  request: AssembleRequest
): Promise<BuildOutcome> {
  const startTime = Date.now();
  const outcome: BuildOutcome = {
    success: false,
    outputPath: request.outputPath,
    bytesWritten: 0,
    dryRun: request.dryRun,
    errors: [],
    elapsedMs: 0,
    label: normalizeVolumeLabel(manifest.label),
    entryCount: manifest.units.length,
    totalBytes: manifest.totalBytes,
    imageChecksum: null,
    archivePath: null,
  };

  if (request.dryRun) {
    const planner = new PlanningImageAuthor();
    let failure: ImageWriteError | null = null;
    try {
      await registerManifest(planner, manifest);
    } catch (err) {
      failure = asWriteError(err);
    } finally {
      await planner.close();
    }
    if (failure) {
      outcome.errors.push(toErrorRecord(failure));
    } else {
      outcome.success = true;
    }
    outcome.elapsedMs = Date.now() - startTime;
    return outcome;
  }

  const archivePath = request.wrap ? archivePathFor(request.outputPath, request.wrap) : null;
  const tempImagePath = tempPathFor(request.outputPath);
  const tempArchivePath = archivePath ? tempPathFor(archivePath) : null;
  let failure: ImageWriteError | null = null;
  let author: ImageAuthor | null = null;

  try {
    author = await step("start image author", () => request.createAuthor());
    await registerManifest(author, manifest);
    await step(`create ${path.dirname(request.outputPath)}`, () =>
      fsp.mkdir(path.dirname(request.outputPath), { recursive: true })
    );
    const imageAuthor = author;
    await step(`write ${request.outputPath}`, () => imageAuthor.write(tempImagePath));
  } catch (err) {
    failure = asWriteError(err);
  }

  if (author) {
    try {
      await author.close();
    } catch (err) {
      failure ??= new ImageWriteError(
        `Failed to release image author: ${errorMessage(err)}`,
        "AUTHOR_CLOSE_FAILED",
        { cause: err }
      );
    }
  }

  if (!failure) {
    try {
      outcome.bytesWritten = (await fsp.stat(tempImagePath)).size;
      outcome.imageChecksum = fileDigest(tempImagePath, request.checksumAlgorithm);
      const wrap = request.wrap;
      if (wrap && tempArchivePath) {
        await step(`wrap image as ${wrap}`, () => wrapImage(tempImagePath, tempArchivePath, wrap));
      }
      await step(`replace ${request.outputPath}`, () => fsp.rename(tempImagePath, request.outputPath));
      if (archivePath && tempArchivePath) {
        await step(`replace ${archivePath}`, () => fsp.rename(tempArchivePath, archivePath));
        outcome.archivePath = archivePath;
      }
    } catch (err) {
      failure = asWriteError(err);
    }
  }

  await removeOutputs(tempArchivePath ? [tempImagePath, tempArchivePath] : [tempImagePath]);

  if (failure) {
    outcome.bytesWritten = 0;
    outcome.imageChecksum = null;
    outcome.archivePath = null;
    outcome.errors.push(toErrorRecord(failure));
  } else {
    outcome.success = true;
  }

  outcome.elapsedMs = Date.now() - startTime;
  return outcome;
}
