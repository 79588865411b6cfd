import * as fs from "fs";
import { promises as fsp } from "fs";
import * as path from "path";
import { FilesystemError, errorMessage } from "../errors.js";
import { canonicalPathKey } from "../shared.js";
import type { SourceEntry } from "../types.js";
import { formatSize, sanitizeForTerminal } from "./reporting.js";

export interface PreflightIssue {
  message: string;
  /** One-line form for error records and notifications. */
  summary: string;
  details: string[];
}

/**
 * Two candidates whose image paths differ only by case or Unicode
 * normalization would overwrite each other on the target file system.
 */
export function findPathCollisions(candidates: readonly SourceEntry[]): PreflightIssue | null {
  const planned = new Map<string, SourceEntry>();

  for (const candidate of candidates) {
    const key = canonicalPathKey(candidate.relativePath);
    const existing = planned.get(key);
    if (existing) {
      return {
        message: "Image path collision detected:",
        summary: `Image paths "${existing.relativePath}" and "${candidate.relativePath}" collide`,
        details: [
          `  • ${sanitizeForTerminal(existing.relativePath)}`,
          `  • ${sanitizeForTerminal(candidate.relativePath)}`,
          "Fix: rename one of the files or exclude it with --exclude.",
        ],
      };
    }
    planned.set(key, candidate);
  }

  return null;
}

function nearestExistingDirectory(target: string): string {
  let current = path.dirname(path.resolve(target));
  while (!fs.existsSync(current)) {
    const parent = path.dirname(current);
    if (parent === current) break;
    current = parent;
  }
  return current;
}

export function estimateImageBytes(candidates: readonly SourceEntry[]): number {
  return candidates.reduce((sum, candidate) => sum + candidate.sizeBytes, 0);
}

export async function checkDiskSpace(
  outputPath: string,
  requiredBytes: number
): Promise<PreflightIssue | null> {
  const directory = nearestExistingDirectory(outputPath);
  let stats: fs.StatsFs;
  try {
    stats = await fsp.statfs(directory);
  } catch (err) {
    throw new FilesystemError(
      `Cannot determine free space in ${directory}: ${errorMessage(err)}`,
      "STATFS_FAILED",
      { fatal: true, cause: err }
    );
  }
  const availableBytes = stats.bavail * stats.bsize;
  if (availableBytes >= requiredBytes) {
    return null;
  }
  return {
    message: "Insufficient disk space for the image:",
    summary: `Insufficient disk space: ${requiredBytes.toString()} bytes required, ${availableBytes.toString()} available`,
    details: [
      `  • required: ${formatSize(requiredBytes)} (${requiredBytes.toString()} bytes)`,
      `  • available in ${sanitizeForTerminal(directory)}: ${formatSize(availableBytes)}`,
      "Fix: free space, choose another --output location, or lower the input with --exclude.",
    ],
  };
}
