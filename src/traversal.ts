import * as fs from "fs";
import * as path from "path";
import { FilesystemError, errorCode, errorMessage } from "./errors.js";
import { isExcludedDirectory, matches } from "./filter.js";
import type { FilterSet, SourceEntry } from "./types.js";

export interface TraversalOptions {
  /** Receives non-fatal per-entry errors. */
  onError?: (error: FilesystemError) => void;
  /** Throw the first per-entry error instead of reporting it. */
  failFast?: boolean;
  /** Absolute paths that are never yielded (the build's own output, for instance). */
  ignorePaths?: Iterable<string>;
  maxFileSizeBytes?: number | null;
}

function describeFailure(err: unknown): string {
  const code = errorCode(err);
  if (code === "ENOENT") return "entry vanished or is a dangling link";
  if (code === "EACCES" || code === "EPERM") return "permission denied";
  return errorMessage(err);
}

function* walkSource(
  sourceRoot: string,
  filterSet: FilterSet,
  options: TraversalOptions
): Generator<SourceEntry, void, undefined> {
  const root = path.resolve(sourceRoot);
  const ignored = new Set([...(options.ignorePaths ?? [])].map((entry) => path.resolve(entry)));
  const maxFileSize = options.maxFileSizeBytes ?? null;

  const report = (error: FilesystemError) => {
    if (options.failFast) {
      throw error.escalate();
    }
    options.onError?.(error);
  };

  function* walkDirectory(
    absoluteDir: string,
    relativeDir: string,
    ancestors: Set<string>
  ): Generator<SourceEntry, void, undefined> {
    let names: string[];
    try {
      names = fs.readdirSync(absoluteDir);
    } catch (err) {
      const label = relativeDir === "" ? "." : relativeDir;
      report(
        new FilesystemError(`Cannot read directory "${label}": ${describeFailure(err)}`, "READ_DIR_FAILED", {
          file: label,
          cause: err,
        })
      );
      return;
    }

    // Code-unit order keeps the walk reproducible regardless of locale.
    names.sort();

    for (const name of names) {
      const absolutePath = path.join(absoluteDir, name);
      const relativePath = relativeDir === "" ? name : `${relativeDir}/${name}`;
      if (ignored.has(absolutePath)) continue;

      let stat: fs.Stats;
      try {
        stat = fs.statSync(absolutePath);
      } catch (err) {
        report(
          new FilesystemError(`Cannot stat "${relativePath}": ${describeFailure(err)}`, "STAT_FAILED", {
            file: relativePath,
            cause: err,
          })
        );
        continue;
      }

      if (stat.isDirectory()) {
        if (isExcludedDirectory(relativePath, filterSet)) continue;

        let realPath: string;
        try {
          realPath = fs.realpathSync(absolutePath);
        } catch (err) {
          report(
            new FilesystemError(
              `Cannot resolve "${relativePath}": ${describeFailure(err)}`,
              "STAT_FAILED",
              { file: relativePath, cause: err }
            )
          );
          continue;
        }

        if (ancestors.has(realPath)) {
          throw new FilesystemError(
            `Symbolic link cycle: "${relativePath}" leads back to ${realPath}`,
            "SYMLINK_CYCLE",
            { file: relativePath, fatal: true }
          );
        }

        ancestors.add(realPath);
        yield* walkDirectory(absolutePath, relativePath, ancestors);
        ancestors.delete(realPath);
        continue;
      }

      if (!stat.isFile()) continue;

      const entry: SourceEntry = Object.freeze({
        absolutePath,
        relativePath,
        sizeBytes: stat.size,
        isHidden: name.startsWith("."),
        extension: path.extname(name).toLowerCase(),
      });

      if (!matches(entry, filterSet)) continue;

      if (maxFileSize !== null && entry.sizeBytes > maxFileSize) {
        report(
          new FilesystemError(
            `Skipping "${relativePath}": ${entry.sizeBytes.toString()} bytes exceeds the per-file limit of ${maxFileSize.toString()} bytes`,
            "FILE_TOO_LARGE",
            { file: relativePath }
          )
        );
        continue;
      }

      yield entry;
    }
  }

  let rootReal: string;
  try {
    rootReal = fs.realpathSync(root);
  } catch (err) {
    throw new FilesystemError(`Cannot open source directory ${root}: ${describeFailure(err)}`, "READ_DIR_FAILED", {
      fatal: true,
      cause: err,
    });
  }

  yield* walkDirectory(root, "", new Set([rootReal]));
}

/**
 * Lazily walks `sourceRoot` and yields the entries that pass `filterSet`.
 * Every iteration starts a fresh walk, so the sequence can be consumed more
 * than once.
 */
export function traverse(
  sourceRoot: string,
  filterSet: FilterSet,
  options: TraversalOptions = {}
): Iterable<SourceEntry> {
  return {
    [Symbol.iterator]: () => walkSource(sourceRoot, filterSet, options),
  };
}

export function collectCandidates(
  sourceRoot: string,
  filterSet: FilterSet,
  options: TraversalOptions = {}
): SourceEntry[] {
  return [...traverse(sourceRoot, filterSet, options)];
}
