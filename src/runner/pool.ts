import pLimit from "p-limit";
import { BuildError, FilesystemError, errorMessage, isBuildError } from "../errors.js";
import type { ManifestBuilder } from "../manifest.js";
import { processEntry } from "../processor.js";
import type { ProcessOptions } from "../processor.js";
import type { BuildManifest, ProcessedUnit, SourceEntry } from "../types.js";

export interface PoolOptions extends ProcessOptions {
  concurrency: number;
  /** Escalate per-file filesystem errors to fatal. */
  failFast: boolean;
}

export interface PoolHooks {
  onUnit?: (unit: ProcessedUnit, index: number, completed: number) => void;
  onFailure?: (error: BuildError, index: number, completed: number) => void;
}

export interface PoolResult {
  manifest: BuildManifest;
  /** Non-fatal per-file errors in candidate order. */
  failures: BuildError[];
}

function classifyFailure(err: unknown, entry: SourceEntry, failFast: boolean): BuildError {
  const error = isBuildError(err)
    ? err
    : new FilesystemError(`Cannot process "${entry.relativePath}": ${errorMessage(err)}`, "PROCESS_FAILED", {
        file: entry.relativePath,
        cause: err,
      });
  if (failFast && error instanceof FilesystemError) {
    return error.escalate();
  }
  return error;
}

/**
 * Runs `processEntry` over every candidate with at most `concurrency` tasks in
 * flight. Each task writes only its own builder slot. The first fatal error
 * aborts the shared signal: queued tasks return without work, in-flight tasks
 * stop at their next checkpoint, and the error is rethrown once everything
 * has settled, so no partial manifest escapes.
 */
export async function processCandidates(
  candidates: readonly SourceEntry[],
  options: PoolOptions,
  builder: ManifestBuilder,
  hooks: PoolHooks = {}
): Promise<PoolResult> {
  const controller = new AbortController();
  const limiter = pLimit(Math.max(1, options.concurrency));
  const failures = new Array<BuildError | undefined>(candidates.length).fill(undefined);
  const state: { fatal: BuildError | null; completed: number } = { fatal: null, completed: 0 };

  const cancel = (error: BuildError) => {
    if (state.fatal !== null) return;
    state.fatal = error;
    controller.abort(error);
  };

  await Promise.all(
    candidates.map((entry, index) =>
      limiter(async () => {
        if (controller.signal.aborted) return;

        let unit: ProcessedUnit;
        try {
          unit = await processEntry(entry, options, controller.signal);
        } catch (err) {
          if (controller.signal.aborted) return;
          const error = classifyFailure(err, entry, options.failFast);
          if (error.fatal) {
            cancel(error);
            return;
          }
          failures[index] = error;
          state.completed += 1;
          hooks.onFailure?.(error, index, state.completed);
          return;
        }

        if (controller.signal.aborted) return;

        try {
          builder.place(index, unit);
        } catch (err) {
          cancel(classifyFailure(err, entry, true));
          return;
        }
        state.completed += 1;
        hooks.onUnit?.(unit, index, state.completed);
      })
    )
  );

  if (state.fatal !== null) {
    throw state.fatal;
  }

  return {
    manifest: builder.finalize(),
    failures: failures.filter((failure): failure is BuildError => failure !== undefined),
  };
}
