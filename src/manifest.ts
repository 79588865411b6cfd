import * as path from "path";
import { SizeLimitExceededError } from "./errors.js";
import type { BuildManifest, ProcessedUnit } from "./types.js";

export interface ManifestBuilderOptions {
  label: string;
  /** null disables the budget. */
  maxSizeBytes: number | null;
  /** Number of candidate slots; one per traversal index. */
  slots: number;
}

export function resolveLabel(explicitLabel: string | null | undefined, sourceRoot: string): string {
  if (explicitLabel !== null && explicitLabel !== undefined && explicitLabel.trim() !== "") {
    return explicitLabel;
  }
  return path.basename(path.resolve(sourceRoot));
}

/**
 * Collects processed units into per-index slots so the finished manifest
 * follows traversal order no matter which worker completes first. The size
 * budget is enforced on every placement.
 */
export class ManifestBuilder {
  private readonly slots: (ProcessedUnit | undefined)[];
  private readonly label: string;
  private readonly maxSizeBytes: number | null;
  private runningBytes = 0;
  private finalized = false;

  constructor(options: ManifestBuilderOptions) {
    this.slots = new Array<ProcessedUnit | undefined>(options.slots).fill(undefined);
    this.label = options.label;
    this.maxSizeBytes = options.maxSizeBytes;
  }

  get totalBytes(): number {
    return this.runningBytes;
  }

  place(index: number, unit: ProcessedUnit): void {
    if (this.finalized) {
      throw new Error("Manifest is already finalized.");
    }
    if (!Number.isInteger(index) || index < 0 || index >= this.slots.length) {
      throw new RangeError(`Slot ${index.toString()} is out of range.`);
    }
    if (this.slots[index] !== undefined) {
      throw new Error(`Slot ${index.toString()} is already filled.`);
    }

    const nextTotal = this.runningBytes + unit.payload.length;
    if (this.maxSizeBytes !== null && nextTotal > this.maxSizeBytes) {
      throw new SizeLimitExceededError(this.maxSizeBytes, nextTotal, {
        file: unit.entry.relativePath,
      });
    }

    this.slots[index] = unit;
    this.runningBytes = nextTotal;
  }

  finalize(): BuildManifest {
    this.finalized = true;
    const units = this.slots.filter((unit): unit is ProcessedUnit => unit !== undefined);
    const totalBytes = units.reduce((sum, unit) => sum + unit.payload.length, 0);
    return Object.freeze({
      units: Object.freeze(units),
      totalBytes,
      label: this.label,
    });
  }
}
