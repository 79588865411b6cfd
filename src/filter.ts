import { compileGlob, isGlobPattern, normalizeRelativePattern } from "./glob.js";
import type { FilterSet, SourceEntry } from "./types.js";

export interface FilterSetInput {
  includeExtensions?: Iterable<string>;
  excludeNames?: Iterable<string>;
  includeHidden?: boolean;
}

export function normalizeExtension(value: string): string {
  const trimmed = value.trim().toLowerCase();
  if (trimmed === "") return "";
  return trimmed.startsWith(".") ? trimmed : `.${trimmed}`;
}

export function createFilterSet(input: FilterSetInput = {}): FilterSet {
  const includeExtensions = new Set<string>();
  for (const extension of input.includeExtensions ?? []) {
    const normalized = normalizeExtension(extension);
    if (normalized !== "") includeExtensions.add(normalized);
  }

  const excludeNames = new Set<string>();
  const excludeGlobs = new Map<string, RegExp>();
  for (const name of input.excludeNames ?? []) {
    const normalized = normalizeRelativePattern(name);
    if (normalized === "") continue;
    excludeNames.add(normalized);
    if (isGlobPattern(normalized)) excludeGlobs.set(normalized, compileGlob(normalized));
  }

  return Object.freeze({
    includeExtensions,
    excludeNames,
    excludeGlobs,
    includeHidden: input.includeHidden ?? false,
  });
}

/** "a/b/c" -> ["a", "a/b", "a/b/c"] */
function ancestorPaths(segments: readonly string[]): string[] {
  const prefixes: string[] = [];
  for (let index = 0; index < segments.length; index += 1) {
    prefixes.push(segments.slice(0, index + 1).join("/"));
  }
  return prefixes;
}

function isExcludedByName(relativePath: string, filterSet: FilterSet): boolean {
  if (filterSet.excludeNames.size === 0) return false;
  const segments = relativePath.split("/");

  for (const name of filterSet.excludeNames) {
    const pattern = filterSet.excludeGlobs.get(name);
    if (pattern) {
      if (segments.some((segment) => pattern.test(segment))) return true;
      if (ancestorPaths(segments).some((prefix) => pattern.test(prefix))) return true;
      continue;
    }

    if (relativePath.startsWith(name)) return true;
    if (segments.some((segment) => segment.startsWith(name))) return true;
  }
  return false;
}

/**
 * Decides whether a traversed file belongs in the image. Rules are checked in
 * order and the first one that applies wins: hidden, excluded name, extension.
 */
export function matches(entry: SourceEntry, filterSet: FilterSet): boolean {
  if (entry.isHidden && !filterSet.includeHidden) return false;
  if (isExcludedByName(entry.relativePath, filterSet)) return false;
  if (filterSet.includeExtensions.size > 0 && !filterSet.includeExtensions.has(entry.extension)) {
    return false;
  }
  return true;
}

/**
 * Whether traversal can skip a directory and everything below it. Only
 * exclude names prune; a dot directory is still walked and its files are
 * judged by their own names.
 */
export function isExcludedDirectory(relativePath: string, filterSet: FilterSet): boolean {
  return isExcludedByName(relativePath, filterSet);
}
