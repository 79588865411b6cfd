import * as fs from "fs";
import * as path from "path";
import { DEFAULT_ISO_TOOL } from "./author.js";
import { ConfigurationError } from "./errors.js";
import { createFilterSet } from "./filter.js";
import { resolveLabel } from "./manifest.js";
import { CHECKSUM_ALGORITHMS, COMPRESSION_METHODS, getDefaultConcurrency } from "./processor.js";
import { isRecord } from "./shared.js";
import type {
  ChecksumAlgorithm,
  CompressionMethod,
  ContainerWrap,
  FilterSet,
} from "./types.js";

/** Raw settings as written in a config file or given on the command line. */
export interface IsobuildConfig {
  source?: string;
  output?: string;
  label?: string;
  verbose?: boolean;
  quiet?: boolean;
  json?: boolean;
  includeHidden?: boolean;
  include?: string | string[];
  exclude?: string | string[];
  compress?: boolean;
  compressionMethod?: string;
  wrap?: string;
  checksum?: string;
  maxSize?: string | number;
  maxFileSize?: string | number;
  dryRun?: boolean;
  email?: string;
  concurrency?: number;
  failFast?: boolean;
  isoTool?: string;
}

export interface LoadedConfig {
  config: IsobuildConfig;
  sourcePath: string | null;
}

/** Fully validated settings for one run. Frozen; never mutated after start. */
export interface BuildConfig {
  readonly sourceDir: string;
  readonly outputPath: string;
  readonly label: string;
  readonly verbose: boolean;
  readonly quiet: boolean;
  readonly json: boolean;
  readonly filters: FilterSet;
  readonly compression: CompressionMethod | null;
  readonly wrap: ContainerWrap | null;
  readonly checksumAlgorithm: ChecksumAlgorithm;
  readonly maxSizeBytes: number | null;
  readonly maxFileSizeBytes: number | null;
  readonly dryRun: boolean;
  readonly email: string | null;
  readonly concurrency: number;
  readonly failFast: boolean;
  readonly isoTool: string;
}

export const CONFIG_FILE = "isobuild.config.json";
export const IMAGE_EXTENSION = ".iso";
export const MAX_CONCURRENCY = 64;
export const DEFAULT_CHECKSUM: ChecksumAlgorithm = "sha256";
export const DEFAULT_COMPRESSION: CompressionMethod = "zip";
export const CONTAINER_WRAPS: readonly ContainerWrap[] = ["gzip", "brotli"];

const ALLOWED_KEYS = new Set<string>([
  "source",
  "output",
  "label",
  "verbose",
  "quiet",
  "json",
  "includeHidden",
  "include",
  "exclude",
  "compress",
  "compressionMethod",
  "wrap",
  "checksum",
  "maxSize",
  "maxFileSize",
  "dryRun",
  "email",
  "concurrency",
  "failFast",
  "isoTool",
]);

const BYTE_UNITS: Record<string, number> = {
  "": 1,
  b: 1,
  k: 1024,
  kb: 1024,
  kib: 1024,
  m: 1024 ** 2,
  mb: 1024 ** 2,
  mib: 1024 ** 2,
  g: 1024 ** 3,
  gb: 1024 ** 3,
  gib: 1024 ** 3,
  t: 1024 ** 4,
  tb: 1024 ** 4,
  tib: 1024 ** 4,
};

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/u;

function parseString(
  value: unknown,
  key: keyof IsobuildConfig,
  sourcePath: string
): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "string") {
    throw new ConfigurationError(`Invalid "${key}" in ${sourcePath}: expected string.`);
  }
  return value;
}

function parseNumber(
  value: unknown,
  key: keyof IsobuildConfig,
  sourcePath: string
): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ConfigurationError(`Invalid "${key}" in ${sourcePath}: expected number.`);
  }
  return value;
}

function parseBoolean(
  value: unknown,
  key: keyof IsobuildConfig,
  sourcePath: string
): boolean | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "boolean") {
    throw new ConfigurationError(`Invalid "${key}" in ${sourcePath}: expected boolean.`);
  }
  return value;
}

function parseStringList(
  value: unknown,
  key: keyof IsobuildConfig,
  sourcePath: string
): string | string[] | undefined {
  if (value === undefined) return undefined;
  if (typeof value === "string") return value;
  if (!Array.isArray(value)) {
    throw new ConfigurationError(
      `Invalid "${key}" in ${sourcePath}: expected string or string array.`
    );
  }
  const entries: string[] = [];
  for (const entry of value) {
    if (typeof entry !== "string") {
      throw new ConfigurationError(
        `Invalid "${key}" in ${sourcePath}: array must contain only strings.`
      );
    }
    entries.push(entry);
  }
  return entries;
}

function parseSize(
  value: unknown,
  key: keyof IsobuildConfig,
  sourcePath: string
): string | number | undefined {
  if (value === undefined) return undefined;
  if (typeof value === "string") return value;
  return parseNumber(value, key, sourcePath);
}

function parseConfig(value: unknown, sourcePath: string): IsobuildConfig {
  if (!isRecord(value)) {
    throw new ConfigurationError(`Invalid config in ${sourcePath}: expected a JSON object.`);
  }

  for (const key of Object.keys(value)) {
    if (!ALLOWED_KEYS.has(key)) {
      throw new ConfigurationError(`Unknown config key "${key}" in ${sourcePath}.`);
    }
  }

  return {
    source: parseString(value.source, "source", sourcePath),
    output: parseString(value.output, "output", sourcePath),
    label: parseString(value.label, "label", sourcePath),
    verbose: parseBoolean(value.verbose, "verbose", sourcePath),
    quiet: parseBoolean(value.quiet, "quiet", sourcePath),
    json: parseBoolean(value.json, "json", sourcePath),
    includeHidden: parseBoolean(value.includeHidden, "includeHidden", sourcePath),
    include: parseStringList(value.include, "include", sourcePath),
    exclude: parseStringList(value.exclude, "exclude", sourcePath),
    compress: parseBoolean(value.compress, "compress", sourcePath),
    compressionMethod: parseString(value.compressionMethod, "compressionMethod", sourcePath),
    wrap: parseString(value.wrap, "wrap", sourcePath),
    checksum: parseString(value.checksum, "checksum", sourcePath),
    maxSize: parseSize(value.maxSize, "maxSize", sourcePath),
    maxFileSize: parseSize(value.maxFileSize, "maxFileSize", sourcePath),
    dryRun: parseBoolean(value.dryRun, "dryRun", sourcePath),
    email: parseString(value.email, "email", sourcePath),
    concurrency: parseNumber(value.concurrency, "concurrency", sourcePath),
    failFast: parseBoolean(value.failFast, "failFast", sourcePath),
    isoTool: parseString(value.isoTool, "isoTool", sourcePath),
  };
}

function readJsonFile(filePath: string): unknown {
  try {
    const raw = fs.readFileSync(filePath, "utf-8");
    return JSON.parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : "unknown error";
    throw new ConfigurationError(`Failed to read config file ${filePath}: ${message}`);
  }
}

export function loadConfig(cwd: string, explicitConfigPath?: string): LoadedConfig {
  if (explicitConfigPath) {
    const configPath = path.resolve(cwd, explicitConfigPath);
    if (!fs.existsSync(configPath)) {
      throw new ConfigurationError(`Config file not found: ${configPath}`);
    }
    return {
      config: parseConfig(readJsonFile(configPath), configPath),
      sourcePath: configPath,
    };
  }

  const configJsonPath = path.join(cwd, CONFIG_FILE);
  if (fs.existsSync(configJsonPath)) {
    return {
      config: parseConfig(readJsonFile(configJsonPath), configJsonPath),
      sourcePath: configJsonPath,
    };
  }

  const packageJsonPath = path.join(cwd, "package.json");
  if (fs.existsSync(packageJsonPath)) {
    const packageJson = readJsonFile(packageJsonPath);
    if (isRecord(packageJson) && packageJson.isobuild !== undefined) {
      return {
        config: parseConfig(packageJson.isobuild, `${packageJsonPath}#isobuild`),
        sourcePath: `${packageJsonPath}#isobuild`,
      };
    }
  }

  return {
    config: {},
    sourcePath: null,
  };
}

/** Accepts plain byte counts and binary-unit suffixes: 700M, 4.7G, 512KiB. */
export function parseByteSize(value: string | number, label: string): number {
  if (typeof value === "number") {
    if (!Number.isInteger(value) || value < 1) {
      throw new ConfigurationError(`Invalid ${label}: "${value.toString()}". Must be a positive integer.`);
    }
    return value;
  }

  const match = /^\s*(\d+(?:\.\d+)?)\s*([a-z]*)\s*$/iu.exec(value);
  const multiplier = match ? BYTE_UNITS[match[2].toLowerCase()] : undefined;
  if (!match || multiplier === undefined) {
    throw new ConfigurationError(
      `Invalid ${label}: "${value}". Use a byte count or a K/M/G/T suffix (e.g. 700M).`
    );
  }

  const bytes = Math.floor(Number.parseFloat(match[1]) * multiplier);
  if (!Number.isSafeInteger(bytes) || bytes < 1) {
    throw new ConfigurationError(`Invalid ${label}: "${value}". Must be at least 1 byte.`);
  }
  return bytes;
}

export function parseIntegerOption(raw: string, label: string): number {
  const trimmed = raw.trim();
  if (!/^-?\d+$/u.test(trimmed)) {
    throw new ConfigurationError(`Invalid ${label}: "${raw}". Must be an integer.`);
  }
  return Number.parseInt(trimmed, 10);
}

export function splitList(value: string | string[] | undefined): string[] {
  if (value === undefined) return [];
  const parts = Array.isArray(value) ? value : value.split(",");
  return parts.map((part) => part.trim()).filter(Boolean);
}

function parseChoice<T extends string>(
  value: string | undefined,
  choices: readonly T[],
  fallback: T,
  label: string
): T {
  if (value === undefined) return fallback;
  const normalized = value.trim().toLowerCase();
  const match = choices.find((choice) => choice === normalized);
  if (match === undefined) {
    throw new ConfigurationError(
      `Invalid ${label}: "${value}". Valid: ${choices.join(", ")}.`
    );
  }
  return match;
}

function resolveSourceDir(source: string | undefined, cwd: string): string {
  if (!source || source.trim() === "") {
    throw new ConfigurationError("Missing source directory. Use --source <dir>.", "MISSING_SOURCE");
  }
  const sourceDir = path.resolve(cwd, source);
  let stat: fs.Stats;
  try {
    stat = fs.statSync(sourceDir);
  } catch {
    throw new ConfigurationError(`Directory not found: ${sourceDir}`, "SOURCE_NOT_FOUND");
  }
  if (!stat.isDirectory()) {
    throw new ConfigurationError(`Not a directory: ${sourceDir}`, "SOURCE_NOT_DIRECTORY");
  }
  return sourceDir;
}

function resolveOutputPath(output: string | undefined, cwd: string): string {
  if (!output || output.trim() === "") {
    throw new ConfigurationError("Missing output path. Use --output <file.iso>.", "MISSING_OUTPUT");
  }
  if (!output.toLowerCase().endsWith(IMAGE_EXTENSION)) {
    throw new ConfigurationError(
      `Output file must have a ${IMAGE_EXTENSION} extension: ${output}`,
      "INVALID_OUTPUT"
    );
  }
  const outputPath = path.resolve(cwd, output);
  if (fs.existsSync(outputPath) && fs.statSync(outputPath).isDirectory()) {
    throw new ConfigurationError(`Output path is a directory: ${outputPath}`, "INVALID_OUTPUT");
  }
  return outputPath;
}

function resolveConcurrency(value: number | undefined): number {
  if (value === undefined) return getDefaultConcurrency();
  if (!Number.isInteger(value) || value < 1 || value > MAX_CONCURRENCY) {
    throw new ConfigurationError(
      `Invalid concurrency: "${value.toString()}". Must be an integer between 1 and ${MAX_CONCURRENCY.toString()}.`
    );
  }
  return value;
}

/**
 * Merges file settings with command-line overrides (CLI wins) and validates
 * the result into one immutable `BuildConfig`.
 */
export function resolveBuildConfig(
  cli: IsobuildConfig,
  file: IsobuildConfig,
  cwd: string
): BuildConfig {
  const merged: IsobuildConfig = { ...file };
  for (const [key, value] of Object.entries(cli)) {
    if (value !== undefined) {
      Object.assign(merged, { [key]: value });
    }
  }

  const verbose = merged.verbose ?? false;
  const quiet = merged.quiet ?? false;
  if (verbose && quiet) {
    throw new ConfigurationError("Cannot combine --verbose and --quiet.");
  }

  const sourceDir = resolveSourceDir(merged.source, cwd);
  const outputPath = resolveOutputPath(merged.output, cwd);

  const compressionMethod = parseChoice(
    merged.compressionMethod,
    COMPRESSION_METHODS,
    DEFAULT_COMPRESSION,
    "compression method"
  );
  const wrap =
    merged.wrap === undefined ? null : parseChoice(merged.wrap, CONTAINER_WRAPS, "gzip", "wrap format");
  const checksumAlgorithm = parseChoice(
    merged.checksum,
    CHECKSUM_ALGORITHMS,
    DEFAULT_CHECKSUM,
    "checksum algorithm"
  );

  const email = merged.email?.trim() || null;
  if (email !== null && !EMAIL_PATTERN.test(email)) {
    throw new ConfigurationError(`Invalid email address: "${email}".`);
  }

  const label = merged.label?.trim() ?? "";
  const isoTool = merged.isoTool?.trim() || DEFAULT_ISO_TOOL;

  return Object.freeze({
    sourceDir,
    outputPath,
    label: resolveLabel(label === "" ? null : label, sourceDir),
    verbose,
    quiet,
    json: merged.json ?? false,
    filters: createFilterSet({
      includeExtensions: splitList(merged.include),
      excludeNames: splitList(merged.exclude),
      includeHidden: merged.includeHidden ?? false,
    }),
    compression: merged.compress ? compressionMethod : null,
    wrap,
    checksumAlgorithm,
    maxSizeBytes: merged.maxSize === undefined ? null : parseByteSize(merged.maxSize, "max size"),
    maxFileSizeBytes:
      merged.maxFileSize === undefined ? null : parseByteSize(merged.maxFileSize, "max file size"),
    dryRun: merged.dryRun ?? false,
    email,
    concurrency: resolveConcurrency(merged.concurrency),
    failFast: merged.failFast ?? false,
    isoTool,
  });
}
