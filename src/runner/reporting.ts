import chalk from "chalk";
import * as path from "path";
import { DEFAULT_ISO_TOOL } from "../author.js";
import type { BuildConfig } from "../config.js";
import { toPosix } from "../shared.js";

export interface Logger {
  /** Banner and summary lines; stdout. */
  info(message: string): void;
  /** Only with --verbose. */
  detail(message: string): void;
  /** One line per processed file; errors always shown, the rest hidden by --quiet. */
  perFile(message: string, isError?: boolean): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  json: boolean;
  quiet: boolean;
  verbose: boolean;
}

export interface LogSink {
  out: (message: string) => void;
  err: (message: string) => void;
}

const consoleSink: LogSink = {
  out: (message) => {
    console.log(message);
  },
  err: (message) => {
    console.error(message);
  },
};

export function createConsoleLogger(options: LoggerOptions, sink: LogSink = consoleSink): Logger {
  return {
    info(message) {
      if (!options.json) sink.out(message);
    },
    detail(message) {
      if (options.verbose && !options.json) sink.out(chalk.dim(message));
    },
    perFile(message, isError = false) {
      if (options.json) return;
      if (isError) {
        sink.err(message);
        return;
      }
      if (!options.quiet) sink.out(message);
    },
    warn(message) {
      if (!options.json) sink.err(chalk.yellow(`Warning: ${message}`));
    },
    error(message) {
      if (!options.json) sink.err(chalk.red(message));
    },
  };
}

export const silentLogger: Logger = {
  info: () => undefined,
  detail: () => undefined,
  perFile: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export function sanitizeForTerminal(value: string): string {
  let sanitized = "";
  for (const char of value) {
    if (char === "\n") {
      sanitized += "\\n";
      continue;
    }
    if (char === "\r") {
      sanitized += "\\r";
      continue;
    }
    if (char === "\t") {
      sanitized += "\\t";
      continue;
    }

    const code = char.charCodeAt(0);
    if (code < 0x20 || (code >= 0x7f && code <= 0x9f)) {
      sanitized += `\\x${code.toString(16).padStart(2, "0")}`;
      continue;
    }

    sanitized += char;
  }
  return sanitized;
}

export function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes.toString()}B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)}KB`;
  if (bytes < 1024 * 1024 * 1024) return `${(bytes / (1024 * 1024)).toFixed(1)}MB`;
  return `${(bytes / (1024 * 1024 * 1024)).toFixed(2)}GB`;
}

function shellQuote(value: string): string {
  if (/^[A-Za-z0-9_.,/:@-]+$/.test(value)) return value;
  return `"${value.replace(/(["\\$`])/g, "\\$1")}"`;
}

export function displayPath(targetPath: string): string {
  const relative = path.relative(process.cwd(), targetPath);
  if (relative !== "" && !relative.startsWith("..") && !path.isAbsolute(relative)) {
    return toPosix(relative);
  }
  return toPosix(targetPath);
}

/** The command that performs for real what a dry run just planned. */
export function buildRerunCommand(config: BuildConfig, commandName = "isobuild"): string {
  const command: string[] = [
    commandName,
    "--source",
    displayPath(config.sourceDir),
    "--output",
    displayPath(config.outputPath),
    "--label",
    config.label,
    "--checksum",
    config.checksumAlgorithm,
    "--concurrency",
    config.concurrency.toString(),
  ];

  if (config.filters.includeHidden) command.push("--include-hidden");
  if (config.filters.includeExtensions.size > 0) {
    command.push("--include", [...config.filters.includeExtensions].join(","));
  }
  if (config.filters.excludeNames.size > 0) {
    command.push("--exclude", [...config.filters.excludeNames].join(","));
  }
  if (config.compression) {
    command.push("--compress", "--compression-method", config.compression);
  }
  if (config.wrap) command.push("--wrap", config.wrap);
  if (config.maxSizeBytes !== null) command.push("--max-size", config.maxSizeBytes.toString());
  if (config.maxFileSizeBytes !== null) {
    command.push("--max-file-size", config.maxFileSizeBytes.toString());
  }
  if (config.failFast) command.push("--fail-fast");
  if (config.isoTool !== DEFAULT_ISO_TOOL) command.push("--iso-tool", config.isoTool);
  if (config.email) command.push("--email", config.email);

  return command.map(shellQuote).join(" ");
}
