import chalk from "chalk";
import { archivePathFor, assembleImage } from "./assembler.js";
import { MkisofsImageAuthor, resolveIsoTool } from "./author.js";
import type { ImageAuthor } from "./author.js";
import type { BuildConfig } from "./config.js";
import {
  ConfigurationError,
  EXIT_IMAGE_WRITE,
  EXIT_SUCCESS,
  FilesystemError,
  isBuildError,
  toErrorRecord,
} from "./errors.js";
import type { BuildError, BuildErrorRecord } from "./errors.js";
import { ManifestBuilder } from "./manifest.js";
import { createSmtpNotifier, dispatchNotification, smtpSettingsFromEnv } from "./notifier.js";
import type { Notifier } from "./notifier.js";
import { checkDiskSpace, estimateImageBytes, findPathCollisions } from "./runner/preflight.js";
import type { PreflightIssue } from "./runner/preflight.js";
import { processCandidates } from "./runner/pool.js";
import {
  buildRerunCommand,
  createConsoleLogger,
  displayPath,
  formatSize,
  sanitizeForTerminal,
} from "./runner/reporting.js";
import type { Logger } from "./runner/reporting.js";
import { collectCandidates } from "./traversal.js";
import type { BuildManifest, BuildOutcome, ContainerWrap, PayloadEncoding } from "./types.js";

export interface RunDependencies {
  version?: string;
  commandName?: string;
  logger?: Logger;
  /** Defaults to the mkisofs-compatible tool named by `config.isoTool`. */
  createAuthor?: () => ImageAuthor;
  /** Defaults to SMTP configured from the environment. */
  notifier?: Notifier;
}

export interface RunEntryReport {
  file: string;
  sizeBytes: number;
  payloadBytes: number;
  checksum: string;
  compression: PayloadEncoding;
}

export interface RunSummary {
  candidates: number;
  included: number;
  failed: number;
  warnings: number;
  sourceBytes: number;
  payloadBytes: number;
  durationMs: number;
}

export interface RunNotificationReport {
  recipient: string;
  delivered: boolean;
  error: BuildErrorRecord | null;
}

export interface RunReport {
  version: string;
  dryRun: boolean;
  sourceDir: string;
  outputPath: string;
  label: string;
  options: {
    includeExtensions: string[];
    excludeNames: string[];
    includeHidden: boolean;
    compression: BuildConfig["compression"];
    wrap: ContainerWrap | null;
    checksum: BuildConfig["checksumAlgorithm"];
    maxSizeBytes: number | null;
    maxFileSizeBytes: number | null;
    concurrency: number;
    failFast: boolean;
    isoTool: string;
  };
  summary: RunSummary;
  rerunCommand: string | null;
  entries: RunEntryReport[];
  outcome: BuildOutcome;
  notification: RunNotificationReport | null;
}

export interface RunResult {
  exitCode: number;
  report: RunReport;
  /** `null` when the run stopped before the manifest was complete. */
  manifest: BuildManifest | null;
  outcome: BuildOutcome;
}

function createInitialOutcome(config: BuildConfig): BuildOutcome {
  return {
    success: false,
    outputPath: config.outputPath,
    bytesWritten: 0,
    dryRun: config.dryRun,
    errors: [],
    elapsedMs: 0,
    label: null,
    entryCount: 0,
    totalBytes: 0,
    imageChecksum: null,
    archivePath: null,
  };
}

function createInitialReport(config: BuildConfig, version: string): RunReport {
  return {
    version,
    dryRun: config.dryRun,
    sourceDir: config.sourceDir,
    outputPath: config.outputPath,
    label: config.label,
    options: {
      includeExtensions: [...config.filters.includeExtensions],
      excludeNames: [...config.filters.excludeNames],
      includeHidden: config.filters.includeHidden,
      compression: config.compression,
      wrap: config.wrap,
      checksum: config.checksumAlgorithm,
      maxSizeBytes: config.maxSizeBytes,
      maxFileSizeBytes: config.maxFileSizeBytes,
      concurrency: config.concurrency,
      failFast: config.failFast,
      isoTool: config.isoTool,
    },
    summary: {
      candidates: 0,
      included: 0,
      failed: 0,
      warnings: 0,
      sourceBytes: 0,
      payloadBytes: 0,
      durationMs: 0,
    },
    rerunCommand: null,
    entries: [],
    outcome: createInitialOutcome(config),
    notification: null,
  };
}

function defaultAuthorFactory(config: BuildConfig): () => ImageAuthor {
  return () => new MkisofsImageAuthor(resolveIsoTool(config.isoTool));
}

function printIssue(logger: Logger, issue: PreflightIssue): void {
  logger.error(`\n${issue.message}`);
  for (const line of issue.details) {
    logger.error(line);
  }
}

function describePayload(entrySize: number, payloadSize: number, encoding: PayloadEncoding): string {
  if (encoding === "none") return formatSize(entrySize);
  return `${formatSize(entrySize)} → ${formatSize(payloadSize)} ${encoding}`;
}

function printSummary(logger: Logger, config: BuildConfig, report: RunReport): void {
  const { outcome, summary } = report;
  const duration = (summary.durationMs / 1000).toFixed(1);

  logger.info(chalk.dim("\n" + "─".repeat(50)));
  if (config.dryRun) {
    logger.info(`\nDry run complete in ${chalk.bold(`${duration}s`)}`);
  } else {
    logger.info(`\nDone in ${chalk.bold(`${duration}s`)}`);
  }
  logger.info(
    `  ${chalk.green(summary.included.toString())} included${summary.failed > 0 ? `, ${chalk.red(summary.failed.toString())} failed` : ""}${summary.warnings > 0 ? `, ${chalk.yellow(summary.warnings.toString())} skipped` : ""}`
  );
  logger.info(
    `  Payload: ${formatSize(summary.payloadBytes)}  Label: ${chalk.cyan(outcome.label ?? config.label)}`
  );
  if (config.dryRun) {
    logger.info(`  Would write: ${chalk.cyan(displayPath(config.outputPath))}`);
    if (report.rerunCommand) {
      logger.info(chalk.dim(`  Run: ${report.rerunCommand}`));
    }
    logger.info("");
    return;
  }
  logger.info(
    `  Image: ${chalk.cyan(displayPath(outcome.outputPath))} (${formatSize(outcome.bytesWritten)})`
  );
  if (outcome.imageChecksum) {
    logger.info(`  ${config.checksumAlgorithm}: ${outcome.imageChecksum}`);
  }
  if (outcome.archivePath) {
    logger.info(`  Archive: ${chalk.cyan(displayPath(outcome.archivePath))}`);
  }
  logger.info("");
}

/**
 * One complete build: traverse, check, process, assemble, notify. Never
 * throws for build failures; the exit code and report describe them.
 */
export async function runIsobuild(
  config: BuildConfig,
  dependencies: RunDependencies = {}
): Promise<RunResult> {
  const startTime = Date.now();
  const version = dependencies.version ?? "0.0.0";
  const logger = dependencies.logger ?? createConsoleLogger(config);
  const report = createInitialReport(config, version);
  const warnings: BuildError[] = [];
  let failures: BuildError[] = [];
  let manifest: BuildManifest | null = null;
  let outcome = createInitialOutcome(config);
  let exitCode = EXIT_SUCCESS;

  logger.info(chalk.bold(`\nisobuild v${version}\n`));
  logger.detail(`Source: ${config.sourceDir}`);
  logger.detail(`Output: ${config.outputPath}`);
  logger.detail(`Dry run: ${config.dryRun ? "yes" : "no"}`);

  try {
    const ignorePaths = [config.outputPath];
    if (config.wrap) {
      ignorePaths.push(archivePathFor(config.outputPath, config.wrap));
    }

    const candidates = collectCandidates(config.sourceDir, config.filters, {
      failFast: config.failFast,
      ignorePaths,
      maxFileSizeBytes: config.maxFileSizeBytes,
      onError: (error) => {
        warnings.push(error);
        logger.warn(sanitizeForTerminal(error.message));
      },
    });
    report.summary.candidates = candidates.length;
    report.summary.sourceBytes = estimateImageBytes(candidates);

    if (candidates.length === 0) {
      logger.info(chalk.yellow(`No files matched in ${config.sourceDir}`));
    }

    logger.info(
      `${config.dryRun ? "Planning" : "Building"} ${chalk.cyan(candidates.length.toString())} files from ${chalk.dim(config.sourceDir)}`
    );
    logger.info(
      `Checksum: ${chalk.cyan(config.checksumAlgorithm)}  Compression: ${config.compression ? chalk.cyan(config.compression) : chalk.dim("off")}  Concurrency: ${chalk.cyan(config.concurrency.toString())}\n`
    );

    const collision = findPathCollisions(candidates);
    if (collision) {
      printIssue(logger, collision);
      throw new ConfigurationError(collision.summary, "PATH_COLLISION");
    }

    if (!config.dryRun) {
      const spaceIssue = await checkDiskSpace(config.outputPath, report.summary.sourceBytes);
      if (spaceIssue) {
        printIssue(logger, spaceIssue);
        throw new FilesystemError(spaceIssue.summary, "INSUFFICIENT_SPACE", { fatal: true });
      }
    }

    const builder = new ManifestBuilder({
      label: config.label,
      maxSizeBytes: config.maxSizeBytes,
      slots: candidates.length,
    });
    const total = candidates.length.toString();
    const pool = await processCandidates(
      candidates,
      {
        checksumAlgorithm: config.checksumAlgorithm,
        compression: config.compression,
        concurrency: config.concurrency,
        failFast: config.failFast,
      },
      builder,
      {
        onUnit: (unit, _index, completed) => {
          const progress = `[${completed.toString()}/${total}]`;
          logger.perFile(
            `  ${chalk.dim(progress)} ${chalk.green("✓")} ${sanitizeForTerminal(unit.entry.relativePath)} ${chalk.dim(`(${describePayload(unit.entry.sizeBytes, unit.payload.length, unit.compressionMethod)})`)}`
          );
          logger.detail(`    ${unit.checksumAlgorithm}=${unit.checksumDigest}`);
        },
        onFailure: (error, _index, completed) => {
          const progress = `[${completed.toString()}/${total}]`;
          logger.perFile(
            `  ${chalk.dim(progress)} ${chalk.red("✗")} ${sanitizeForTerminal(error.file ?? "")} — ${chalk.red(sanitizeForTerminal(error.message))}`,
            true
          );
        },
      }
    );
    manifest = pool.manifest;
    failures = pool.failures;

    for (const unit of manifest.units) {
      report.entries.push({
        file: unit.entry.relativePath,
        sizeBytes: unit.entry.sizeBytes,
        payloadBytes: unit.payload.length,
        checksum: unit.checksumDigest,
        compression: unit.compressionMethod,
      });
    }

    outcome = await assembleImage(manifest, {
      outputPath: config.outputPath,
      dryRun: config.dryRun,
      checksumAlgorithm: config.checksumAlgorithm,
      wrap: config.wrap,
      createAuthor: dependencies.createAuthor ?? defaultAuthorFactory(config),
    });
    if (!outcome.success) {
      exitCode = EXIT_IMAGE_WRITE;
      for (const record of outcome.errors) {
        logger.error(sanitizeForTerminal(record.message));
      }
    }
  } catch (err) {
    if (!isBuildError(err)) {
      throw err;
    }
    manifest = null;
    outcome = createInitialOutcome(config);
    outcome.errors.push(toErrorRecord(err));
    exitCode = err.exitCode;
    logger.error(sanitizeForTerminal(err.message));
  }

  outcome.errors = [
    ...warnings.map(toErrorRecord),
    ...failures.map(toErrorRecord),
    ...outcome.errors,
  ];
  outcome.elapsedMs = Date.now() - startTime;

  report.summary.included = manifest ? manifest.units.length : 0;
  report.summary.failed = failures.length;
  report.summary.warnings = warnings.length;
  report.summary.payloadBytes = manifest ? manifest.totalBytes : 0;
  report.summary.durationMs = outcome.elapsedMs;
  report.outcome = outcome;
  if (!manifest) {
    report.entries = [];
  }

  if (outcome.success) {
    if (config.dryRun) {
      report.rerunCommand = buildRerunCommand(config, dependencies.commandName);
    }
    printSummary(logger, config, report);
  }

  if (config.email) {
    const notifier = dependencies.notifier ?? createSmtpNotifier(smtpSettingsFromEnv());
    const notificationError = await dispatchNotification(outcome, config.email, notifier, logger);
    report.notification = {
      recipient: config.email,
      delivered: notificationError === null,
      error: notificationError ? toErrorRecord(notificationError) : null,
    };
  }

  return { exitCode, report, manifest, outcome };
}
