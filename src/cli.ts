#!/usr/bin/env node

import { Command } from "commander";
import type { OptionValues } from "commander";
import chalk from "chalk";
import * as fs from "fs";
import { fileURLToPath } from "url";
import { loadConfig, parseIntegerOption, resolveBuildConfig } from "./config.js";
import type { IsobuildConfig } from "./config.js";
import { EXIT_CONFIGURATION, errorMessage, isBuildError } from "./errors.js";
import { runIsobuild } from "./runner.js";
import { isRecord } from "./shared.js";

function readPackageVersion(): string {
  const packageJsonPath = fileURLToPath(new URL("../package.json", import.meta.url));
  const parsed: unknown = JSON.parse(fs.readFileSync(packageJsonPath, "utf-8"));
  if (isRecord(parsed) && typeof parsed.version === "string") {
    return parsed.version;
  }
  return "0.0.0";
}

function stringOption(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function flagOption(value: unknown): boolean | undefined {
  return value === true ? true : undefined;
}

/** Only flags the user actually gave; everything else falls through to the config file. */
export function toCliOverrides(opts: OptionValues): IsobuildConfig {
  const concurrency = stringOption(opts.concurrency);
  return {
    source: stringOption(opts.source),
    output: stringOption(opts.output),
    label: stringOption(opts.label),
    verbose: flagOption(opts.verbose),
    quiet: flagOption(opts.quiet),
    json: flagOption(opts.json),
    includeHidden: flagOption(opts.includeHidden),
    include: stringOption(opts.include),
    exclude: stringOption(opts.exclude),
    compress: flagOption(opts.compress),
    compressionMethod: stringOption(opts.compressionMethod),
    wrap: stringOption(opts.wrap),
    checksum: stringOption(opts.checksum),
    maxSize: stringOption(opts.maxSize),
    maxFileSize: stringOption(opts.maxFileSize),
    dryRun: flagOption(opts.dryRun),
    email: stringOption(opts.email),
    concurrency:
      concurrency === undefined ? undefined : parseIntegerOption(concurrency, "concurrency"),
    failFast: flagOption(opts.failFast),
    isoTool: stringOption(opts.isoTool),
  };
}

export function createProgram(version: string): Command {
  return new Command()
    .name("isobuild")
    .description("Build ISO-9660 disc images from a directory tree")
    .version(version)
    .option("-s, --source <dir>", "Source directory to image")
    .option("-o, --output <path>", "Output image path (.iso)")
    .option("-l, --label <label>", "Volume label (default: source directory name)")
    .option("-v, --verbose", "Show per-file checksums and extra detail")
    .option("-q, --quiet", "Suppress per-file output")
    .option("--json", "Print the run report as JSON")
    .option("--include-hidden", "Include dot-named files")
    .option("-i, --include <extensions>", "Only include these extensions (comma-separated)")
    .option("-e, --exclude <names>", "Skip these names, paths or globs (comma-separated)")
    .option("--compress", "Compress each file before it is added to the image")
    .option("--compression-method <method>", "zip, tar.gz, gzip, deflate or brotli (default: zip)")
    .option("--wrap <format>", "Also write the finished image wrapped as gzip or brotli")
    .option("--checksum <algorithm>", "sha256, sha1 or md5 (default: sha256)")
    .option("--max-size <size>", "Image size budget, e.g. 700M or 4.7G")
    .option("--max-file-size <size>", "Skip files larger than this, with a warning")
    .option("--dry-run", "Plan the image without writing anything")
    .option("--email <address>", "Send the outcome to this address")
    .option("--concurrency <number>", "Files processed in parallel (1-64)")
    .option("--fail-fast", "Stop at the first unreadable file")
    .option("--iso-tool <command>", "mkisofs-compatible authoring tool (default: xorriso)")
    .option("--config <path>", "Path to a JSON config file");
}

export async function main(argv: string[] = process.argv): Promise<number> {
  const version = readPackageVersion();
  const program = createProgram(version);
  await program.parseAsync(argv);
  const opts = program.opts();

  let json = opts.json === true;
  try {
    const cwd = process.cwd();
    const loaded = loadConfig(cwd, stringOption(opts.config));
    const config = resolveBuildConfig(toCliOverrides(opts), loaded.config, cwd);
    json = config.json;

    const result = await runIsobuild(config, { version, commandName: "isobuild" });
    if (json) {
      console.log(JSON.stringify(result.report, null, 2));
    }
    return result.exitCode;
  } catch (err) {
    if (!isBuildError(err)) {
      throw err;
    }
    if (json) {
      console.log(JSON.stringify({ version, errors: [{ code: err.code, message: err.message }] }, null, 2));
    } else {
      console.error(chalk.red(err.message));
    }
    return err.exitCode;
  }
}

function isEntryPoint(): boolean {
  const invoked = process.argv[1];
  if (!invoked || !fs.existsSync(invoked)) return false;
  return fs.realpathSync(invoked) === fs.realpathSync(fileURLToPath(import.meta.url));
}

if (isEntryPoint()) {
  main().then(
    (exitCode) => {
      process.exitCode = exitCode;
    },
    (err: unknown) => {
      console.error(chalk.red(`Unexpected error: ${errorMessage(err)}`));
      process.exitCode = EXIT_CONFIGURATION;
    }
  );
}
