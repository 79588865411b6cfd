import { afterAll, beforeAll, describe, expect, it } from "vitest";
import * as fs from "fs";
import * as path from "path";
import { fileURLToPath } from "node:url";
import { createProgram, toCliOverrides } from "../src/cli.js";
import { CONFIG_FILE, loadConfig, parseByteSize, resolveBuildConfig } from "../src/config.js";
import type { IsobuildConfig } from "../src/config.js";
import { ConfigurationError } from "../src/errors.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const FIXTURES = path.join(__dirname, "config-fixtures");
const SOURCE = path.join(FIXTURES, "src");

function configError(action: () => unknown): ConfigurationError {
  try {
    action();
  } catch (err) {
    if (err instanceof ConfigurationError) return err;
    throw err;
  }
  throw new Error("expected a ConfigurationError");
}

function resolve(cli: IsobuildConfig, file: IsobuildConfig = {}) {
  return resolveBuildConfig(cli, file, FIXTURES);
}

beforeAll(() => {
  fs.rmSync(FIXTURES, { recursive: true, force: true });
  fs.mkdirSync(SOURCE, { recursive: true });
  fs.writeFileSync(path.join(FIXTURES, "plain.txt"), "not a directory");
  fs.mkdirSync(path.join(FIXTURES, "folder.iso"), { recursive: true });
});

afterAll(() => {
  fs.rmSync(FIXTURES, { recursive: true, force: true });
});

describe("parseByteSize", () => {
  it("accepts byte counts and binary suffixes", () => {
    expect(parseByteSize("1024", "max size")).toBe(1024);
    expect(parseByteSize(2048, "max size")).toBe(2048);
    expect(parseByteSize("1K", "max size")).toBe(1024);
    expect(parseByteSize("512KiB", "max size")).toBe(524288);
    expect(parseByteSize("700M", "max size")).toBe(734003200);
    expect(parseByteSize("4.7G", "max size")).toBe(5046586572);
    expect(parseByteSize("2tb", "max size")).toBe(2 * 1024 ** 4);
  });

  it("rejects malformed and non-positive sizes", () => {
    expect(configError(() => parseByteSize("abc", "max size")).message).toBe(
      'Invalid max size: "abc". Use a byte count or a K/M/G/T suffix (e.g. 700M).'
    );
    expect(configError(() => parseByteSize("0", "max size")).message).toBe(
      'Invalid max size: "0". Must be at least 1 byte.'
    );
    expect(configError(() => parseByteSize(1.5, "max file size")).message).toBe(
      'Invalid max file size: "1.5". Must be a positive integer.'
    );
  });
});

describe("loadConfig", () => {
  const discoveryDir = path.join(FIXTURES, "discovery");

  it("returns an empty config when nothing is found", () => {
    fs.mkdirSync(discoveryDir, { recursive: true });
    expect(loadConfig(discoveryDir)).toEqual({ config: {}, sourcePath: null });
  });

  it("reads the isobuild key of package.json", () => {
    fs.writeFileSync(
      path.join(discoveryDir, "package.json"),
      JSON.stringify({ name: "demo", isobuild: { label: "FROM_PACKAGE", compress: true } })
    );
    const loaded = loadConfig(discoveryDir);
    expect(loaded.sourcePath).toBe(`${path.join(discoveryDir, "package.json")}#isobuild`);
    expect(loaded.config.label).toBe("FROM_PACKAGE");
    expect(loaded.config.compress).toBe(true);
  });

  it("prefers isobuild.config.json over package.json", () => {
    fs.writeFileSync(
      path.join(discoveryDir, CONFIG_FILE),
      JSON.stringify({ label: "FROM_FILE", exclude: ["tmp", "*.log"], maxSize: "700M" })
    );
    const loaded = loadConfig(discoveryDir);
    expect(loaded.sourcePath).toBe(path.join(discoveryDir, CONFIG_FILE));
    expect(loaded.config.label).toBe("FROM_FILE");
    expect(loaded.config.exclude).toEqual(["tmp", "*.log"]);
    expect(loaded.config.maxSize).toBe("700M");
  });

  it("loads an explicit path and reports a missing one", () => {
    const explicit = path.join(FIXTURES, "explicit.json");
    fs.writeFileSync(explicit, JSON.stringify({ concurrency: 2 }));
    expect(loadConfig(FIXTURES, "explicit.json").config.concurrency).toBe(2);

    expect(configError(() => loadConfig(FIXTURES, "absent.json")).message).toBe(
      `Config file not found: ${path.join(FIXTURES, "absent.json")}`
    );
  });

  it("rejects unknown keys and wrong types", () => {
    const unknownKey = path.join(FIXTURES, "unknown.json");
    fs.writeFileSync(unknownKey, JSON.stringify({ formats: ["webp"] }));
    expect(configError(() => loadConfig(FIXTURES, "unknown.json")).message).toBe(
      `Unknown config key "formats" in ${unknownKey}.`
    );

    const wrongType = path.join(FIXTURES, "wrong-type.json");
    fs.writeFileSync(wrongType, JSON.stringify({ compress: "yes" }));
    expect(configError(() => loadConfig(FIXTURES, "wrong-type.json")).message).toBe(
      `Invalid "compress" in ${wrongType}: expected boolean.`
    );

    const notJson = path.join(FIXTURES, "broken.json");
    fs.writeFileSync(notJson, "{ nope");
    expect(configError(() => loadConfig(FIXTURES, "broken.json")).message).toMatch(
      /^Failed to read config file .*broken\.json: /
    );
  });
});

describe("resolveBuildConfig", () => {
  it("merges file settings with CLI overrides", () => {
    const config = resolve(
      {
        source: "src",
        output: "out/disc.iso",
        include: "txt, MD",
        exclude: "tmp",
        compress: true,
        concurrency: 4,
        maxSize: "1K",
      },
      { label: "From File", checksum: "MD5", compress: false, compressionMethod: "brotli" }
    );

    expect(config.sourceDir).toBe(SOURCE);
    expect(config.outputPath).toBe(path.join(FIXTURES, "out", "disc.iso"));
    expect(config.label).toBe("From File");
    expect(config.compression).toBe("brotli");
    expect(config.checksumAlgorithm).toBe("md5");
    expect(config.maxSizeBytes).toBe(1024);
    expect(config.maxFileSizeBytes).toBeNull();
    expect([...config.filters.includeExtensions]).toEqual([".txt", ".md"]);
    expect([...config.filters.excludeNames]).toEqual(["tmp"]);
    expect(config.concurrency).toBe(4);
    expect(config.isoTool).toBe("xorriso");
    expect(config.wrap).toBeNull();
    expect(config.email).toBeNull();
    expect(config.dryRun).toBe(false);
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("defaults the label to the source directory name", () => {
    const config = resolve({ source: "src", output: "disc.iso" });
    expect(config.label).toBe("src");
    expect(config.compression).toBeNull();
    expect(config.checksumAlgorithm).toBe("sha256");
  });

  it("compresses each file as zip unless another method is named", () => {
    expect(resolve({ source: "src", output: "disc.iso", compress: true }).compression).toBe("zip");
    expect(
      resolve({ source: "src", output: "disc.iso", compress: true, compressionMethod: "TAR.GZ" }).compression
    ).toBe("tar.gz");
  });

  it("validates the source directory", () => {
    expect(configError(() => resolve({ output: "disc.iso" })).code).toBe("MISSING_SOURCE");

    const missing = configError(() => resolve({ source: "nowhere", output: "disc.iso" }));
    expect(missing.code).toBe("SOURCE_NOT_FOUND");
    expect(missing.message).toBe(`Directory not found: ${path.join(FIXTURES, "nowhere")}`);
    expect(missing.exitCode).toBe(1);

    expect(configError(() => resolve({ source: "plain.txt", output: "disc.iso" })).code).toBe(
      "SOURCE_NOT_DIRECTORY"
    );
  });

  it("validates the output path", () => {
    expect(configError(() => resolve({ source: "src" })).code).toBe("MISSING_OUTPUT");
    expect(configError(() => resolve({ source: "src", output: "disc.img" })).message).toBe(
      "Output file must have a .iso extension: disc.img"
    );
    expect(configError(() => resolve({ source: "src", output: "folder.iso" })).code).toBe(
      "INVALID_OUTPUT"
    );
  });

  it("rejects invalid choices and values", () => {
    const base = { source: "src", output: "disc.iso" };
    expect(configError(() => resolve({ ...base, checksum: "crc32" })).message).toBe(
      'Invalid checksum algorithm: "crc32". Valid: sha256, sha1, md5.'
    );
    expect(configError(() => resolve({ ...base, compressionMethod: "7z" })).message).toBe(
      'Invalid compression method: "7z". Valid: zip, tar.gz, gzip, deflate, brotli.'
    );
    expect(configError(() => resolve({ ...base, wrap: "zip" })).message).toBe(
      'Invalid wrap format: "zip". Valid: gzip, brotli.'
    );
    expect(configError(() => resolve({ ...base, concurrency: 0 })).message).toBe(
      'Invalid concurrency: "0". Must be an integer between 1 and 64.'
    );
    expect(configError(() => resolve({ ...base, email: "nope" })).message).toBe(
      'Invalid email address: "nope".'
    );
    expect(configError(() => resolve({ ...base, verbose: true, quiet: true })).message).toBe(
      "Cannot combine --verbose and --quiet."
    );
  });
});

describe("command line", () => {
  function overrides(args: string[]): IsobuildConfig {
    const program = createProgram("1.2.3");
    program.parse(["node", "isobuild", ...args]);
    return toCliOverrides(program.opts());
  }

  it("maps flags onto config keys and leaves the rest unset", () => {
    expect(
      overrides([
        "-s",
        "src",
        "-o",
        "disc.iso",
        "--compress",
        "--compression-method",
        "deflate",
        "--concurrency",
        "3",
        "--max-size",
        "700M",
        "-e",
        "tmp,*.log",
        "--dry-run",
      ])
    ).toEqual({
      source: "src",
      output: "disc.iso",
      compress: true,
      compressionMethod: "deflate",
      concurrency: 3,
      maxSize: "700M",
      exclude: "tmp,*.log",
      dryRun: true,
    });
  });

  it("lets CLI flags win over the config file", () => {
    const config = resolveBuildConfig(
      overrides(["--source", "src", "--label", "CLI_LABEL", "--checksum", "sha1"]),
      { output: "disc.iso", label: "FILE_LABEL", checksum: "md5" },
      FIXTURES
    );
    expect(config.label).toBe("CLI_LABEL");
    expect(config.checksumAlgorithm).toBe("sha1");
    expect(config.outputPath).toBe(path.join(FIXTURES, "disc.iso"));
  });

  it("rejects a non-integer concurrency", () => {
    expect(configError(() => overrides(["--concurrency", "many"])).message).toBe(
      'Invalid concurrency: "many". Must be an integer.'
    );
  });
});
