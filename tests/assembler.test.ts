import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";
import * as fs from "fs";
import * as path from "path";
import * as zlib from "zlib";
import { fileURLToPath } from "node:url";
import {
  archivePathFor,
  assembleImage,
  directoriesFor,
  normalizeVolumeLabel,
  tempPathFor,
} from "../src/assembler.js";
import type { AssembleRequest } from "../src/assembler.js";
import type { AuthorOperation, ImageAuthor } from "../src/author.js";
import { computeDigest } from "../src/processor.js";
import type { BuildManifest, ProcessedUnit } from "../src/types.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const OUTPUT = path.join(__dirname, "assembler-output");
const IMAGE_CONTENT = "fake image";

interface FakeAuthorOptions {
  failOn?: AuthorOperation["kind"];
  partialWrite?: boolean;
}

class FakeAuthor implements ImageAuthor {
  readonly operations: AuthorOperation[] = [];

  constructor(private readonly options: FakeAuthorOptions = {}) {}

  private record(operation: AuthorOperation): void {
    this.operations.push(operation);
    if (this.options.failOn === operation.kind) {
      throw new Error("disk full");
    }
  }

  create(): Promise<void> {
    this.record({ kind: "create" });
    return Promise.resolve();
  }

  addDirectory(imagePath: string): Promise<void> {
    this.record({ kind: "directory", path: imagePath });
    return Promise.resolve();
  }

  addFile(imagePath: string, payload: Buffer): Promise<void> {
    this.record({ kind: "file", path: imagePath, size: payload.length });
    return Promise.resolve();
  }

  setLabel(label: string): void {
    this.operations.push({ kind: "label", label });
  }

  write(outputPath: string): Promise<void> {
    fs.writeFileSync(outputPath, this.options.partialWrite ? "partial" : IMAGE_CONTENT);
    this.record({ kind: "write", outputPath });
    return Promise.resolve();
  }

  close(): Promise<void> {
    this.record({ kind: "close" });
    return Promise.resolve();
  }
}

function unit(relativePath: string, content: string): ProcessedUnit {
  const payload = Buffer.from(content);
  return {
    entry: {
      absolutePath: path.join("/source", relativePath),
      relativePath,
      sizeBytes: payload.length,
      isHidden: false,
      extension: path.extname(relativePath),
    },
    checksumAlgorithm: "sha256",
    checksumDigest: computeDigest(payload, "sha256"),
    payload,
    compressionMethod: "none",
  };
}

const MANIFEST: BuildManifest = {
  units: [unit("a.txt", "aaaa"), unit("docs/api/x.md", "xx"), unit("docs/b.md", "bbb")],
  totalBytes: 9,
  label: "my disc-1",
};

function request(outputPath: string, overrides: Partial<AssembleRequest> = {}): AssembleRequest {
  return {
    outputPath,
    dryRun: false,
    checksumAlgorithm: "sha256",
    wrap: null,
    createAuthor: () => new FakeAuthor(),
    ...overrides,
  };
}

beforeAll(() => {
  fs.rmSync(OUTPUT, { recursive: true, force: true });
  fs.mkdirSync(OUTPUT, { recursive: true });
});

afterAll(() => {
  fs.rmSync(OUTPUT, { recursive: true, force: true });
});

describe("volume labels", () => {
  it("upper-cases and replaces characters outside A-Z, 0-9 and _", () => {
    expect(normalizeVolumeLabel("my disc-1")).toBe("MY_DISC_1");
    expect(normalizeVolumeLabel("café")).toBe("CAFE_");
  });

  it("truncates to 32 characters and falls back to CDROM", () => {
    expect(normalizeVolumeLabel("a".repeat(40))).toBe("A".repeat(32));
    expect(normalizeVolumeLabel("")).toBe("CDROM");
  });
});

describe("directoriesFor", () => {
  it("lists each parent once, parents before children", () => {
    expect(directoriesFor(MANIFEST)).toEqual(["docs", "docs/api"]);
  });
});

describe("assembleImage", () => {
  let outputPath: string;

  beforeEach((context) => {
    outputPath = path.join(OUTPUT, `${context.task.id}.iso`);
  });

  it("plans without touching the output path in dry-run mode", async () => {
    fs.writeFileSync(outputPath, "keep");
    const createAuthor = vi.fn(() => new FakeAuthor());

    const outcome = await assembleImage(MANIFEST, request(outputPath, { dryRun: true, createAuthor }));

    expect(createAuthor).not.toHaveBeenCalled();
    expect(fs.readFileSync(outputPath, "utf-8")).toBe("keep");
    expect(outcome).toMatchObject({
      success: true,
      dryRun: true,
      bytesWritten: 0,
      outputPath,
      label: "MY_DISC_1",
      entryCount: 3,
      totalBytes: 9,
      imageChecksum: null,
      archivePath: null,
      errors: [],
    });
  });

  it("feeds directories, files and the label to the author in manifest order", async () => {
    const author = new FakeAuthor();

    const outcome = await assembleImage(MANIFEST, request(outputPath, { createAuthor: () => author }));

    expect(author.operations).toEqual([
      { kind: "create" },
      { kind: "directory", path: "docs" },
      { kind: "directory", path: "docs/api" },
      { kind: "file", path: "a.txt", size: 4 },
      { kind: "file", path: "docs/api/x.md", size: 2 },
      { kind: "file", path: "docs/b.md", size: 3 },
      { kind: "label", label: "MY_DISC_1" },
      { kind: "write", outputPath: tempPathFor(outputPath) },
      { kind: "close" },
    ]);
    expect(fs.readFileSync(outputPath, "utf-8")).toBe(IMAGE_CONTENT);
    expect(fs.existsSync(tempPathFor(outputPath))).toBe(false);
    expect(outcome.success).toBe(true);
    expect(outcome.bytesWritten).toBe(IMAGE_CONTENT.length);
    expect(outcome.imageChecksum).toBe(computeDigest(Buffer.from(IMAGE_CONTENT), "sha256"));
    expect(outcome.errors).toEqual([]);
  });

  it("creates missing parent directories for the output", async () => {
    const nested = path.join(OUTPUT, "nested", "deeper", "disc.iso");

    const outcome = await assembleImage(MANIFEST, request(nested));

    expect(outcome.success).toBe(true);
    expect(fs.readFileSync(nested, "utf-8")).toBe(IMAGE_CONTENT);
  });

  it("wraps the finished image when asked", async () => {
    const outcome = await assembleImage(MANIFEST, request(outputPath, { wrap: "gzip" }));

    const archivePath = archivePathFor(outputPath, "gzip");
    expect(archivePath).toBe(`${outputPath}.gz`);
    expect(outcome.archivePath).toBe(archivePath);
    expect(zlib.gunzipSync(fs.readFileSync(archivePath)).toString("utf-8")).toBe(IMAGE_CONTENT);
  });

  it("wraps with brotli", async () => {
    const outcome = await assembleImage(MANIFEST, request(outputPath, { wrap: "brotli" }));

    expect(outcome.archivePath).toBe(`${outputPath}.br`);
    expect(zlib.brotliDecompressSync(fs.readFileSync(`${outputPath}.br`)).toString("utf-8")).toBe(
      IMAGE_CONTENT
    );
  });

  it("reports an authoring failure and still closes the author", async () => {
    const author = new FakeAuthor({ failOn: "file" });

    const outcome = await assembleImage(MANIFEST, request(outputPath, { createAuthor: () => author }));

    expect(outcome.success).toBe(false);
    expect(outcome.bytesWritten).toBe(0);
    expect(outcome.errors).toEqual([
      {
        kind: "ImageWriteError",
        code: "IMAGE_WRITE_FAILED",
        message: 'Failed to add file "a.txt": disk full',
        fatal: true,
      },
    ]);
    expect(author.operations.at(-1)).toEqual({ kind: "close" });
    expect(fs.existsSync(outputPath)).toBe(false);
  });

  it("removes a partially written image", async () => {
    const outcome = await assembleImage(
      MANIFEST,
      request(outputPath, { createAuthor: () => new FakeAuthor({ failOn: "write", partialWrite: true }) })
    );

    expect(outcome.success).toBe(false);
    expect(outcome.errors[0].message).toBe(`Failed to write ${outputPath}: disk full`);
    expect(fs.existsSync(outputPath)).toBe(false);
    expect(fs.existsSync(tempPathFor(outputPath))).toBe(false);
  });

  it("keeps an earlier image when adding a file fails", async () => {
    fs.writeFileSync(outputPath, "previous good image");

    const outcome = await assembleImage(
      MANIFEST,
      request(outputPath, { createAuthor: () => new FakeAuthor({ failOn: "file" }) })
    );

    expect(outcome.success).toBe(false);
    expect(fs.readFileSync(outputPath, "utf-8")).toBe("previous good image");
  });

  it("keeps an earlier image and archive when the write fails part way", async () => {
    const archivePath = archivePathFor(outputPath, "gzip");
    fs.writeFileSync(outputPath, "previous good image");
    fs.writeFileSync(archivePath, "previous archive");

    const outcome = await assembleImage(
      MANIFEST,
      request(outputPath, {
        wrap: "gzip",
        createAuthor: () => new FakeAuthor({ failOn: "write", partialWrite: true }),
      })
    );

    expect(outcome.success).toBe(false);
    expect(fs.readFileSync(outputPath, "utf-8")).toBe("previous good image");
    expect(fs.readFileSync(archivePath, "utf-8")).toBe("previous archive");
    expect(fs.existsSync(tempPathFor(outputPath))).toBe(false);
    expect(fs.existsSync(tempPathFor(archivePath))).toBe(false);
  });

  it("replaces an earlier image after a successful write", async () => {
    fs.writeFileSync(outputPath, "previous good image");

    const outcome = await assembleImage(MANIFEST, request(outputPath));

    expect(outcome.success).toBe(true);
    expect(fs.readFileSync(outputPath, "utf-8")).toBe(IMAGE_CONTENT);
  });

  it("reports an author that cannot be started", async () => {
    const outcome = await assembleImage(
      MANIFEST,
      request(outputPath, {
        createAuthor: () => {
          throw new Error("xorriso not installed");
        },
      })
    );

    expect(outcome.success).toBe(false);
    expect(outcome.errors).toEqual([
      {
        kind: "ImageWriteError",
        code: "IMAGE_WRITE_FAILED",
        message: "Failed to start image author: xorriso not installed",
        fatal: true,
      },
    ]);
  });

  it("treats a failed release as a write failure", async () => {
    const outcome = await assembleImage(
      MANIFEST,
      request(outputPath, { createAuthor: () => new FakeAuthor({ failOn: "close" }) })
    );

    expect(outcome.success).toBe(false);
    expect(outcome.errors).toEqual([
      {
        kind: "ImageWriteError",
        code: "AUTHOR_CLOSE_FAILED",
        message: "Failed to release image author: disk full",
        fatal: true,
      },
    ]);
    expect(fs.existsSync(outputPath)).toBe(false);
  });
});
