import { spawn } from "child_process";
import { promises as fsp } from "fs";
import * as os from "os";
import * as path from "path";
import { errorCode } from "./errors.js";
import { fromPosix } from "./shared.js";

/**
 * The image-authoring collaborator. Implementations own the on-disk image
 * format; the assembler only drives them in manifest order.
 */
export interface ImageAuthor {
  create(): Promise<void>;
  addDirectory(imagePath: string): Promise<void>;
  addFile(imagePath: string, payload: Buffer): Promise<void>;
  setLabel(label: string): void;
  write(outputPath: string): Promise<void>;
  /** Releases every resource; must be safe to call after a failed step. */
  close(): Promise<void>;
}

export type AuthorOperation =
  | { kind: "create" }
  | { kind: "directory"; path: string }
  | { kind: "file"; path: string; size: number }
  | { kind: "label"; label: string }
  | { kind: "write"; outputPath: string }
  | { kind: "close" };

export interface IsoToolOptions {
  command: string;
  args: string[];
}

export const DEFAULT_ISO_TOOL = "xorriso";
const STDERR_TAIL_LENGTH = 2000;

export function resolveIsoTool(command: string): IsoToolOptions {
  const name = path.basename(command).replace(/\.exe$/iu, "");
  return {
    command,
    args: name === "xorriso" ? ["-as", "mkisofs"] : [],
  };
}

function assertImagePath(imagePath: string): void {
  const segments = imagePath.split("/");
  if (imagePath === "" || path.posix.isAbsolute(imagePath) || segments.includes("..")) {
    throw new Error(`Invalid image path "${imagePath}"`);
  }
}

/** Records what would be authored without touching the filesystem. */
export class PlanningImageAuthor implements ImageAuthor {
  readonly operations: AuthorOperation[] = [];
  label: string | null = null;

  async create(): Promise<void> {
    this.operations.push({ kind: "create" });
  }

  async addDirectory(imagePath: string): Promise<void> {
    assertImagePath(imagePath);
    this.operations.push({ kind: "directory", path: imagePath });
  }

  async addFile(imagePath: string, payload: Buffer): Promise<void> {
    assertImagePath(imagePath);
    this.operations.push({ kind: "file", path: imagePath, size: payload.length });
  }

  setLabel(label: string): void {
    this.label = label;
    this.operations.push({ kind: "label", label });
  }

  async write(outputPath: string): Promise<void> {
    throw new Error(`Planning author cannot write ${outputPath}`);
  }

  async close(): Promise<void> {
    this.operations.push({ kind: "close" });
  }
}

/**
 * Drives an mkisofs-compatible authoring tool (xorriso, genisoimage, mkisofs).
 * Entries are staged in a private temporary directory that `close()` removes.
 */
export class MkisofsImageAuthor implements ImageAuthor {
  private readonly tool: IsoToolOptions;
  private stagingDir: string | null = null;
  private label = "CDROM";

  constructor(tool: IsoToolOptions = resolveIsoTool(DEFAULT_ISO_TOOL)) {
    this.tool = tool;
  }

  private stagedPath(imagePath: string): string {
    if (this.stagingDir === null) {
      throw new Error("Image author has not been created.");
    }
    assertImagePath(imagePath);
    return path.join(this.stagingDir, fromPosix(imagePath));
  }

  async create(): Promise<void> {
    if (this.stagingDir !== null) {
      throw new Error("Image author is already open.");
    }
    this.stagingDir = await fsp.mkdtemp(path.join(os.tmpdir(), "isobuild-"));
  }

  async addDirectory(imagePath: string): Promise<void> {
    await fsp.mkdir(this.stagedPath(imagePath), { recursive: true });
  }

  async addFile(imagePath: string, payload: Buffer): Promise<void> {
    await fsp.writeFile(this.stagedPath(imagePath), payload, { flag: "wx" });
  }

  setLabel(label: string): void {
    this.label = label;
  }

  async write(outputPath: string): Promise<void> {
    if (this.stagingDir === null) {
      throw new Error("Image author has not been created.");
    }
    const args = [
      ...this.tool.args,
      "-V",
      this.label,
      "-J",
      "-joliet-long",
      "-R",
      "-o",
      outputPath,
      this.stagingDir,
    ];
    await runTool(this.tool.command, args);
  }

  async close(): Promise<void> {
    const stagingDir = this.stagingDir;
    this.stagingDir = null;
    if (stagingDir !== null) {
      await fsp.rm(stagingDir, { recursive: true, force: true });
    }
  }
}

function runTool(command: string, args: string[]): Promise<void> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: ["ignore", "ignore", "pipe"] });
    let stderr = "";

    child.stderr.on("data", (chunk: Buffer) => {
      stderr = (stderr + chunk.toString()).slice(-STDERR_TAIL_LENGTH);
    });

    child.on("error", (error) => {
      if (errorCode(error) === "ENOENT") {
        reject(new Error(`Authoring tool "${command}" was not found on PATH.`));
        return;
      }
      reject(error);
    });

    child.on("close", (code, signal) => {
      if (code === 0) {
        resolve();
        return;
      }
      const status = signal ? `signal ${signal}` : `code ${String(code)}`;
      const detail = stderr.trim();
      reject(new Error(`${command} exited with ${status}${detail ? `: ${detail}` : ""}`));
    });
  });
}
