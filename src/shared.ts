import * as path from "path";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function toPosix(filePath: string): string {
  return filePath.replace(/\\/g, "/").split(path.sep).join("/");
}

export function fromPosix(filePath: string): string {
  return filePath.split("/").join(path.sep);
}

/** Key under which two image paths are considered the same on case-insensitive targets. */
export function canonicalPathKey(value: string): string {
  return value.normalize("NFC").toLowerCase();
}
