import fs from "node:fs";
import path from "node:path";
import { FileTarget } from "../types";

export const MAX_FILENAME_LENGTH = 254;
const MAX_ALTERNATE_SUFFIX = 99;

const HTML_ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  nbsp: " ",
};

export function decodeHtmlEntities(value: string): string {
  return value.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (entity: string, body: string) => {
    if (body.startsWith("#x") || body.startsWith("#X")) {
      return String.fromCodePoint(Number.parseInt(body.slice(2), 16));
    }
    if (body.startsWith("#")) {
      return String.fromCodePoint(Number.parseInt(body.slice(1), 10));
    }
    return HTML_ENTITIES[body.toLowerCase()] ?? entity;
  });
}

function safeDecodeUri(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/** Most filesystems cap a name at 255 bytes; names of 255+ characters keep the first 254. */
export function truncateFilename(name: string): string {
  const chars = Array.from(name);
  return chars.length > MAX_FILENAME_LENGTH ? chars.slice(0, MAX_FILENAME_LENGTH).join("") : name;
}

export function deriveFilename(directUrl: string, suggested?: string): string {
  let name = suggested;
  if (!name) {
    const withoutQuery = directUrl.split("?")[0];
    name = safeDecodeUri(decodeHtmlEntities(path.posix.basename(withoutQuery)).replace(/[\r\n]/g, ""));
  }
  name = name.replace(/[\\/]/g, "_");
  return truncateFilename(name || "download");
}

export interface TargetDirectories {
  tempDir?: string;
  outputDir?: string;
}

export function computeFileTarget(filename: string, dirs: TargetDirectories): FileTarget {
  const finalPath = dirs.outputDir ? path.join(dirs.outputDir, filename) : filename;
  const tempPath = dirs.tempDir ? path.join(dirs.tempDir, filename) : finalPath;
  return { tempPath, finalPath };
}

export type ExistsFn = (filePath: string) => boolean;

/**
 * First of `base.1` … `base.99` that does not exist yet. When every suffix is
 * taken the base name comes back unchanged.
 */
export function createAlternateName(basePath: string, exists: ExistsFn = fs.existsSync): string {
  for (let count = 1; count <= MAX_ALTERNATE_SUFFIX; count += 1) {
    const candidate = `${basePath}.${count}`;
    if (!exists(candidate)) {
      return candidate;
    }
  }
  return basePath;
}

export function avoidCollision(target: FileTarget, exists: ExistsFn = fs.existsSync): FileTarget {
  const finalPath = createAlternateName(target.finalPath, exists);
  if (target.tempPath === target.finalPath) {
    return { tempPath: finalPath, finalPath };
  }
  return { tempPath: target.tempPath, finalPath };
}

export async function placeFile(source: string, destination: string): Promise<void> {
  await fs.promises.mkdir(path.dirname(destination), { recursive: true });
  try {
    await fs.promises.rename(source, destination);
  } catch (error) {
    if (!(error instanceof Error) || !("code" in error) || error.code !== "EXDEV") {
      throw error;
    }
    // temp and output directories on different filesystems
    await fs.promises.copyFile(source, destination);
    await fs.promises.unlink(source);
  }
}

export async function removeFile(filePath: string): Promise<void> {
  await fs.promises.rm(filePath, { force: true });
}
