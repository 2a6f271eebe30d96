import { readdir, stat } from "node:fs/promises";
import { basename, extname, join } from "node:path";

import { DetectionError, ValidationError } from "../errors.js";

export interface MediaEntry {
  path: string;
  name: string;
  isDirectory: boolean;
}

export async function inspectPath(path: string): Promise<MediaEntry> {
  try {
    const info = await stat(path);
    return { path, name: basename(path), isDirectory: info.isDirectory() };
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      throw new ValidationError(`Media path does not exist: ${path}`, { path });
    }
    throw error;
  }
}

/**
 * A directory release is described by its first entry (sorted by name); a file
 * describes itself.
 */
export async function resolveMediaEntry(path: string): Promise<MediaEntry> {
  const entry = await inspectPath(path);
  if (!entry.isDirectory) {
    return entry;
  }

  const children = (await readdir(path)).sort();
  const first = children[0];
  if (first === undefined) {
    throw new DetectionError(`Media directory is empty: ${path}`, { path });
  }

  return inspectPath(join(path, first));
}

export function stemOf(entry: MediaEntry): string {
  return entry.isDirectory ? entry.name : fileStem(entry.name);
}

export function fileStem(path: string): string {
  const name = basename(path);
  const extension = extname(name);
  return extension.length > 0 ? name.slice(0, -extension.length) : name;
}
