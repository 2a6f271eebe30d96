import { readFile, rm } from "node:fs/promises";
import { join } from "node:path";

import { runTool, type ProcessRunner } from "../process/runner.js";
import type { TorrentArtifact } from "../types.js";
import { inspectPath, resolveMediaEntry, stemOf } from "./entry.js";

/** mktorrent takes the piece length as a power of two: 2^23 = 8 MiB. */
export const TORRENT_PIECE_LENGTH_EXPONENT = 23;

export interface ArtifactOptions {
  runner: ProcessRunner;
  tempDir: string;
  mktorrent?: string;
  mediainfo?: string;
}

export async function createTorrent(
  path: string,
  options: ArtifactOptions,
): Promise<TorrentArtifact> {
  const input = await inspectPath(path);
  const fileName = `${stemOf(input)}.torrent`;
  const torrentPath = join(options.tempDir, fileName);

  await rm(torrentPath, { force: true });
  await runTool(options.runner, options.mktorrent ?? "mktorrent", [
    "-l",
    String(TORRENT_PIECE_LENGTH_EXPONENT),
    "-p",
    "-o",
    torrentPath,
    path,
  ]);

  const content = new Uint8Array(await readFile(torrentPath));
  return {
    path: torrentPath,
    fileName,
    content,
  };
}

/** Returns the mediainfo report verbatim; it is pasted into the form unmodified. */
export async function getMediaInfo(
  path: string,
  options: Pick<ArtifactOptions, "runner" | "mediainfo">,
): Promise<string> {
  const entry = await resolveMediaEntry(path);
  const result = await runTool(options.runner, options.mediainfo ?? "mediainfo", [entry.path]);
  return result.stdout;
}
