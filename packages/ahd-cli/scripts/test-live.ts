#!/usr/bin/env tsx

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import process from "node:process";

import { CliAppError } from "ahd-cli-core";

import { createTorrent, getMediaInfo } from "../src/domain/media/artifacts.js";
import { resolveMediaEntry } from "../src/domain/media/entry.js";
import { resolveUploadAttributes } from "../src/domain/media/inference.js";
import { takeScreenshots } from "../src/domain/media/screenshots.js";
import { createSpawnRunner } from "../src/domain/process/runner.js";

function parsePositiveInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim().length === 0) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }
  return parsed;
}

async function main(): Promise<void> {
  if (process.env.AHD_LIVE !== "1") {
    console.log("[test:live] skipped: set AHD_LIVE=1 to enable the local tool smoke test");
    return;
  }

  const mediaPath = process.env.AHD_LIVE_MEDIA?.trim();
  if (mediaPath === undefined || mediaPath.length === 0) {
    throw new CliAppError({
      code: "E_ARG_MISSING",
      message: "Live smoke requires AHD_LIVE_MEDIA pointing at a media file or release directory",
    });
  }

  const runner = createSpawnRunner();
  const screenshotCount = parsePositiveInt(process.env.AHD_LIVE_SCREENS, 2);
  const tempDir = await mkdtemp(join(tmpdir(), "ahd-live-"));

  try {
    console.log(`[test:live] inspect ${mediaPath}`);
    const attributes = await resolveUploadAttributes({
      mediaPath,
      imdbId: "tt0000000",
      passkey: "unused",
      contentType: { kind: "auto" },
      mediaType: { kind: "auto" },
      codec: { kind: "auto" },
      group: { kind: "auto" },
      userRelease: false,
      screenshotCount,
    });

    console.log("[test:live] mktorrent");
    const torrent = await createTorrent(mediaPath, { runner, tempDir });

    console.log("[test:live] mediainfo");
    const mediaInfo = await getMediaInfo(mediaPath, { runner });

    console.log(`[test:live] ffmpeg x${screenshotCount}`);
    const entry = await resolveMediaEntry(mediaPath);
    const screenshots = await takeScreenshots(entry.path, screenshotCount, { runner, tempDir });

    console.log(
      JSON.stringify(
        {
          ok: true,
          data: {
            attributes,
            torrent: {
              fileName: torrent.fileName,
              bytes: torrent.content.byteLength,
            },
            mediaInfoLines: mediaInfo.split("\n").length,
            screenshots,
          },
        },
        null,
        2,
      ),
    );
  } finally {
    await rm(tempDir, { recursive: true, force: true });
  }
}

main().catch((error) => {
  if (error instanceof CliAppError) {
    console.error(
      JSON.stringify(
        {
          ok: false,
          error: {
            code: error.code,
            message: error.message,
            details: error.details,
          },
        },
        null,
        2,
      ),
    );
    process.exit(1);
  }

  console.error(error);
  process.exit(1);
});
