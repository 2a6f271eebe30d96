import type { Logger } from "ahd-cli-core";

import { resolveMediaEntry } from "../media/entry.js";
import { takeScreenshots } from "../media/screenshots.js";
import type { ProcessRunner } from "../process/runner.js";
import type { GalleryClient } from "./client.js";

export interface ReleaseDescriptionOptions {
  runner: ProcessRunner;
  gallery: GalleryClient;
  tempDir: string;
  passkey: string;
  screenshotCount: number;
  ffprobe?: string;
  ffmpeg?: string;
  logger?: Logger;
}

/** Screenshot BBCode for the release; the gallery is titled after the media file name. */
export async function buildReleaseDescription(
  path: string,
  options: ReleaseDescriptionOptions,
): Promise<string> {
  const entry = await resolveMediaEntry(path);
  const screenshots = await takeScreenshots(entry.path, options.screenshotCount, options);
  options.logger?.info(`uploading ${screenshots.length} screenshot(s)`);
  return options.gallery.uploadScreenshots(
    entry.name,
    screenshots.map((screenshot) => screenshot.path),
    options.passkey,
  );
}
