import { mkdir, rm } from "node:fs/promises";
import { basename, join } from "node:path";

import type { Logger } from "ahd-cli-core";

import { ToolError, ValidationError } from "../errors.js";
import { runTool, type ProcessRunner } from "../process/runner.js";
import type { Screenshot, ScreenshotSet } from "../types.js";
import { fileStem } from "./entry.js";

export interface ScreenshotOptions {
  runner: ProcessRunner;
  tempDir: string;
  ffprobe?: string;
  ffmpeg?: string;
  logger?: Logger;
}

export async function getDuration(
  file: string,
  options: Pick<ScreenshotOptions, "runner" | "ffprobe">,
): Promise<number> {
  const tool = options.ffprobe ?? "ffprobe";
  const result = await runTool(options.runner, tool, [
    "-v",
    "error",
    "-show_entries",
    "format=duration",
    "-of",
    "default=noprint_wrappers=1:nokey=1",
    file,
  ]);

  const raw = result.stdout.trim();
  const duration = Number.parseFloat(raw);
  if (!Number.isFinite(duration)) {
    throw new ToolError(tool, 0, `Unexpected duration output: ${raw}`);
  }
  return duration;
}

/**
 * Evenly spaced interior offsets in whole seconds. The duration is truncated
 * first and the scaled offset second. Offsets are non-zero and strictly
 * increasing, which needs at least `count + 1` whole seconds.
 */
export function computeOffsets(duration: number, count: number): number[] {
  const wholeDuration = Math.trunc(duration);
  if (wholeDuration < count + 1) {
    throw new ValidationError(
      `Media duration ${duration}s is too short for ${count} screenshot(s)`,
      { duration, count },
    );
  }

  const offsets: number[] = [];
  for (let index = 1; index <= count; index += 1) {
    offsets.push(Math.trunc((1 / (count + 1)) * index * wholeDuration));
  }
  return offsets;
}

export function screenshotPath(file: string, offset: number, outputDir: string): string {
  return join(outputDir, `${fileStem(file)}_${offset}.png`);
}

export async function takeScreenshot(
  file: string,
  offset: number,
  outputDir: string,
  options: Pick<ScreenshotOptions, "runner" | "ffmpeg">,
): Promise<string> {
  const output = screenshotPath(file, offset, outputDir);
  await runTool(options.runner, options.ffmpeg ?? "ffmpeg", [
    "-ss",
    String(offset),
    "-i",
    file,
    "-vframes",
    "1",
    output,
  ]);
  return output;
}

export async function takeScreenshots(
  file: string,
  count: number,
  options: ScreenshotOptions,
): Promise<ScreenshotSet> {
  const duration = await getDuration(file, options);
  const offsets = computeOffsets(duration, count);
  const outputDir = join(options.tempDir, `${basename(file)}_screens`);
  await rm(outputDir, { recursive: true, force: true });
  await mkdir(outputDir, { recursive: true });

  const screenshots: Screenshot[] = [];
  for (const offset of offsets) {
    options.logger?.debug(`frame at ${offset}s`);
    screenshots.push({ offset, path: await takeScreenshot(file, offset, outputDir, options) });
  }
  return screenshots;
}
