import { CliAppError, type Logger } from "ahd-cli-core";

import { AUTO_DETECT, DEFAULT_SCREENSHOT_COUNT } from "../domain/ahd-metadata.js";
import { ValidationError } from "../domain/errors.js";
import { assembleUploadForm } from "../domain/form/assembler.js";
import { examineUploadForm, saveUploadForm, type ExaminedForm } from "../domain/form/store.js";
import { buildReleaseDescription } from "../domain/gallery/description.js";
import type { GalleryClient } from "../domain/gallery/client.js";
import { createTorrent, getMediaInfo } from "../domain/media/artifacts.js";
import { resolveUploadAttributes } from "../domain/media/inference.js";
import type { ProcessRunner, ToolBinaries } from "../domain/process/runner.js";
import type { Detectable, UploadAttributes, UploadRequest } from "../domain/types.js";
import { renderExaminedForm } from "./examine.js";

export interface PrepareCommandInput {
  mediaPath: string;
  outputPath: string;
  imdbId: string;
  passkey?: string;
  contentType?: string;
  mediaType?: string;
  codec?: string;
  group?: string;
  specialEdition?: string;
  userRelease: boolean;
  screenshotCount?: number;
}

export interface PrepareCommandDeps {
  runner: ProcessRunner;
  gallery: GalleryClient;
  tempDir: string;
  tools: ToolBinaries;
  logger: Logger;
}

export interface PrepareCommandOutput {
  path: string;
  attributes: UploadAttributes;
  form: ExaminedForm;
}

const IMDB_ID_PATTERN = /^tt\d+$/;

export function validateImdbId(value: string): string {
  const imdbId = value.trim();
  if (!IMDB_ID_PATTERN.test(imdbId)) {
    throw new ValidationError(`IMDb id must look like tt0123456, got: ${value}`, { imdbId: value });
  }
  return imdbId;
}

export function buildUploadRequest(input: PrepareCommandInput): UploadRequest {
  const passkey = input.passkey?.trim();
  if (passkey === undefined || passkey.length === 0) {
    throw new CliAppError({
      code: "E_ARG_MISSING",
      message: "--passkey is required (or set AHD_PASSKEY)",
      details: { arg: "passkey" },
    });
  }

  return {
    mediaPath: input.mediaPath,
    imdbId: validateImdbId(input.imdbId),
    passkey,
    contentType: detectable(input.contentType),
    mediaType: detectable(input.mediaType),
    codec: detectable(input.codec),
    group: detectable(input.group),
    specialEdition: input.specialEdition,
    userRelease: input.userRelease,
    screenshotCount: input.screenshotCount ?? DEFAULT_SCREENSHOT_COUNT,
  };
}

export async function runPrepareCommand(
  deps: PrepareCommandDeps,
  input: PrepareCommandInput,
): Promise<PrepareCommandOutput> {
  const request = buildUploadRequest(input);
  const attributes = await resolveUploadAttributes(request);
  deps.logger.debug(
    `resolved ${attributes.contentType} / ${attributes.mediaType} / ${attributes.codec} / ${attributes.group}`,
  );

  deps.logger.info("creating torrent");
  const torrent = await createTorrent(request.mediaPath, {
    runner: deps.runner,
    tempDir: deps.tempDir,
    mktorrent: deps.tools.mktorrent,
  });

  deps.logger.info("reading media info");
  const mediaInfo = await getMediaInfo(request.mediaPath, {
    runner: deps.runner,
    mediainfo: deps.tools.mediainfo,
  });

  deps.logger.info(`taking ${attributes.screenshotCount} screenshot(s)`);
  const releaseDescription = await buildReleaseDescription(request.mediaPath, {
    runner: deps.runner,
    gallery: deps.gallery,
    tempDir: deps.tempDir,
    passkey: request.passkey,
    screenshotCount: attributes.screenshotCount,
    ffprobe: deps.tools.ffprobe,
    ffmpeg: deps.tools.ffmpeg,
    logger: deps.logger.child("screens"),
  });

  const form = assembleUploadForm({
    attributes,
    imdbId: request.imdbId,
    torrent,
    mediaInfo,
    releaseDescription,
  });
  await saveUploadForm(form, input.outputPath);
  deps.logger.info(`saved upload form to ${input.outputPath}`);

  return {
    path: input.outputPath,
    attributes,
    form: examineUploadForm(form),
  };
}

export function renderPrepareOutput(output: PrepareCommandOutput): string {
  return [`Saved upload form: ${output.path}`, "", renderExaminedForm(output.form)].join("\n");
}

function detectable(value: string | undefined): Detectable<string> {
  const trimmed = value?.trim();
  if (trimmed === undefined || trimmed.length === 0 || trimmed.toUpperCase() === AUTO_DETECT) {
    return { kind: "auto" };
  }
  return { kind: "explicit", value: trimmed };
}
