import { CliAppError, type Logger } from "ahd-cli-core";

import { maskCookieHeader, readNetscapeCookieFile } from "../domain/auth/cookies.js";
import { SubmissionError } from "../domain/errors.js";
import { deleteUploadForm, loadUploadForm } from "../domain/form/store.js";
import { extractDownloadLink } from "../domain/tracker/parser.js";
import type { AhdClient } from "../domain/tracker/client.js";
import type { SubmissionResult } from "../domain/types.js";

export interface UploadCommandInput {
  path: string;
  cookiesPath?: string;
  deleteOnSuccess: boolean;
}

export interface UploadCommandDeps {
  baseUrl: string;
  createClient: (cookie: string) => AhdClient;
  now: () => Date;
  logger: Logger;
}

export type UploadCommandOutput = SubmissionResult & {
  /** Present only when deletion was requested. */
  deleted?: boolean;
};

export async function runUploadCommand(
  deps: UploadCommandDeps,
  input: UploadCommandInput,
): Promise<UploadCommandOutput> {
  const cookiesPath = input.cookiesPath?.trim();
  if (cookiesPath === undefined || cookiesPath.length === 0) {
    throw new CliAppError({
      code: "E_AUTH_REQUIRED",
      message: "--cookies is required (or set AHD_COOKIES)",
      details: { arg: "cookies" },
    });
  }

  const form = await loadUploadForm(input.path);
  const cookie = await readNetscapeCookieFile(cookiesPath, {
    host: new URL(deps.baseUrl).hostname,
    now: deps.now(),
  });

  deps.logger.debug(`cookie: ${maskCookieHeader(cookie)}`);
  deps.logger.info("submitting upload form");
  const response = await deps.createClient(cookie).submitUploadForm(form);
  if (response.status !== 200) {
    throw new SubmissionError(response.status);
  }

  let deleted: boolean | undefined;
  if (input.deleteOnSuccess) {
    deleted = await tryDeleteForm(input.path, deps.logger);
  }

  const result = resolveSubmissionResult(response.status, response.url, response.html, deps);
  return deleted === undefined ? result : { ...result, deleted };
}

function resolveSubmissionResult(
  status: number,
  landingUrl: string,
  html: string,
  deps: UploadCommandDeps,
): SubmissionResult {
  try {
    const link = extractDownloadLink(html, deps.now(), deps.baseUrl);
    return { kind: "download", status, url: link.url, torrentId: link.torrentId };
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    deps.logger.info(`could not find the download link (${reason}); returning the landing page`);
    return { kind: "landing", status, url: landingUrl };
  }
}

async function tryDeleteForm(path: string, logger: Logger): Promise<boolean> {
  try {
    await deleteUploadForm(path);
    return true;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logger.info(`could not delete ${path}: ${reason}`);
    return false;
  }
}

export function renderUploadOutput(output: UploadCommandOutput): string {
  return [
    output.kind === "download" ? `Download link: ${output.url}` : `Landing page: ${output.url}`,
    output.deleted === undefined
      ? undefined
      : output.deleted
        ? "Upload form deleted."
        : "Upload form could not be deleted.",
  ]
    .filter((line): line is string => Boolean(line))
    .join("\n");
}
