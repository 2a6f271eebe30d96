import { readFile } from "node:fs/promises";
import { homedir, tmpdir } from "node:os";
import { join } from "node:path";

import { CliAppError } from "ahd-cli-core";

import { DEFAULT_GALLERY_URL } from "./gallery/client.js";
import { DEFAULT_TOOL_BINARIES, TOOL_NAMES, type ToolBinaries } from "./process/runner.js";
import { DEFAULT_BASE_URL } from "./tracker/client.js";

export const DEFAULT_TIMEOUT_MS = 60_000;
export const PROJECT_CONFIG_FILE = ".ahdrc.json";

export interface AhdConfigFile {
  baseUrl?: string;
  galleryUrl?: string;
  timeoutMs?: number;
  passkey?: string;
  cookies?: string;
  tempDir?: string;
  tools?: Partial<ToolBinaries>;
}

export type FlagValue = string | boolean | string[] | undefined;

export interface ResolveConfigInput {
  cwd: string;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
  getFlag: (key: string) => FlagValue;
}

export interface ResolvedConfig {
  baseUrl: string;
  galleryUrl: string;
  timeoutMs: number;
  passkey?: string;
  cookies?: string;
  tempDir: string;
  tools: ToolBinaries;
}

export function getConfigDir(homeDir: string = homedir()): string {
  return join(homeDir, ".config", "ahd-uploader");
}

export function getGlobalConfigPath(homeDir?: string): string {
  return join(getConfigDir(homeDir), "config.json");
}

export function getProjectConfigPath(cwd: string): string {
  return join(cwd, PROJECT_CONFIG_FILE);
}

/** Reads a JSON object; `undefined` when the file does not exist. */
export async function readJsonFile(path: string): Promise<Record<string, unknown> | undefined> {
  let content: string;
  try {
    content = await readFile(path, "utf8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return undefined;
    }
    throw configError(path, error);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw configError(path, error);
  }

  if (!isRecord(parsed)) {
    throw configError(path, new Error("Config root must be a JSON object"));
  }
  return parsed;
}

export async function readConfigFile(path: string): Promise<AhdConfigFile> {
  const raw = await readJsonFile(path);
  if (raw === undefined) {
    return {};
  }

  const tools: Partial<ToolBinaries> = {};
  const configuredTools = raw.tools;
  if (isRecord(configuredTools)) {
    for (const tool of TOOL_NAMES) {
      const value = nonEmpty(configuredTools[tool]);
      if (value !== undefined) {
        tools[tool] = value;
      }
    }
  }

  return {
    baseUrl: nonEmpty(raw.baseUrl),
    galleryUrl: nonEmpty(raw.galleryUrl),
    timeoutMs: toValidTimeout(raw.timeoutMs),
    passkey: nonEmpty(raw.passkey),
    cookies: nonEmpty(raw.cookies),
    tempDir: nonEmpty(raw.tempDir),
    tools,
  };
}

export async function resolveConfig(input: ResolveConfigInput): Promise<ResolvedConfig> {
  const env = input.env ?? process.env;
  const projectConfig = await readConfigFile(getProjectConfigPath(input.cwd));
  const globalConfig = await readConfigFile(getGlobalConfigPath(input.homeDir));

  const baseUrl =
    nonEmpty(firstString(input.getFlag("base-url"))) ??
    nonEmpty(env.AHD_BASE_URL) ??
    projectConfig.baseUrl ??
    globalConfig.baseUrl ??
    DEFAULT_BASE_URL;

  const galleryUrl =
    nonEmpty(firstString(input.getFlag("gallery-url"))) ??
    nonEmpty(env.AHD_GALLERY_URL) ??
    projectConfig.galleryUrl ??
    globalConfig.galleryUrl ??
    DEFAULT_GALLERY_URL;

  const timeoutMs =
    toValidTimeout(firstString(input.getFlag("timeout-ms"))) ??
    toValidTimeout(env.AHD_TIMEOUT_MS) ??
    projectConfig.timeoutMs ??
    globalConfig.timeoutMs ??
    DEFAULT_TIMEOUT_MS;

  const passkey =
    nonEmpty(firstString(input.getFlag("passkey"))) ??
    nonEmpty(env.AHD_PASSKEY) ??
    projectConfig.passkey ??
    globalConfig.passkey;

  const cookies =
    nonEmpty(firstString(input.getFlag("cookies"))) ??
    nonEmpty(env.AHD_COOKIES) ??
    projectConfig.cookies ??
    globalConfig.cookies;

  const tempDir =
    nonEmpty(env.AHD_TMPDIR) ?? projectConfig.tempDir ?? globalConfig.tempDir ?? tmpdir();

  return {
    baseUrl,
    galleryUrl,
    timeoutMs,
    passkey,
    cookies,
    tempDir,
    tools: {
      ...DEFAULT_TOOL_BINARIES,
      ...globalConfig.tools,
      ...projectConfig.tools,
    },
  };
}

function firstString(value: FlagValue): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (Array.isArray(value)) {
    const candidate = value.at(-1);
    return typeof candidate === "string" ? candidate : undefined;
  }
  return typeof value === "string" ? value : undefined;
}

function toValidTimeout(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isFinite(value) && value > 0) {
    return Math.floor(value);
  }

  if (typeof value === "string") {
    const parsed = Number.parseInt(value, 10);
    if (Number.isFinite(parsed) && parsed > 0) {
      return parsed;
    }
  }

  return undefined;
}

function nonEmpty(value: unknown): string | undefined {
  if (typeof value !== "string") {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

function configError(path: string, error: unknown): CliAppError {
  return new CliAppError({
    code: "E_CONFIG_INVALID",
    message: `Failed to read config file: ${path}`,
    details: {
      path,
      reason: error instanceof Error ? error.message : String(error),
    },
    cause: error,
  });
}
