import { readFileSync } from "node:fs";

import {
  CliAppError,
  createCommandContext,
  createErrorEnvelope,
  createLogger,
  createSuccessEnvelope,
  EXIT_CODES,
  mapErrorCodeToExitCode,
  toCliAppError,
  type Logger,
} from "ahd-cli-core";

import { getDoctorFailureCode, renderDoctorOutput, runDoctorCommand } from "./commands/doctor.js";
import { renderExamineOutput, runExamineCommand } from "./commands/examine.js";
import { renderPrepareOutput, runPrepareCommand } from "./commands/prepare.js";
import { renderUploadOutput, runUploadCommand } from "./commands/upload.js";
import { getAhdMetadata } from "./domain/ahd-metadata.js";
import { resolveConfig, type FlagValue, type ResolvedConfig } from "./domain/config.js";
import { createGalleryClient, type GalleryClient } from "./domain/gallery/client.js";
import { createSpawnRunner, type ProcessRunner } from "./domain/process/runner.js";
import { createAhdClient, type AhdClient } from "./domain/tracker/client.js";

interface WritableLike {
  write: (chunk: string) => unknown;
}

export interface AhdCliDeps {
  runner?: ProcessRunner;
  gallery?: GalleryClient;
  createClient?: (cookie: string) => AhdClient;
  fetchImpl?: typeof fetch;
  stdout?: WritableLike;
  stderr?: WritableLike;
  clock?: () => number;
  now?: () => Date;
  requestIdFactory?: () => string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
  nodeVersion?: string;
}

interface ParsedArgs {
  command: string | undefined;
  flags: Map<string, FlagValue>;
  positional: string[];
}

interface VersionInfo {
  name: string;
  version: string;
}

const SHORT_FLAG_ALIASES: Record<string, string> = {
  "-h": "help",
  "-V": "version",
  "-v": "verbose",
};

/** Flags that never take a value, so the next token stays positional. */
const BOOLEAN_FLAGS = new Set([
  "json",
  "verbose",
  "help",
  "version",
  "user-release",
  "delete-on-success",
]);

const CLI_VERSION = loadVersionInfo();

export async function runCli(argv: string[], deps: AhdCliDeps = {}): Promise<number> {
  const stdout = deps.stdout ?? process.stdout;
  const stderr = deps.stderr ?? process.stderr;
  const parsed = parseArgs(argv);
  const json = getBooleanFlag(parsed.flags, "json");
  const verbose = getBooleanFlag(parsed.flags, "verbose");

  const context = createCommandContext({
    clock: deps.clock,
    now: deps.now,
    requestIdFactory: deps.requestIdFactory,
    verbose,
  });

  if (hasFlag(parsed.flags, "version") || parsed.command === "version") {
    if (json) {
      stdout.write(`${JSON.stringify(createSuccessEnvelope(CLI_VERSION, context.toMeta()))}\n`);
    } else {
      stdout.write(`${CLI_VERSION.name} ${CLI_VERSION.version}\n`);
    }
    return EXIT_CODES.SUCCESS;
  }

  if (parsed.command === undefined || parsed.command === "help" || hasFlag(parsed.flags, "help")) {
    const command = parsed.command === "help" ? parsed.positional[0] : parsed.command;
    const helpText = renderHelp(command);
    if (json) {
      const helpData: Record<string, unknown> = {
        help: helpText,
      };
      if (command) {
        helpData.command = command;
      }
      stdout.write(`${JSON.stringify(createSuccessEnvelope(helpData, context.toMeta()))}\n`);
    } else {
      stdout.write(`${helpText}\n`);
    }
    return EXIT_CODES.SUCCESS;
  }

  const cwd = deps.cwd ?? process.cwd();
  const env = deps.env ?? process.env;
  const logger = createLogger({
    stream: stderr,
    scope: parsed.command,
    verbose,
    silent: json,
  });

  let resolvedConfig: ResolvedConfig | undefined;
  const getConfig = async (): Promise<ResolvedConfig> => {
    resolvedConfig ??= await resolveConfig({
      cwd,
      env,
      homeDir: deps.homeDir,
      getFlag: (key) => parsed.flags.get(key),
    });
    return resolvedConfig;
  };

  try {
    const result = await dispatch(parsed, {
      getConfig,
      logger,
      runner: deps.runner ?? createSpawnRunner(),
      gallery: deps.gallery,
      createClient: deps.createClient,
      fetchImpl: deps.fetchImpl,
      now: context.now,
      cwd,
      env,
      homeDir: deps.homeDir,
      nodeVersion: deps.nodeVersion,
    });

    if (json) {
      stdout.write(`${JSON.stringify(createSuccessEnvelope(result.data, context.toMeta()))}\n`);
    } else {
      stdout.write(`${result.humanOutput}\n`);
    }

    return EXIT_CODES.SUCCESS;
  } catch (error) {
    const appError = toCliAppError(error);
    const exitCode = mapErrorCodeToExitCode(appError.code);

    if (json) {
      stdout.write(
        `${JSON.stringify(
          createErrorEnvelope(appError.code, appError.message, appError.details),
        )}\n`,
      );
    } else {
      stderr.write(formatHumanError(appError));
    }

    return exitCode;
  }
}

interface DispatchDeps {
  getConfig: () => Promise<ResolvedConfig>;
  logger: Logger;
  runner: ProcessRunner;
  gallery?: GalleryClient;
  createClient?: (cookie: string) => AhdClient;
  fetchImpl?: typeof fetch;
  now: () => Date;
  cwd: string;
  env: NodeJS.ProcessEnv;
  homeDir?: string;
  nodeVersion?: string;
}

interface DispatchResult {
  data: unknown;
  humanOutput: string;
}

async function dispatch(parsed: ParsedArgs, deps: DispatchDeps): Promise<DispatchResult> {
  switch (parsed.command) {
    case "prepare":
      return dispatchPrepare(parsed, deps);
    case "examine":
      return dispatchExamine(parsed);
    case "upload":
      return dispatchUpload(parsed, deps);
    case "doctor":
      return dispatchDoctor(parsed, deps);
    default:
      throw createArgumentError("E_ARG_UNSUPPORTED", `Unknown command: ${parsed.command}`, {
        command: parsed.command,
      });
  }
}

async function dispatchPrepare(parsed: ParsedArgs, deps: DispatchDeps): Promise<DispatchResult> {
  const mediaPath = getRequiredPositional(parsed, 0, "media");
  const outputPath = getRequiredPositional(parsed, 1, "output_form");
  const imdbId = getRequiredString(parsed.flags, "imdb");
  const config = await deps.getConfig();

  const output = await runPrepareCommand(
    {
      runner: deps.runner,
      gallery:
        deps.gallery ??
        createGalleryClient({
          baseUrl: config.galleryUrl,
          timeoutMs: config.timeoutMs,
          fetchImpl: deps.fetchImpl,
        }),
      tempDir: config.tempDir,
      tools: config.tools,
      logger: deps.logger,
    },
    {
      mediaPath,
      outputPath,
      imdbId,
      passkey: config.passkey,
      contentType: getOptionalString(parsed.flags, "type"),
      mediaType: getOptionalString(parsed.flags, "media-type"),
      codec: getOptionalString(parsed.flags, "codec"),
      group: getOptionalString(parsed.flags, "group"),
      specialEdition: getOptionalString(parsed.flags, "special-edition"),
      userRelease: getBooleanFlag(parsed.flags, "user-release"),
      screenshotCount: getOptionalPositiveInteger(parsed.flags, "num-screens"),
    },
  );

  return {
    data: output,
    humanOutput: renderPrepareOutput(output),
  };
}

async function dispatchExamine(parsed: ParsedArgs): Promise<DispatchResult> {
  const path = getRequiredPositional(parsed, 0, "input_form");
  const output = await runExamineCommand({ path });
  return {
    data: output,
    humanOutput: renderExamineOutput(output),
  };
}

async function dispatchUpload(parsed: ParsedArgs, deps: DispatchDeps): Promise<DispatchResult> {
  const path = getRequiredPositional(parsed, 0, "input_form");
  const config = await deps.getConfig();

  const output = await runUploadCommand(
    {
      baseUrl: config.baseUrl,
      createClient:
        deps.createClient ??
        ((cookie) =>
          createAhdClient({
            baseUrl: config.baseUrl,
            timeoutMs: config.timeoutMs,
            cookie,
            fetchImpl: deps.fetchImpl,
          })),
      now: deps.now,
      logger: deps.logger,
    },
    {
      path,
      cookiesPath: config.cookies,
      deleteOnSuccess: getBooleanFlag(parsed.flags, "delete-on-success"),
    },
  );

  return {
    data: output,
    humanOutput: renderUploadOutput(output),
  };
}

async function dispatchDoctor(parsed: ParsedArgs, deps: DispatchDeps): Promise<DispatchResult> {
  const report = await runDoctorCommand(deps.runner, {
    cwd: deps.cwd,
    env: deps.env,
    homeDir: deps.homeDir,
    nodeVersion: deps.nodeVersion,
    now: deps.now(),
    getFlag: (key) => parsed.flags.get(key),
  });

  const failureCode = getDoctorFailureCode(report);
  if (failureCode) {
    throw new CliAppError({
      code: failureCode,
      message: `Doctor found ${report.summary.errors} error(s).`,
      details: report,
    });
  }

  return {
    data: report,
    humanOutput: renderDoctorOutput(report),
  };
}

function parseArgs(argv: string[]): ParsedArgs {
  let command: string | undefined;
  const flags = new Map<string, FlagValue>();
  const positional: string[] = [];

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];

    const shortAlias = SHORT_FLAG_ALIASES[token];
    if (shortAlias !== undefined) {
      flags.set(shortAlias, true);
      continue;
    }

    if (token.startsWith("--")) {
      const stripped = token.slice(2);
      const eqIndex = stripped.indexOf("=");
      if (eqIndex >= 0) {
        const key = stripped.slice(0, eqIndex);
        const value = stripped.slice(eqIndex + 1);
        appendFlagValue(flags, key, value);
        continue;
      }

      const next = argv[index + 1];
      if (!BOOLEAN_FLAGS.has(stripped) && next !== undefined && !next.startsWith("-")) {
        appendFlagValue(flags, stripped, next);
        index += 1;
        continue;
      }

      flags.set(stripped, true);
      continue;
    }

    if (command === undefined) {
      command = token;
      continue;
    }

    positional.push(token);
  }

  return {
    command,
    flags,
    positional,
  };
}

function hasFlag(flags: Map<string, FlagValue>, key: string): boolean {
  return flags.has(key);
}

function appendFlagValue(flags: Map<string, FlagValue>, key: string, value: string): void {
  const previous = flags.get(key);
  if (previous === undefined) {
    flags.set(key, value);
    return;
  }

  if (Array.isArray(previous)) {
    flags.set(key, [...previous, value]);
    return;
  }

  if (typeof previous === "string") {
    flags.set(key, [previous, value]);
    return;
  }

  flags.set(key, value);
}

function getBooleanFlag(flags: Map<string, FlagValue>, key: string): boolean {
  const value = flags.get(key);
  if (value === undefined) {
    return false;
  }

  if (typeof value === "boolean") {
    return value;
  }

  const candidate = Array.isArray(value) ? value.at(-1) : value;
  if (candidate === "true") {
    return true;
  }
  if (candidate === "false") {
    return false;
  }

  throw createArgumentError("E_ARG_INVALID", `--${key} must be true or false`, {
    arg: key,
    value: candidate,
  });
}

function getRequiredPositional(parsed: ParsedArgs, index: number, name: string): string {
  const value = parsed.positional[index];
  if (value === undefined || value.trim().length === 0) {
    throw createArgumentError("E_ARG_MISSING", `<${name}> is required`, {
      arg: name,
    });
  }

  return value;
}

function getRequiredString(flags: Map<string, FlagValue>, key: string): string {
  const value = getOptionalString(flags, key);
  if (value === undefined) {
    throw createArgumentError("E_ARG_MISSING", `--${key} is required`, {
      arg: key,
    });
  }

  return value;
}

function getOptionalString(flags: Map<string, FlagValue>, key: string): string | undefined {
  const value = flags.get(key);
  if (value === undefined || typeof value === "boolean") {
    return undefined;
  }

  if (Array.isArray(value)) {
    const candidate = value.at(-1);
    return candidate !== undefined && candidate.trim().length > 0 ? candidate : undefined;
  }

  return value.trim().length > 0 ? value : undefined;
}

function getOptionalPositiveInteger(
  flags: Map<string, FlagValue>,
  key: string,
): number | undefined {
  const value = getOptionalString(flags, key);
  if (value === undefined) {
    return undefined;
  }

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw createArgumentError("E_ARG_INVALID", `--${key} must be a positive integer`, {
      arg: key,
      value,
    });
  }
  return parsed;
}

function renderHelp(command?: string): string {
  if (command === "prepare") {
    const metadata = getAhdMetadata();
    return [
      "ahd prepare",
      "",
      "Usage:",
      "  ahd prepare <media> <output_form> --imdb <tt-id> [--passkey <key>] [--type <Movies|TV-Shows>] [--media-type <type>] [--codec <codec>] [--group <name>] [--user-release] [--special-edition <label>] [--num-screens <n, default 4>] [--json]",
      "Notes:",
      "  --type, --media-type, --codec and --group are detected from the file name when omitted.",
      "  The passkey doubles as the screenshot gallery API key.",
      "Values:",
      `  --type        ${metadata.contentTypes.join(", ")}`,
      `  --media-type  ${metadata.mediaTypes.join(", ")}`,
      `  --codec       ${metadata.codecs.join(", ")}`,
      `  Known editions: ${metadata.knownEditions.join(", ")}`,
    ].join("\n");
  }

  if (command === "examine") {
    return ["ahd examine", "", "Usage:", "  ahd examine <input_form> [--json]"].join("\n");
  }

  if (command === "upload") {
    return [
      "ahd upload",
      "",
      "Usage:",
      "  ahd upload <input_form> [--cookies <netscape-cookie-file>] [--delete-on-success] [--json]",
      "Notes:",
      "  Prints the download link of the new torrent, or the landing page when it cannot be found.",
    ].join("\n");
  }

  if (command === "version") {
    return ["ahd version", "", "Usage:", "  ahd version [--json]"].join("\n");
  }

  if (command === "doctor") {
    return ["ahd doctor", "", "Usage:", "  ahd doctor [--json]"].join("\n");
  }

  return [
    "ahd CLI",
    "",
    "Usage:",
    "  ahd [--help|-h] [--version|-V]",
    "  ahd help [command]",
    "  ahd version [--json]",
    "  ahd prepare <media> <output_form> --imdb <tt-id> [--passkey <key>] [options] [--json]",
    "  ahd examine <input_form> [--json]",
    "  ahd upload <input_form> [--cookies <file>] [--delete-on-success] [--json]",
    "  ahd doctor [--json]",
    "",
    "Config priority:",
    "  CLI flags > ENV > ./.ahdrc.json > ~/.config/ahd-uploader/config.json",
    "",
    "Flags:",
    "  -h, --help    Show help",
    "  -V, --version Show CLI version",
    "  --json        Output CliEnvelope JSON",
    "  --base-url    Tracker base URL",
    "  --gallery-url Screenshot gallery base URL",
    "  --timeout-ms  HTTP timeout in milliseconds",
    "  -v, --verbose Log debug lines",
  ].join("\n");
}

function loadVersionInfo(): VersionInfo {
  const fallback: VersionInfo = {
    name: "ahd-uploader",
    version: "0.0.0",
  };

  let pkg: unknown;
  try {
    pkg = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf8"));
  } catch {
    return fallback;
  }

  if (typeof pkg !== "object" || pkg === null) {
    return fallback;
  }

  return {
    name: "name" in pkg && typeof pkg.name === "string" ? pkg.name : fallback.name,
    version: "version" in pkg && typeof pkg.version === "string" ? pkg.version : fallback.version,
  };
}

function createArgumentError(
  code: "E_ARG_INVALID" | "E_ARG_MISSING" | "E_ARG_CONFLICT" | "E_ARG_UNSUPPORTED",
  message: string,
  details?: unknown,
): CliAppError {
  return new CliAppError({
    code,
    message,
    details,
  });
}

function formatHumanError(error: CliAppError): string {
  const details = error.details === undefined ? "" : `\nDetails: ${JSON.stringify(error.details)}`;
  return `Error (${error.code}): ${error.message}${details}\n`;
}
