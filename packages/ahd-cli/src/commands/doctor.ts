import { CliAppError, toCliAppError, type CliErrorCode } from "ahd-cli-core";

import { readNetscapeCookieFile } from "../domain/auth/cookies.js";
import {
  getGlobalConfigPath,
  getProjectConfigPath,
  readJsonFile,
  resolveConfig,
  type FlagValue,
  type ResolvedConfig,
} from "../domain/config.js";
import {
  DEFAULT_TOOL_BINARIES,
  TOOL_NAMES,
  TOOL_NOT_FOUND_EXIT_CODE,
  type ProcessRunner,
  type ToolName,
} from "../domain/process/runner.js";

type DoctorLevel = "info" | "warn" | "error";

export interface DoctorCheck {
  id: string;
  level: DoctorLevel;
  ok: boolean;
  message: string;
  details?: unknown;
  errorCode?: CliErrorCode;
}

export interface DoctorSummary {
  total: number;
  infos: number;
  warnings: number;
  errors: number;
}

export interface DoctorCommandOutput {
  checks: DoctorCheck[];
  summary: DoctorSummary;
}

export interface DoctorCommandInput {
  cwd: string;
  env: NodeJS.ProcessEnv;
  homeDir?: string;
  nodeVersion?: string;
  now: Date;
  getFlag?: (key: string) => FlagValue;
}

const MIN_NODE_VERSION = "20.0.0";

const VERSION_ARGS: Record<ToolName, string[]> = {
  mktorrent: ["-h"],
  mediainfo: ["--Version"],
  ffprobe: ["-version"],
  ffmpeg: ["-version"],
};

export async function runDoctorCommand(
  runner: ProcessRunner,
  input: DoctorCommandInput,
): Promise<DoctorCommandOutput> {
  const checks: DoctorCheck[] = [];

  checks.push(checkNodeVersion(input.nodeVersion ?? process.versions.node));
  checks.push(await checkJsonFile("project-config", getProjectConfigPath(input.cwd)));
  checks.push(await checkJsonFile("global-config", getGlobalConfigPath(input.homeDir)));

  let resolved: ResolvedConfig | undefined;
  try {
    resolved = await resolveConfig({
      cwd: input.cwd,
      env: input.env,
      homeDir: input.homeDir,
      getFlag: input.getFlag ?? (() => undefined),
    });
  } catch (error) {
    const appError = toCliAppError(error);
    checks.push({
      id: "config",
      level: "error",
      ok: false,
      message: appError.message,
      details: appError.details,
      errorCode: appError.code,
    });
  }

  if (resolved !== undefined) {
    checks.push(await checkCookies(resolved, input.now));
  }

  const tools = resolved?.tools ?? DEFAULT_TOOL_BINARIES;
  for (const tool of TOOL_NAMES) {
    checks.push(await checkTool(runner, tool, tools[tool]));
  }

  return {
    checks,
    summary: summarizeChecks(checks),
  };
}

export function getDoctorFailureCode(report: DoctorCommandOutput): CliErrorCode | undefined {
  const firstError = report.checks.find((check) => check.level === "error");
  return firstError?.errorCode ?? (firstError ? "E_UNKNOWN" : undefined);
}

export function renderDoctorOutput(report: DoctorCommandOutput): string {
  const lines: string[] = [
    `Doctor summary: ${report.summary.errors} error(s), ${report.summary.warnings} warning(s), ${report.summary.infos} info`,
  ];

  for (const check of report.checks) {
    lines.push(`[${check.level}] ${check.id}: ${check.message}`);
  }

  return lines.join("\n");
}

async function checkCookies(config: ResolvedConfig, now: Date): Promise<DoctorCheck> {
  if (config.cookies === undefined) {
    return {
      id: "cookies",
      level: "warn",
      ok: false,
      message: "No cookie file configured; `upload` needs one.",
      details: {
        hint: "Pass --cookies <file>, set AHD_COOKIES, or add `cookies` to .ahdrc.json.",
      },
    };
  }

  try {
    const header = await readNetscapeCookieFile(config.cookies, {
      host: new URL(config.baseUrl).hostname,
      now,
    });
    return {
      id: "cookies",
      level: "info",
      ok: true,
      message: `Cookie file has ${header.split("; ").length} live cookie(s): ${config.cookies}`,
    };
  } catch (error) {
    const appError = toCliAppError(error);
    return {
      id: "cookies",
      level: "error",
      ok: false,
      message: appError.message,
      details: appError.details,
      errorCode: appError.code,
    };
  }
}

async function checkTool(runner: ProcessRunner, tool: ToolName, binary: string): Promise<DoctorCheck> {
  const id = `tool:${tool}`;
  try {
    const result = await runner.run(binary, VERSION_ARGS[tool]);
    if (result.exitCode === TOOL_NOT_FOUND_EXIT_CODE) {
      return {
        id,
        level: "error",
        ok: false,
        message: `${binary} is not installed or not in PATH`,
        errorCode: "E_TOOL_MISSING",
      };
    }
  } catch (error) {
    const appError =
      error instanceof CliAppError
        ? error
        : new CliAppError({
            code: "E_TOOL_FAILED",
            message: `${binary} could not be started`,
            details: { reason: error instanceof Error ? error.message : String(error) },
            cause: error,
          });
    return {
      id,
      level: "error",
      ok: false,
      message: appError.message,
      details: appError.details,
      errorCode: appError.code,
    };
  }

  return {
    id,
    level: "info",
    ok: true,
    message: `${binary} is available`,
  };
}

function summarizeChecks(checks: DoctorCheck[]): DoctorSummary {
  let infos = 0;
  let warnings = 0;
  let errors = 0;

  for (const check of checks) {
    if (check.level === "info") {
      infos += 1;
      continue;
    }
    if (check.level === "warn") {
      warnings += 1;
      continue;
    }
    errors += 1;
  }

  return {
    total: checks.length,
    infos,
    warnings,
    errors,
  };
}

function checkNodeVersion(current: string): DoctorCheck {
  if (compareSemver(current, MIN_NODE_VERSION) >= 0) {
    return {
      id: "node-version",
      level: "info",
      ok: true,
      message: `Node.js ${current} satisfies >= ${MIN_NODE_VERSION}.`,
    };
  }

  return {
    id: "node-version",
    level: "error",
    ok: false,
    message: `Node.js ${current} is below required >= ${MIN_NODE_VERSION}.`,
    errorCode: "E_UNKNOWN",
  };
}

async function checkJsonFile(id: string, path: string): Promise<DoctorCheck> {
  try {
    const content = await readJsonFile(path);
    return {
      id,
      level: "info",
      ok: true,
      message: content === undefined ? `Optional file not found: ${path}` : `Readable JSON: ${path}`,
    };
  } catch (error) {
    const appError = toCliAppError(error);
    return {
      id,
      level: "error",
      ok: false,
      message: `Invalid or unreadable JSON: ${path}`,
      details: appError.details,
      errorCode: appError.code,
    };
  }
}

function compareSemver(a: string, b: string): number {
  const aParts = parseSemver(a);
  const bParts = parseSemver(b);

  for (let index = 0; index < 3; index += 1) {
    const delta = (aParts[index] ?? 0) - (bParts[index] ?? 0);
    if (delta !== 0) {
      return delta > 0 ? 1 : -1;
    }
  }

  return 0;
}

function parseSemver(value: string): number[] {
  return value
    .replace(/^v/, "")
    .split(".")
    .slice(0, 3)
    .map((part) => Number.parseInt(part, 10))
    .map((part) => (Number.isFinite(part) ? part : 0));
}
