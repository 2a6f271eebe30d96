import { spawn } from "node:child_process";

import { ToolError, ToolMissingError } from "../errors.js";

export interface ProcessResult {
  exitCode: number;
  stdout: string;
  /** stdout and stderr in arrival order. */
  output: string;
}

export interface ProcessRunner {
  run(tool: string, args: string[]): Promise<ProcessResult>;
}

export const TOOL_NOT_FOUND_EXIT_CODE = 127;

export function createSpawnRunner(): ProcessRunner {
  return {
    run(tool: string, args: string[]): Promise<ProcessResult> {
      return new Promise((resolve, reject) => {
        const child = spawn(tool, args, { stdio: ["ignore", "pipe", "pipe"] });
        // Decoded once on close so multi-byte characters split across reads survive.
        const stdout: Buffer[] = [];
        const output: Buffer[] = [];

        child.stdout.on("data", (chunk: Buffer) => {
          stdout.push(chunk);
          output.push(chunk);
        });
        child.stderr.on("data", (chunk: Buffer) => {
          output.push(chunk);
        });

        child.on("error", (error: NodeJS.ErrnoException) => {
          if (error.code === "ENOENT") {
            resolve({
              exitCode: TOOL_NOT_FOUND_EXIT_CODE,
              stdout: "",
              output: `${tool}: command not found`,
            });
            return;
          }
          reject(error);
        });

        child.on("close", (code, signal) => {
          resolve({
            exitCode: code ?? (signal === null ? 1 : 128),
            stdout: Buffer.concat(stdout).toString("utf8"),
            output: Buffer.concat(output).toString("utf8"),
          });
        });
      });
    },
  };
}

/**
 * Runs a tool and returns its result when it exited cleanly; otherwise throws
 * `ToolMissingError` (exit 127) or `ToolError` with the captured output.
 */
export async function runTool(
  runner: ProcessRunner,
  tool: string,
  args: string[],
): Promise<ProcessResult> {
  const result = await runner.run(tool, args);
  if (result.exitCode === TOOL_NOT_FOUND_EXIT_CODE) {
    throw new ToolMissingError(tool);
  }
  if (result.exitCode !== 0) {
    throw new ToolError(tool, result.exitCode, result.output.trim());
  }
  return result;
}

export const TOOL_NAMES = ["mktorrent", "mediainfo", "ffprobe", "ffmpeg"] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export type ToolBinaries = Record<ToolName, string>;

export const DEFAULT_TOOL_BINARIES: ToolBinaries = {
  mktorrent: "mktorrent",
  mediainfo: "mediainfo",
  ffprobe: "ffprobe",
  ffmpeg: "ffmpeg",
};
