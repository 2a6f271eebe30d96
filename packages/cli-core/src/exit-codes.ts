import type { CliErrorCode } from "./errors.js";

export const EXIT_CODES = {
  SUCCESS: 0,
  UNKNOWN_ERROR: 1,
  ARGUMENT_ERROR: 2,
  AUTH_OR_CONFIG_ERROR: 3,
  NOT_FOUND: 4,
  UPSTREAM_ERROR: 5,
  TOOL_ERROR: 6,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export function mapErrorCodeToExitCode(code: CliErrorCode): ExitCode {
  if (code.startsWith("E_ARG_") || code === "E_VALIDATION" || code === "E_DETECTION") {
    return EXIT_CODES.ARGUMENT_ERROR;
  }

  if (code.startsWith("E_AUTH_") || code === "E_CONFIG_INVALID") {
    return EXIT_CODES.AUTH_OR_CONFIG_ERROR;
  }

  // Corrupt forms share the not-found exit code.
  if (code.startsWith("E_NOT_FOUND_") || code === "E_FORM_CORRUPT") {
    return EXIT_CODES.NOT_FOUND;
  }

  if (code.startsWith("E_UPSTREAM_")) {
    return EXIT_CODES.UPSTREAM_ERROR;
  }

  if (code.startsWith("E_TOOL_")) {
    return EXIT_CODES.TOOL_ERROR;
  }

  return EXIT_CODES.UNKNOWN_ERROR;
}
