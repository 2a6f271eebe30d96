export type CliErrorCode =
  | "E_ARG_INVALID"
  | "E_ARG_MISSING"
  | "E_ARG_CONFLICT"
  | "E_ARG_UNSUPPORTED"
  | "E_VALIDATION"
  | "E_DETECTION"
  | "E_AUTH_REQUIRED"
  | "E_AUTH_INVALID"
  | "E_CONFIG_INVALID"
  | "E_NOT_FOUND_RESOURCE"
  | "E_FORM_CORRUPT"
  | "E_TOOL_MISSING"
  | "E_TOOL_FAILED"
  | "E_UPSTREAM_NETWORK"
  | "E_UPSTREAM_TIMEOUT"
  | "E_UPSTREAM_BAD_RESPONSE"
  | "E_UPSTREAM_UPLOAD"
  | "E_UPSTREAM_SUBMISSION"
  | "E_UNKNOWN";

export interface CliAppErrorInput {
  code: CliErrorCode;
  message: string;
  details?: unknown;
  cause?: unknown;
}

export class CliAppError extends Error {
  public readonly code: CliErrorCode;
  public readonly details?: unknown;

  public constructor(input: CliAppErrorInput) {
    super(input.message, input.cause === undefined ? undefined : { cause: input.cause });
    this.name = new.target.name;
    this.code = input.code;
    this.details = input.details;
  }
}

export function toCliAppError(error: unknown): CliAppError {
  if (error instanceof CliAppError) {
    return error;
  }

  if (error instanceof Error) {
    return new CliAppError({
      code: "E_UNKNOWN",
      message: error.message,
      details: { name: error.name },
      cause: error,
    });
  }

  return new CliAppError({
    code: "E_UNKNOWN",
    message: "Unknown error",
    details: error,
  });
}
