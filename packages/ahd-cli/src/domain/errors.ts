import { CliAppError } from "ahd-cli-core";

export class DetectionError extends CliAppError {
  public constructor(message: string, details?: unknown) {
    super({ code: "E_DETECTION", message, details });
  }
}

export class ValidationError extends CliAppError {
  public constructor(message: string, details?: unknown) {
    super({ code: "E_VALIDATION", message, details });
  }
}

export class ToolMissingError extends CliAppError {
  public constructor(tool: string) {
    super({
      code: "E_TOOL_MISSING",
      message: `${tool} is not installed or not in PATH`,
      details: { tool },
    });
  }
}

export class ToolError extends CliAppError {
  public constructor(tool: string, exitCode: number, output: string) {
    super({
      code: "E_TOOL_FAILED",
      message: `${tool} exited with code ${exitCode}`,
      details: { tool, exitCode, output },
    });
  }
}

export class UploadError extends CliAppError {
  public constructor(message: string, details?: unknown) {
    super({ code: "E_UPSTREAM_UPLOAD", message, details });
  }
}

export class SubmissionError extends CliAppError {
  public constructor(status: number) {
    super({
      code: "E_UPSTREAM_SUBMISSION",
      message:
        "Upload form submission failed. Check the tracker to verify that no malformed or incorrect torrent was uploaded.",
      details: { status },
    });
  }
}

/** The upload response did not identify the torrent just submitted. */
export class ExtractionError extends CliAppError {
  public constructor(message: string, details?: unknown) {
    super({ code: "E_UPSTREAM_BAD_RESPONSE", message, details });
  }
}

export class CorruptFormError extends CliAppError {
  public constructor(path: string, reason: string, cause?: unknown) {
    super({
      code: "E_FORM_CORRUPT",
      message: `Upload form is unreadable: ${path}`,
      details: { path, reason },
      cause,
    });
  }
}
