import type { CliErrorCode } from "./errors.js";

export interface Meta {
  requestId: string;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  verbose: boolean;
}

export interface SuccessEnvelope<T> {
  ok: true;
  data: T;
  meta: Meta;
}

export interface ErrorEnvelope {
  ok: false;
  error: {
    code: CliErrorCode;
    message: string;
    details?: unknown;
  };
}

export type CliEnvelope<T> = SuccessEnvelope<T> | ErrorEnvelope;

export function createSuccessEnvelope<T>(data: T, meta: Meta): SuccessEnvelope<T> {
  return {
    ok: true,
    data,
    meta,
  };
}

export function createErrorEnvelope(
  code: CliErrorCode,
  message: string,
  details?: unknown,
): ErrorEnvelope {
  const error: ErrorEnvelope["error"] = { code, message };
  if (details !== undefined) {
    error.details = details;
  }

  return {
    ok: false,
    error,
  };
}
