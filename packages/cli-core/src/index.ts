export { createCommandContext, type CommandContext, type CommandContextOptions } from "./context.js";
export {
  createErrorEnvelope,
  createSuccessEnvelope,
  type CliEnvelope,
  type ErrorEnvelope,
  type Meta,
  type SuccessEnvelope,
} from "./envelope.js";
export { CliAppError, toCliAppError, type CliAppErrorInput, type CliErrorCode } from "./errors.js";
export { EXIT_CODES, mapErrorCodeToExitCode, type ExitCode } from "./exit-codes.js";
export { createLogger, type Logger, type LoggerOptions } from "./logger.js";
