interface WritableLike {
  write: (chunk: string) => unknown;
}

export interface LoggerOptions {
  stream: WritableLike;
  scope: string;
  verbose?: boolean;
  /** Drop every line, e.g. when stdout carries a JSON envelope. */
  silent?: boolean;
}

export interface Logger {
  info(message: string): void;
  debug(message: string): void;
  child(scope: string): Logger;
}

export function createLogger(options: LoggerOptions): Logger {
  const write = (message: string): void => {
    if (options.silent) {
      return;
    }
    options.stream.write(`[${options.scope}] ${message}\n`);
  };

  return {
    info: write,
    debug(message: string): void {
      if (options.verbose) {
        write(message);
      }
    },
    child(scope: string): Logger {
      return createLogger({ ...options, scope: `${options.scope}:${scope}` });
    },
  };
}
