import { randomUUID } from "node:crypto";

import type { Meta } from "./envelope.js";

export interface CommandContextOptions {
  clock?: () => number;
  now?: () => Date;
  requestIdFactory?: () => string;
  verbose?: boolean;
}

export interface CommandContext {
  readonly requestId: string;
  readonly verbose: boolean;
  readonly startedAt: Date;
  now(): Date;
  toMeta(): Meta;
}

export function createCommandContext(options: CommandContextOptions = {}): CommandContext {
  const clock = options.clock ?? (() => performance.now());
  const now = options.now ?? (() => new Date());
  const requestId = (options.requestIdFactory ?? randomUUID)();
  const verbose = options.verbose ?? false;
  const startedAt = now();
  const startedTick = clock();

  return {
    requestId,
    verbose,
    startedAt,
    now,
    toMeta(): Meta {
      const finishedAt = now();
      return {
        requestId,
        startedAt: startedAt.toISOString(),
        finishedAt: finishedAt.toISOString(),
        durationMs: Math.max(0, Math.round(clock() - startedTick)),
        verbose,
      };
    },
  };
}
