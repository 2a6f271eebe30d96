import { describe, expect, it } from "vitest";

import { createCommandContext } from "../src/context.js";
import { CliAppError, toCliAppError } from "../src/errors.js";
import { createLogger } from "../src/logger.js";

describe("command context", () => {
  it("builds meta from injected clock, time and request id", () => {
    let tick = 1000;
    const context = createCommandContext({
      clock: () => tick,
      now: () => new Date("2026-02-13T09:00:00.000Z"),
      requestIdFactory: () => "req-context",
      verbose: true,
    });

    tick = 1250;

    expect(context.toMeta()).toEqual({
      requestId: "req-context",
      startedAt: "2026-02-13T09:00:00.000Z",
      finishedAt: "2026-02-13T09:00:00.000Z",
      durationMs: 250,
      verbose: true,
    });
  });
});

describe("toCliAppError", () => {
  it("keeps CliAppError instances", () => {
    const error = new CliAppError({ code: "E_TOOL_FAILED", message: "boom" });
    expect(toCliAppError(error)).toBe(error);
  });

  it("wraps plain errors as unknown", () => {
    const wrapped = toCliAppError(new TypeError("bad"));
    expect(wrapped.code).toBe("E_UNKNOWN");
    expect(wrapped.message).toBe("bad");
    expect(wrapped.details).toEqual({ name: "TypeError" });
  });

  it("wraps non-error values", () => {
    const wrapped = toCliAppError("oops");
    expect(wrapped.message).toBe("Unknown error");
    expect(wrapped.details).toBe("oops");
  });
});

describe("logger", () => {
  it("writes scoped info lines and hides debug unless verbose", () => {
    const lines: string[] = [];
    const stream = { write: (chunk: string) => lines.push(chunk) };

    const quiet = createLogger({ stream, scope: "prepare" });
    quiet.info("creating torrent");
    quiet.debug("hidden");

    const loud = createLogger({ stream, scope: "prepare", verbose: true }).child("screens");
    loud.debug("offset 20");

    expect(lines).toEqual(["[prepare] creating torrent\n", "[prepare:screens] offset 20\n"]);
  });

  it("drops everything when silent", () => {
    const lines: string[] = [];
    const logger = createLogger({
      stream: { write: (chunk: string) => lines.push(chunk) },
      scope: "upload",
      verbose: true,
      silent: true,
    });

    logger.info("submitting");
    logger.debug("cookies loaded");

    expect(lines).toEqual([]);
  });
});
