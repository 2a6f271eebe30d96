import { CliAppError } from "ahd-cli-core";

export interface HttpSessionOptions {
  baseUrl: string;
  timeoutMs: number;
  /** Upstream name used in error messages. */
  label: string;
  fetchImpl?: typeof fetch;
  /** `Cookie` header sent on requests that ask for it. */
  cookie?: string;
}

export interface SessionRequestOptions {
  pathOrUrl: string;
  method?: "GET" | "POST";
  body?: string | FormData;
  headers?: Headers | Array<[string, string]> | Record<string, string>;
  includeAuthCookie?: boolean;
  redirect?: "follow" | "manual" | "error";
}

const DEFAULT_TIMEOUT_MS = 60_000;
const USER_AGENT = "ahd-uploader";

export class HttpSession {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly label: string;
  private readonly fetchImpl: typeof fetch;
  private readonly cookie: string | undefined;

  public constructor(options: HttpSessionOptions) {
    this.baseUrl = normalizeBaseUrl(options.baseUrl);
    this.timeoutMs = sanitizeTimeout(options.timeoutMs);
    this.label = options.label;
    this.fetchImpl = options.fetchImpl ?? globalThis.fetch;
    this.cookie = options.cookie?.trim() || undefined;

    if (typeof this.fetchImpl !== "function") {
      throw new CliAppError({
        code: "E_UNKNOWN",
        message: "Global fetch is unavailable. Use Node 20+ or provide fetchImpl.",
      });
    }
  }

  public resolve(pathOrUrl: string): URL {
    return resolveUrl(this.baseUrl, pathOrUrl);
  }

  public async fetch(options: SessionRequestOptions): Promise<Response> {
    const headers = new Headers(options.headers);

    if (options.includeAuthCookie && this.cookie !== undefined) {
      headers.set("cookie", this.cookie);
    }

    if (!headers.has("user-agent")) {
      headers.set("user-agent", USER_AGENT);
    }

    const url = this.resolve(options.pathOrUrl);
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(url, {
        method: options.method,
        headers,
        body: options.body,
        redirect: options.redirect,
        signal: controller.signal,
      });

      return response;
    } catch (error) {
      if (error instanceof CliAppError) {
        throw error;
      }

      if (error instanceof Error && error.name === "AbortError") {
        throw new CliAppError({
          code: "E_UPSTREAM_TIMEOUT",
          message: `${this.label} request timed out after ${this.timeoutMs}ms`,
          details: {
            url: url.toString(),
          },
        });
      }

      throw new CliAppError({
        code: "E_UPSTREAM_NETWORK",
        message: `Failed to reach ${this.label}`,
        details: {
          url: url.toString(),
          reason: error instanceof Error ? error.message : String(error),
        },
        cause: error,
      });
    } finally {
      clearTimeout(timeout);
    }
  }
}

function sanitizeTimeout(timeoutMs: number | undefined): number {
  if (timeoutMs === undefined || !Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return DEFAULT_TIMEOUT_MS;
  }

  return Math.floor(timeoutMs);
}

export function normalizeBaseUrl(baseUrl: string): string {
  const normalized = baseUrl.trim();
  return normalized.endsWith("/") ? normalized : `${normalized}/`;
}

function resolveUrl(baseUrl: string, pathOrUrl: string): URL {
  if (/^https?:\/\//i.test(pathOrUrl)) {
    return new URL(pathOrUrl);
  }

  return new URL(pathOrUrl, baseUrl);
}
