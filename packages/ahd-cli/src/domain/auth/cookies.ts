import { readFile } from "node:fs/promises";

import { CliAppError } from "ahd-cli-core";

export interface NetscapeCookie {
  domain: string;
  includeSubdomains: boolean;
  path: string;
  secure: boolean;
  /** Unix seconds; 0 marks a session cookie. */
  expires: number;
  name: string;
  value: string;
}

export interface CookieFileOptions {
  host: string;
  now: Date;
}

const HTTP_ONLY_PREFIX = "#HttpOnly_";

export function parseNetscapeCookies(content: string): NetscapeCookie[] {
  const cookies: NetscapeCookie[] = [];

  for (const rawLine of content.split(/\r?\n/)) {
    let line = rawLine.trim();
    if (line.length === 0) {
      continue;
    }

    if (line.startsWith(HTTP_ONLY_PREFIX)) {
      line = line.slice(HTTP_ONLY_PREFIX.length);
    } else if (line.startsWith("#")) {
      continue;
    }

    const columns = line.split("\t");
    if (columns.length !== 7) {
      continue;
    }

    const [domain, includeSubdomains, path, secure, expires, name, value] = columns;
    const expiresAt = Number.parseInt(expires, 10);
    if (name.length === 0 || !Number.isFinite(expiresAt)) {
      continue;
    }

    cookies.push({
      domain: domain.toLowerCase(),
      includeSubdomains: includeSubdomains.toUpperCase() === "TRUE",
      path,
      secure: secure.toUpperCase() === "TRUE",
      expires: expiresAt,
      name,
      value,
    });
  }

  return cookies;
}

export function cookieMatchesHost(cookie: NetscapeCookie, host: string): boolean {
  const target = host.toLowerCase();
  const domain = cookie.domain.startsWith(".") ? cookie.domain.slice(1) : cookie.domain;
  return target === domain || target.endsWith(`.${domain}`);
}

export function isCookieLive(cookie: NetscapeCookie, now: Date): boolean {
  return cookie.expires === 0 || cookie.expires * 1000 > now.getTime();
}

export async function readNetscapeCookieFile(
  path: string,
  options: CookieFileOptions,
): Promise<string> {
  let content: string;
  try {
    content = await readFile(path, "utf8");
  } catch (error) {
    throw new CliAppError({
      code: "E_AUTH_REQUIRED",
      message: `Cookie file could not be read: ${path}`,
      details: {
        path,
        reason: error instanceof Error ? error.message : String(error),
      },
      cause: error,
    });
  }

  const header = parseNetscapeCookies(content)
    .filter((cookie) => cookieMatchesHost(cookie, options.host) && isCookieLive(cookie, options.now))
    .map((cookie) => `${cookie.name}=${cookie.value}`)
    .join("; ");

  if (header.length === 0) {
    throw new CliAppError({
      code: "E_AUTH_REQUIRED",
      message: `Cookie file has no live cookies for ${options.host}`,
      details: { path, host: options.host },
    });
  }

  return header;
}

export function maskCookieValue(value: string, visible = 4): string {
  if (value.length <= visible) {
    return "*".repeat(value.length);
  }

  return `${value.slice(0, visible)}${"*".repeat(Math.max(4, value.length - visible))}`;
}

export function maskCookieHeader(cookieHeader: string): string {
  return cookieHeader
    .split(";")
    .map((part) => part.trim())
    .filter((part) => part.includes("="))
    .map((part) => {
      const eqIndex = part.indexOf("=");
      return `${part.slice(0, eqIndex)}=${maskCookieValue(part.slice(eqIndex + 1))}`;
    })
    .join("; ");
}
