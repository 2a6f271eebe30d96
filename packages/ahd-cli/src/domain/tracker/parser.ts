import { ExtractionError } from "../errors.js";
import type { TorrentRow, UploadResponsePage } from "../types.js";

/** Uploads older than this are not considered the one just submitted. */
export const RECENT_UPLOAD_WINDOW_MS = 2 * 60 * 1000;

const MONTHS: Record<string, number> = {
  jan: 0,
  feb: 1,
  mar: 2,
  apr: 3,
  may: 4,
  jun: 5,
  jul: 6,
  aug: 7,
  sep: 8,
  oct: 9,
  nov: 10,
  dec: 11,
};

export function parseUploadResponse(html: string): UploadResponsePage {
  const userId = /var\s+userid\s*=\s*(\d+)\s*;/i.exec(html)?.[1];
  const authKey = /var\s+authkey\s*=\s*"([^"]*)"\s*;/i.exec(html)?.[1];
  const passkey = /passkey=([^&"'\s]+)&/i.exec(html)?.[1];

  if (userId === undefined || authKey === undefined || passkey === undefined) {
    throw new ExtractionError("Upload response is missing session variables", {
      userId: userId !== undefined,
      authKey: authKey !== undefined,
      passkey: passkey !== undefined,
    });
  }

  return {
    userId,
    authKey,
    passkey,
    rows: extractTorrentRows(html),
  };
}

/** Parses `MMM DD YYYY, HH:mm` as UTC. */
export function parseTimestamp(value: string): Date | undefined {
  const match = /^\s*([A-Za-z]{3})\s+(\d{1,2})\s+(\d{4}),\s*(\d{1,2}):(\d{2})\s*$/.exec(value);
  if (match === null) {
    return undefined;
  }

  const month = MONTHS[match[1].toLowerCase()];
  if (month === undefined) {
    return undefined;
  }

  const day = Number.parseInt(match[2], 10);
  const year = Number.parseInt(match[3], 10);
  const hours = Number.parseInt(match[4], 10);
  const minutes = Number.parseInt(match[5], 10);
  if (day < 1 || day > 31 || hours > 23 || minutes > 59) {
    return undefined;
  }

  return new Date(Date.UTC(year, month, day, hours, minutes));
}

export function selectRecentUpload(page: UploadResponsePage, now: Date): TorrentRow {
  let latest: { row: TorrentRow; uploadedAt: Date } | undefined;
  for (const row of page.rows) {
    if (row.ownerId !== page.userId || row.uploadedAt === undefined) {
      continue;
    }
    if (latest === undefined || row.uploadedAt.getTime() > latest.uploadedAt.getTime()) {
      latest = { row, uploadedAt: row.uploadedAt };
    }
  }

  if (latest === undefined) {
    throw new ExtractionError("No torrent owned by the uploader was found", {
      userId: page.userId,
    });
  }

  const age = Math.abs(now.getTime() - latest.uploadedAt.getTime());
  if (age >= RECENT_UPLOAD_WINDOW_MS) {
    throw new ExtractionError("Latest torrent owned by the uploader is not recent", {
      torrentId: latest.row.torrentId,
      uploadedAt: latest.uploadedAt.toISOString(),
    });
  }

  return latest.row;
}

export interface DownloadLinkParts {
  torrentId: string;
  authKey: string;
  passkey: string;
}

export function buildDownloadUrl(baseUrl: string, parts: DownloadLinkParts): string {
  const root = baseUrl.replace(/\/+$/, "");
  return `${root}/torrents.php?action=download&id=${parts.torrentId}&authkey=${parts.authKey}&torrent_pass=${parts.passkey}`;
}

export function extractDownloadLink(
  html: string,
  now: Date,
  baseUrl: string,
): { url: string; torrentId: string } {
  const page = parseUploadResponse(html);
  const row = selectRecentUpload(page, now);
  return {
    torrentId: row.torrentId,
    url: buildDownloadUrl(baseUrl, {
      torrentId: row.torrentId,
      authKey: page.authKey,
      passkey: page.passkey,
    }),
  };
}

function extractTorrentRows(html: string): TorrentRow[] {
  const rows: TorrentRow[] = [];
  const opener = /<([a-zA-Z][a-zA-Z0-9]*)\b([^>]*)>/g;

  for (const match of html.matchAll(opener)) {
    const tagName = match[1];
    const attributes = parseTagAttributes(match[2] ?? "");
    const torrentId = /^torrent_(\d+)/.exec(attributes.id ?? "")?.[1];
    if (torrentId === undefined) {
      continue;
    }

    const start = match.index ?? 0;
    const end = findMatchingTagEnd(html, start, tagName) ?? html.length;
    const block = html.slice(start, end);

    const ownerId = /user\.php\?id=(\d+)"/i.exec(block)?.[1];
    const spanMatch = /<span\b([^>]*)>/i.exec(block);
    const title = spanMatch === null ? undefined : parseTagAttributes(spanMatch[1] ?? "").title;

    rows.push({
      torrentId,
      ownerId,
      uploadedAt: title === undefined ? undefined : parseTimestamp(title),
    });
  }

  return rows;
}

function findMatchingTagEnd(html: string, startIndex: number, tagName: string): number | undefined {
  const tagPattern = new RegExp(`<\\/?${tagName}\\b[^>]*>`, "gi");
  tagPattern.lastIndex = startIndex;

  let depth = 0;
  for (let match = tagPattern.exec(html); match !== null; match = tagPattern.exec(html)) {
    const tag = match[0];
    if (tag.startsWith("</")) {
      depth -= 1;
      if (depth === 0) {
        return match.index + tag.length;
      }
      continue;
    }

    if (!tag.endsWith("/>")) {
      depth += 1;
    }
  }

  return undefined;
}

function parseTagAttributes(raw: string): Record<string, string> {
  const attributes: Record<string, string> = {};
  const matcher = /([a-zA-Z_:][-a-zA-Z0-9_:.]*)\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s"'>]+))/g;

  for (const match of raw.matchAll(matcher)) {
    const key = match[1]?.toLowerCase();
    if (key === undefined) {
      continue;
    }

    const value = match[2] ?? match[3] ?? match[4] ?? "";
    attributes[key] = decodeHtmlEntities(value);
  }

  return attributes;
}

function decodeHtmlEntities(value: string): string {
  return value
    .replace(/&nbsp;/gi, " ")
    .replace(/&amp;/gi, "&")
    .replace(/&quot;/gi, '"')
    .replace(/&#39;/gi, "'")
    .replace(/&lt;/gi, "<")
    .replace(/&gt;/gi, ">")
    .replace(/&#x([\da-fA-F]+);/g, (_, hex: string) => String.fromCodePoint(Number.parseInt(hex, 16)))
    .replace(/&#(\d+);/g, (_, num: string) => String.fromCodePoint(Number.parseInt(num, 10)));
}
