export const AHD_CONTENT_TYPES = ["Movies", "TV-Shows"] as const;

export const AHD_MEDIA_TYPES = [
  "Blu-ray",
  "HD-DVD",
  "HDTV",
  "WEB-DL",
  "WEBRip",
  "DTheater",
  "XDCAM",
  "UHD Blu-ray",
] as const;

export const AHD_CODECS = [
  "x264",
  "VC-1 Remux",
  "h.264 Remux",
  "MPEG2 Remux",
  "h.265 Remux",
  "x265",
] as const;

export const AHD_KNOWN_EDITIONS = [
  "Director's Cut",
  "Unrated",
  "Extended Edition",
  "2 in 1",
  "The Criterion Collection",
] as const;

export type AhdContentType = (typeof AHD_CONTENT_TYPES)[number];
export type AhdMediaType = (typeof AHD_MEDIA_TYPES)[number];
export type AhdCodec = (typeof AHD_CODECS)[number];
export type AhdKnownEdition = (typeof AHD_KNOWN_EDITIONS)[number];

export const UNKNOWN_GROUP = "UNKNOWN";
export const AUTO_DETECT = "AUTO-DETECT";
export const DEFAULT_REMASTER_TITLE: AhdKnownEdition = "Director's Cut";
export const DEFAULT_SCREENSHOT_COUNT = 4;

function includes<T extends string>(values: readonly T[], value: string): value is T {
  return values.some((candidate) => candidate === value);
}

export function isContentType(value: string): value is AhdContentType {
  return includes(AHD_CONTENT_TYPES, value);
}

export function isMediaType(value: string): value is AhdMediaType {
  return includes(AHD_MEDIA_TYPES, value);
}

export function isCodec(value: string): value is AhdCodec {
  return includes(AHD_CODECS, value);
}

export function isKnownEdition(value: string): value is AhdKnownEdition {
  return includes(AHD_KNOWN_EDITIONS, value);
}

export function getAhdMetadata() {
  return {
    contentTypes: AHD_CONTENT_TYPES,
    mediaTypes: AHD_MEDIA_TYPES,
    codecs: AHD_CODECS,
    knownEditions: AHD_KNOWN_EDITIONS,
  };
}
