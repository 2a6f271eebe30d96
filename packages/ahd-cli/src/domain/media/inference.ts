import {
  AHD_CODECS,
  AHD_CONTENT_TYPES,
  AHD_MEDIA_TYPES,
  isCodec,
  isContentType,
  isMediaType,
  type AhdCodec,
  type AhdContentType,
  type AhdMediaType,
} from "../ahd-metadata.js";
import { DetectionError, ValidationError } from "../errors.js";
import type { Detectable, UploadAttributes, UploadRequest } from "../types.js";
import { inspectPath, resolveMediaEntry, stemOf, type MediaEntry } from "./entry.js";

const SEASON_MARKER = ".S0";

export function detectContentType(name: string): AhdContentType {
  return name.includes(SEASON_MARKER) ? "TV-Shows" : "Movies";
}

export function detectMediaType(name: string): AhdMediaType {
  if (name.includes("UHD.BluRay")) {
    return "UHD Blu-ray";
  }
  if (name.includes("BluRay")) {
    return "Blu-ray";
  }

  const found = AHD_MEDIA_TYPES.find((mediaType) => name.includes(mediaType));
  if (found === undefined) {
    throw new DetectionError(`Unable to detect media type from "${name}". Pass --media-type.`, {
      name,
      allowed: AHD_MEDIA_TYPES,
    });
  }
  return found;
}

/** Returns an empty string when no codec literal is present. */
export function detectCodec(name: string): AhdCodec | "" {
  return AHD_CODECS.find((codec) => name.includes(codec)) ?? "";
}

/** Maps WEB-DL encoder names onto their remux codec. */
export function normalizeWebCodec(codec: string, inputName: string): string {
  let normalized = codec;
  if (normalized === "x264" || inputName.includes("H.264")) {
    normalized = "h.264 Remux";
  }
  if (normalized === "x265" || inputName.includes("H.265") || inputName.includes("HEVC")) {
    normalized = "h.265 Remux";
  }
  return normalized;
}

export function detectGroup(entry: MediaEntry): string {
  const parts = stemOf(entry).split("-");
  return parts[parts.length - 1] ?? "";
}

export function detectStreamingEdition(name: string): string | undefined {
  let edition: string | undefined;
  if (name.includes("AMZN")) {
    edition = "Amazon";
  }
  if (name.includes("Netflix") || name.includes(".NF.")) {
    edition = "Netflix";
  }
  return edition;
}

export async function resolveUploadAttributes(request: UploadRequest): Promise<UploadAttributes> {
  const input = await inspectPath(request.mediaPath);
  let entry: MediaEntry | undefined;
  const getEntry = async (): Promise<MediaEntry> => {
    entry ??= await resolveMediaEntry(request.mediaPath);
    return entry;
  };

  const contentType = resolveDetectable(request.contentType, () => detectContentType(input.name));

  const group =
    request.group.kind === "explicit" ? request.group.value : detectGroup(await getEntry());

  const mediaType =
    request.mediaType.kind === "explicit"
      ? request.mediaType.value
      : detectMediaType((await getEntry()).name);

  let codec: string;
  if (request.codec.kind === "explicit") {
    codec = request.codec.value;
  } else {
    codec = detectCodec((await getEntry()).name);
    if (mediaType === "WEB-DL") {
      codec = normalizeWebCodec(codec, input.name);
    }
  }

  let specialEdition = request.specialEdition;
  if (contentType === "Movies") {
    specialEdition = detectStreamingEdition(input.name) ?? specialEdition;
  }

  return {
    contentType: expectMember(contentType, isContentType, "type", AHD_CONTENT_TYPES),
    mediaType: expectMember(mediaType, isMediaType, "media type", AHD_MEDIA_TYPES),
    codec: expectMember(codec, isCodec, "codec", AHD_CODECS),
    group,
    specialEdition,
    userRelease: request.userRelease,
    screenshotCount: expectPositiveInteger(request.screenshotCount, "number of screenshots"),
  };
}

function resolveDetectable(value: Detectable<string>, detect: () => string): string {
  return value.kind === "explicit" ? value.value : detect();
}

function expectMember<T extends string>(
  value: string,
  guard: (candidate: string) => candidate is T,
  label: string,
  allowed: readonly T[],
): T {
  if (!guard(value)) {
    throw new ValidationError(
      value.length === 0
        ? `Unable to determine ${label}; pass it explicitly`
        : `Invalid ${label}: ${value}`,
      { value, allowed },
    );
  }
  return value;
}

function expectPositiveInteger(value: number, label: string): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ValidationError(`${label} must be a positive integer`, { value });
  }
  return value;
}
