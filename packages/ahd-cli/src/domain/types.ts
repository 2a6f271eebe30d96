import type { AhdCodec, AhdContentType, AhdMediaType } from "./ahd-metadata.js";

export type Detectable<T> = { readonly kind: "explicit"; readonly value: T } | { readonly kind: "auto" };

export interface UploadRequest {
  mediaPath: string;
  imdbId: string;
  passkey: string;
  contentType: Detectable<string>;
  mediaType: Detectable<string>;
  codec: Detectable<string>;
  group: Detectable<string>;
  specialEdition?: string;
  userRelease: boolean;
  screenshotCount: number;
}

export interface UploadAttributes {
  contentType: AhdContentType;
  mediaType: AhdMediaType;
  codec: AhdCodec;
  /** `UNKNOWN` marks a release without a known group. */
  group: string;
  specialEdition?: string;
  userRelease: boolean;
  screenshotCount: number;
}

export interface TextField {
  readonly kind: "text";
  readonly value: string;
}

export interface FileField {
  readonly kind: "file";
  readonly fileName: string;
  readonly content: Uint8Array;
}

export type FormField = TextField | FileField;

export type UploadForm = Readonly<Record<string, FormField>>;

export interface TorrentArtifact {
  path: string;
  fileName: string;
  content: Uint8Array;
}

export interface Screenshot {
  offset: number;
  path: string;
}

export type ScreenshotSet = readonly Screenshot[];

export interface SubmissionResponse {
  status: number;
  url: string;
  html: string;
}

export type SubmissionResult =
  | { kind: "download"; status: number; url: string; torrentId: string }
  | { kind: "landing"; status: number; url: string };

export interface TorrentRow {
  torrentId: string;
  ownerId?: string;
  uploadedAt?: Date;
}

export interface UploadResponsePage {
  userId: string;
  authKey: string;
  passkey: string;
  rows: TorrentRow[];
}
