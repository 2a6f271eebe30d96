import { readFile } from "node:fs/promises";
import { basename } from "node:path";

import { UploadError } from "../errors.js";
import { HttpSession } from "../http/session.js";

export interface GalleryClient {
  /** Uploads images into a new gallery and returns their BBCode, concatenated in upload order. */
  uploadScreenshots(title: string, images: readonly string[], apiKey: string): Promise<string>;
}

export interface GalleryClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

export const DEFAULT_GALLERY_URL = "https://img.awesome-hd.me";

export function createGalleryClient(options: GalleryClientOptions = {}): GalleryClient {
  const session = new HttpSession({
    baseUrl: options.baseUrl ?? DEFAULT_GALLERY_URL,
    timeoutMs: options.timeoutMs ?? 60_000,
    label: "image gallery",
    fetchImpl: options.fetchImpl,
  });

  return {
    async uploadScreenshots(title, images, apiKey) {
      const body = new FormData();
      body.set("apikey", apiKey);
      body.set("galleryid", "new");
      body.set("gallerytitle", title);
      for (const image of images) {
        body.append("image[]", new Blob([await readFile(image)]), basename(image));
      }

      const response = await session.fetch({
        pathOrUrl: "/api/upload",
        method: "POST",
        body,
        redirect: "follow",
      });
      const text = await response.text();
      if (!response.ok) {
        throw new UploadError(`Screenshot upload failed (status ${response.status})`, {
          status: response.status,
        });
      }

      return parseGalleryResponse(text);
    },
  };
}

export function parseGalleryResponse(text: string): string {
  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch {
    throw new UploadError("Screenshot upload returned non-JSON output", {
      body: text.slice(0, 200),
    });
  }

  const files =
    typeof payload === "object" && payload !== null && "files" in payload
      ? payload.files
      : undefined;
  if (!Array.isArray(files)) {
    throw new UploadError("Error uploading screenshots: response has no files", {
      response: payload,
    });
  }

  return files
    .map((file: unknown, index) => {
      const bbcode =
        typeof file === "object" && file !== null && "bbcode" in file ? file.bbcode : undefined;
      if (typeof bbcode !== "string") {
        throw new UploadError(`Uploaded file #${index + 1} has no BBCode`, { file });
      }
      return bbcode;
    })
    .join("");
}
