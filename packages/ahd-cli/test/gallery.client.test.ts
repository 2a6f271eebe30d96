import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { createGalleryClient, parseGalleryResponse } from "../src/domain/gallery/client.js";
import { buildReleaseDescription } from "../src/domain/gallery/description.js";
import { createFakeRunner, createMockFetch } from "./helpers.js";

let root: string;

beforeEach(async () => {
  root = await mkdtemp(join(tmpdir(), "ahd-gallery-"));
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

describe("parseGalleryResponse", () => {
  it("joins BBCode in upload order", () => {
    expect(
      parseGalleryResponse(JSON.stringify({ files: [{ bbcode: "[img]a[/img]" }, { bbcode: "[img]b[/img]" }] })),
    ).toBe("[img]a[/img][img]b[/img]");
  });

  it("rejects non-JSON bodies", () => {
    expect(() => parseGalleryResponse("<html>oops</html>")).toThrow(
      "Screenshot upload returned non-JSON output",
    );
  });

  it("rejects a response without files", () => {
    expect(() => parseGalleryResponse(JSON.stringify({ error: "bad key" }))).toThrow(
      "Error uploading screenshots: response has no files",
    );
  });

  it("rejects a file entry without BBCode", () => {
    expect(() =>
      parseGalleryResponse(JSON.stringify({ files: [{ bbcode: "[img]a[/img]" }, { url: "b" }] })),
    ).toThrow("Uploaded file #2 has no BBCode");
  });
});

describe("gallery client", () => {
  it("posts a new gallery with one image part per screenshot", async () => {
    const first = join(root, "Film_20.png");
    const second = join(root, "Film_40.png");
    await writeFile(first, "png-1");
    await writeFile(second, "png-2");

    const { fetchImpl, calls } = createMockFetch(() =>
      json({ files: [{ bbcode: "[img]1[/img]" }, { bbcode: "[img]2[/img]" }] }),
    );
    const client = createGalleryClient({ baseUrl: "https://img.example.test", fetchImpl });

    await expect(client.uploadScreenshots("Film.mkv", [first, second], "test-secret")).resolves.toBe(
      "[img]1[/img][img]2[/img]",
    );

    expect(calls).toHaveLength(1);
    const call = calls[0];
    expect(call.method).toBe("POST");
    expect(call.url.toString()).toBe("https://img.example.test/api/upload");
    expect(call.form?.get("apikey")).toBe("test-secret");
    expect(call.form?.get("galleryid")).toBe("new");
    expect(call.form?.get("gallerytitle")).toBe("Film.mkv");

    const images = call.form?.getAll("image[]") ?? [];
    expect(images.map((image) => (typeof image === "string" ? image : image.name))).toEqual([
      "Film_20.png",
      "Film_40.png",
    ]);
  });

  it("maps a non-2xx status to an upload error", async () => {
    const { fetchImpl } = createMockFetch(() => new Response("nope", { status: 502 }));
    const client = createGalleryClient({ baseUrl: "https://img.example.test", fetchImpl });

    await expect(client.uploadScreenshots("Film.mkv", [], "test-secret")).rejects.toMatchObject({
      code: "E_UPSTREAM_UPLOAD",
      message: "Screenshot upload failed (status 502)",
      details: { status: 502 },
    });
  });

  it("maps network failures", async () => {
    const fetchImpl: typeof fetch = async () => {
      throw new TypeError("fetch failed");
    };
    const client = createGalleryClient({ baseUrl: "https://img.example.test", fetchImpl });

    await expect(client.uploadScreenshots("Film.mkv", [], "test-secret")).rejects.toMatchObject({
      code: "E_UPSTREAM_NETWORK",
      message: "Failed to reach image gallery",
    });
  });
});

describe("buildReleaseDescription", () => {
  it("titles the gallery after the first file of a directory", async () => {
    const release = join(root, "Show.S01");
    const tempDir = join(root, "tmp");
    await mkdir(release);
    await mkdir(tempDir);
    await writeFile(join(release, "Show.S01E01.mkv"), "");

    const uploads: Array<{ title: string; images: readonly string[]; apiKey: string }> = [];
    const gallery = {
      async uploadScreenshots(title: string, images: readonly string[], apiKey: string) {
        uploads.push({ title, images, apiKey });
        return "[img]x[/img]";
      },
    };

    const description = await buildReleaseDescription(release, {
      runner: createFakeRunner(),
      gallery,
      tempDir,
      passkey: "test-secret",
      screenshotCount: 2,
    });

    const outputDir = join(tempDir, "Show.S01E01.mkv_screens");
    expect(description).toBe("[img]x[/img]");
    expect(uploads).toEqual([
      {
        title: "Show.S01E01.mkv",
        images: [join(outputDir, "Show.S01E01_33.png"), join(outputDir, "Show.S01E01_66.png")],
        apiKey: "test-secret",
      },
    ]);
  });
});
