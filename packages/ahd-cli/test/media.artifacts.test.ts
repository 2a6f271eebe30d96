import { mkdir, mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { createTorrent, getMediaInfo } from "../src/domain/media/artifacts.js";
import { computeOffsets, getDuration, takeScreenshots } from "../src/domain/media/screenshots.js";
import { createFakeRunner, TORRENT_BYTES } from "./helpers.js";

let root: string;
let tempDir: string;

beforeEach(async () => {
  root = await mkdtemp(join(tmpdir(), "ahd-artifacts-"));
  tempDir = join(root, "tmp");
  await mkdir(tempDir);
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

describe("createTorrent", () => {
  it("runs mktorrent with 8 MiB private pieces and reads the result back", async () => {
    const media = join(root, "Film.2019.1080p.BluRay.x264-GRP.mkv");
    await writeFile(media, "");
    const runner = createFakeRunner();

    const torrent = await createTorrent(media, { runner, tempDir });

    const expectedPath = join(tempDir, "Film.2019.1080p.BluRay.x264-GRP.torrent");
    expect(runner.calls).toEqual([
      { tool: "mktorrent", args: ["-l", "23", "-p", "-o", expectedPath, media] },
    ]);
    expect(torrent.path).toBe(expectedPath);
    expect(torrent.fileName).toBe("Film.2019.1080p.BluRay.x264-GRP.torrent");
    expect(Array.from(torrent.content)).toEqual(Array.from(TORRENT_BYTES));
  });

  it("names directory torrents after the full directory name", async () => {
    const media = join(root, "Show.S01.1080p.HDTV.x264-GRP");
    await mkdir(media);
    const runner = createFakeRunner();

    const torrent = await createTorrent(media, { runner, tempDir });
    expect(torrent.fileName).toBe("Show.S01.1080p.HDTV.x264-GRP.torrent");
  });

  it("uses the configured binary and maps a missing tool", async () => {
    const media = join(root, "Film.mkv");
    await writeFile(media, "");
    const runner = createFakeRunner();

    await expect(
      createTorrent(media, { runner, tempDir, mktorrent: "/opt/bin/mktorrent" }),
    ).rejects.toMatchObject({
      code: "E_TOOL_MISSING",
      message: "/opt/bin/mktorrent is not installed or not in PATH",
    });
  });
});

describe("getMediaInfo", () => {
  it("reports on the first file of a directory", async () => {
    const media = join(root, "Show.S01");
    await mkdir(media);
    await writeFile(join(media, "Show.S01E01.mkv"), "");
    const runner = createFakeRunner();

    await expect(getMediaInfo(media, { runner })).resolves.toBe(
      "General\nFormat : Matroska\n",
    );
    expect(runner.calls).toEqual([{ tool: "mediainfo", args: [join(media, "Show.S01E01.mkv")] }]);
  });
});

describe("screenshots", () => {
  it("spaces offsets evenly over the whole seconds", () => {
    expect(computeOffsets(100, 4)).toEqual([20, 40, 60, 80]);
    expect(computeOffsets(100.9, 4)).toEqual([20, 40, 60, 80]);
    expect(computeOffsets(10, 3)).toEqual([2, 5, 7]);
    expect(computeOffsets(5.9, 4)).toEqual([1, 2, 3, 4]);
  });

  it("rejects durations too short for distinct non-zero offsets", () => {
    expect(() => computeOffsets(3, 4)).toThrow("Media duration 3s is too short for 4 screenshot(s)");
  });

  it("checks the duration before extracting any frame", async () => {
    const media = join(root, "Film.mkv");
    await writeFile(media, "");
    const runner = createFakeRunner({ ffprobe: () => ({ stdout: "3.2\n" }) });

    await expect(takeScreenshots(media, 4, { runner, tempDir })).rejects.toMatchObject({
      code: "E_VALIDATION",
      message: "Media duration 3.2s is too short for 4 screenshot(s)",
      details: { duration: 3.2, count: 4 },
    });
    expect(runner.calls.map((call) => call.tool)).toEqual(["ffprobe"]);
  });

  it("rejects unparseable durations", async () => {
    const runner = createFakeRunner({ ffprobe: () => ({ stdout: "N/A\n" }) });

    await expect(getDuration("/media/film.mkv", { runner })).rejects.toMatchObject({
      code: "E_TOOL_FAILED",
      details: { tool: "ffprobe", exitCode: 0, output: "Unexpected duration output: N/A" },
    });
  });

  it("extracts one frame per offset into a fresh directory", async () => {
    const media = join(root, "Film.2019.mkv");
    await writeFile(media, "");
    const outputDir = join(tempDir, "Film.2019.mkv_screens");
    await mkdir(outputDir);
    await writeFile(join(outputDir, "stale.png"), "");
    const runner = createFakeRunner();

    const screenshots = await takeScreenshots(media, 4, { runner, tempDir });

    expect(screenshots).toEqual([
      { offset: 20, path: join(outputDir, "Film.2019_20.png") },
      { offset: 40, path: join(outputDir, "Film.2019_40.png") },
      { offset: 60, path: join(outputDir, "Film.2019_60.png") },
      { offset: 80, path: join(outputDir, "Film.2019_80.png") },
    ]);
    expect(runner.calls[0]).toEqual({
      tool: "ffprobe",
      args: [
        "-v",
        "error",
        "-show_entries",
        "format=duration",
        "-of",
        "default=noprint_wrappers=1:nokey=1",
        media,
      ],
    });
    expect(runner.calls[1]).toEqual({
      tool: "ffmpeg",
      args: ["-ss", "20", "-i", media, "-vframes", "1", join(outputDir, "Film.2019_20.png")],
    });
    expect(await readdir(outputDir)).toEqual([]);
  });

  it("stops at the first failing frame", async () => {
    const media = join(root, "Film.mkv");
    await writeFile(media, "");
    const runner = createFakeRunner({
      ffmpeg: () => ({ exitCode: 1, output: "Invalid data found\n" }),
    });

    await expect(takeScreenshots(media, 4, { runner, tempDir })).rejects.toMatchObject({
      code: "E_TOOL_FAILED",
      message: "ffmpeg exited with code 1",
      details: { tool: "ffmpeg", exitCode: 1, output: "Invalid data found" },
    });
    expect(runner.calls.filter((call) => call.tool === "ffmpeg")).toHaveLength(1);
  });
});
