import { writeFile } from "node:fs/promises";

import type { ProcessResult, ProcessRunner } from "../src/domain/process/runner.js";

export class BufferWriter {
  public chunks: string[] = [];

  public write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  public read(): string {
    return this.chunks.join("");
  }
}

export interface RunnerCall {
  tool: string;
  args: string[];
}

export type ToolHandler = (args: string[]) => Partial<ProcessResult> | Promise<Partial<ProcessResult>>;

export const TORRENT_BYTES = new TextEncoder().encode("d4:infod4:name4:testee");

/**
 * Stand-in for the external tools. mktorrent writes a small torrent to its `-o`
 * path, ffprobe reports 100.5 seconds, mediainfo prints a fixed report.
 */
export function createFakeRunner(overrides: Record<string, ToolHandler> = {}): ProcessRunner & {
  calls: RunnerCall[];
} {
  const calls: RunnerCall[] = [];
  const handlers: Record<string, ToolHandler> = {
    mktorrent: async (args) => {
      const output = args[args.indexOf("-o") + 1];
      if (output !== undefined) {
        await writeFile(output, TORRENT_BYTES);
      }
      return {};
    },
    mediainfo: () => ({ stdout: "General\nFormat : Matroska\n" }),
    ffprobe: () => ({ stdout: "100.5\n" }),
    ffmpeg: () => ({}),
    ...overrides,
  };

  return {
    calls,
    async run(tool, args) {
      calls.push({ tool, args });
      const handler = handlers[tool];
      if (handler === undefined) {
        return { exitCode: 127, stdout: "", output: `${tool}: command not found` };
      }

      const result = await handler(args);
      const stdout = result.stdout ?? "";
      return {
        exitCode: result.exitCode ?? 0,
        stdout,
        output: result.output ?? stdout,
      };
    },
  };
}

export interface MockFetchRequest {
  method: string;
  url: URL;
  headers: Headers;
  form?: FormData;
}

export type MockFetchHandler = (request: MockFetchRequest) => Response | Promise<Response>;

export function createMockFetch(handler: MockFetchHandler): {
  fetchImpl: typeof fetch;
  calls: MockFetchRequest[];
} {
  const calls: MockFetchRequest[] = [];

  const fetchImpl: typeof fetch = async (input, init) => {
    const request = new Request(input, init);
    const form = request.body === null ? undefined : await request.formData();

    const call: MockFetchRequest = {
      method: request.method,
      url: new URL(request.url),
      headers: new Headers(request.headers),
      form,
    };

    calls.push(call);
    return handler(call);
  };

  return { fetchImpl, calls };
}

/** A Response whose `url` reports where the request ended up after redirects. */
export function responseAt(url: string, body: string, status = 200): Response {
  const response = new Response(body, { status, headers: { "content-type": "text/html" } });
  Object.defineProperty(response, "url", { value: url });
  return response;
}

/** Torrent list as the tracker renders it after an upload; user 4242 owns torrents 900, 902 and 903. */
export const UPLOAD_RESPONSE_HTML = `
<html>
  <head>
    <script type="text/javascript">
      var userid = 4242;
      var authkey = "abc123";
    </script>
  </head>
  <body>
    <a href="feeds.php?feed=torrents_all&passkey=pk999&authkey=abc123">RSS</a>
    <table class="torrent_table">
      <tr id="torrent_900">
        <td><a href="user.php?id=4242">me</a></td>
        <td><span title="Mar 01 2026, 11:50">10 mins ago</span></td>
      </tr>
      <tr id="torrent_901">
        <td><a href="user.php?id=7">someone</a></td>
        <td><span title="Mar 01 2026, 12:00">just now</span></td>
      </tr>
      <tr id="torrent_902">
        <td><a href="user.php?id=4242">me</a></td>
        <td><span title="Mar 01 2026, 11:59">1 min ago</span></td>
      </tr>
      <tr id="torrent_903">
        <td><a href="user.php?id=4242">me</a></td>
        <td>no timestamp</td>
      </tr>
    </table>
  </body>
</html>
`;
