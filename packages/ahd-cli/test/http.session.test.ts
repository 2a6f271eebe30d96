import { describe, expect, it } from "vitest";

import { HttpSession } from "../src/domain/http/session.js";
import { createMockFetch, responseAt } from "./helpers.js";

const BASE_URL = "https://tracker.example.test";

describe("HttpSession", () => {
  it("sends the configured cookie only on requests that ask for it", async () => {
    const { fetchImpl, calls } = createMockFetch(() => responseAt(`${BASE_URL}/`, "ok"));
    const session = new HttpSession({
      baseUrl: BASE_URL,
      timeoutMs: 1000,
      label: "tracker",
      cookie: "session=s1; keeplogged=k1",
      fetchImpl,
    });

    await session.fetch({ pathOrUrl: "/upload.php", includeAuthCookie: true });
    await session.fetch({ pathOrUrl: "/index.php" });

    expect(calls.map((call) => call.url.toString())).toEqual([
      `${BASE_URL}/upload.php`,
      `${BASE_URL}/index.php`,
    ]);
    expect(calls[0].headers.get("cookie")).toBe("session=s1; keeplogged=k1");
    expect(calls[0].headers.get("user-agent")).toBe("ahd-uploader");
    expect(calls[1].headers.get("cookie")).toBeNull();
  });

  it("omits the cookie header when no cookie is configured", async () => {
    const { fetchImpl, calls } = createMockFetch(() => responseAt(`${BASE_URL}/`, "ok"));
    const session = new HttpSession({ baseUrl: BASE_URL, timeoutMs: 1000, label: "tracker", fetchImpl });

    await session.fetch({ pathOrUrl: "/upload.php", includeAuthCookie: true });

    expect(calls[0].headers.get("cookie")).toBeNull();
  });
});
