import { describe, it, expect, vi, afterEach } from "vitest";
import {
  buildCaptureQuery,
  buildIndexUrl,
  decodeIndexBody,
  fetchCaptureIndex,
  parseCaptureRow,
} from "./wayback-index";
import { FeedFetchError } from "../types";

const HEADER = ["timestamp", "original", "statuscode"];

function mockTextResponse(body: string, ok = true, status = 200) {
  return vi.fn().mockResolvedValue({
    ok,
    status,
    text: async () => body,
  });
}

afterEach(() => {
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});

describe("buildCaptureQuery", () => {
  it("keeps queries that already target /status", () => {
    expect(buildCaptureQuery("twitter.com/someone/status/*")).toBe("twitter.com/someone/status/*");
    expect(buildCaptureQuery("twitter.com/someone/status")).toBe("twitter.com/someone/status");
  });

  it("strips trailing wildcards and slashes before scoping to /status/*", () => {
    expect(buildCaptureQuery("twitter.com/someone*")).toBe("twitter.com/someone/status/*");
    expect(buildCaptureQuery("twitter.com/someone/")).toBe("twitter.com/someone/status/*");
    expect(buildCaptureQuery("twitter.com/someone/*")).toBe("twitter.com/someone/status/*");
    expect(buildCaptureQuery("twitter.com/someone")).toBe("twitter.com/someone/status/*");
  });
});

describe("buildIndexUrl", () => {
  it("asks for one extra row to cover the header", () => {
    const url = buildIndexUrl("twitter.com/someone/status/*", 10);
    expect(url).toBe(
      "https://web.archive.org/cdx/search/cdx?url=twitter.com%2Fsomeone%2Fstatus%2F*" +
        "&output=json&limit=11&fl=timestamp,original,statuscode&filter=statuscode:200&collapse=urlkey"
    );
  });

  it("uses the given archive base", () => {
    expect(buildIndexUrl("a", 1, "http://archive.test").startsWith("http://archive.test/cdx/search/cdx?")).toBe(true);
  });
});

describe("parseCaptureRow", () => {
  it("returns null for rows with fewer than 3 columns", () => {
    expect(parseCaptureRow([])).toBeNull();
    expect(parseCaptureRow(["20230615143022"])).toBeNull();
    expect(parseCaptureRow(["20230615143022", "https://twitter.com/a/status/1"])).toBeNull();
  });

  it("returns null for non-array and non-string rows", () => {
    expect(parseCaptureRow("20230615143022")).toBeNull();
    expect(parseCaptureRow(null)).toBeNull();
    expect(parseCaptureRow([20230615143022, "https://twitter.com/a/status/1", "200"])).toBeNull();
  });

  it("reads the first three columns and ignores the rest", () => {
    expect(parseCaptureRow(["20230615143022", "https://twitter.com/a/status/1", "200", "extra"])).toEqual({
      timestamp: "20230615143022",
      original: "https://twitter.com/a/status/1",
      statusCode: "200",
    });
  });
});

describe("decodeIndexBody", () => {
  it("always skips the header row", () => {
    expect(decodeIndexBody([HEADER])).toEqual([]);
  });

  it("returns [] for an empty array", () => {
    expect(decodeIndexBody([])).toEqual([]);
  });

  it("skips row 0 even when it looks like data", () => {
    const rows = [
      ["20200101000000", "https://twitter.com/a/status/1", "200"],
      ["20200102000000", "https://twitter.com/a/status/2", "200"],
    ];
    expect(decodeIndexBody(rows).map((r) => r.original)).toEqual(["https://twitter.com/a/status/2"]);
  });

  it("drops short rows between good ones", () => {
    const rows = [
      HEADER,
      ["20200101000000", "https://twitter.com/a/status/1", "200"],
      ["20200101000000"],
      ["20200103000000", "https://twitter.com/a/status/3", "200"],
    ];
    expect(decodeIndexBody(rows).map((r) => r.timestamp)).toEqual(["20200101000000", "20200103000000"]);
  });

  it("throws FeedFetchError when the body is not an array", () => {
    expect(() => decodeIndexBody({ error: "nope" })).toThrow(FeedFetchError);
  });
});

describe("fetchCaptureIndex", () => {
  it("decodes rows from the archive response", async () => {
    const body = JSON.stringify([HEADER, ["20230615143022", "https://twitter.com/testuser/status/123", "200"]]);
    const mockFetch = mockTextResponse(body);
    vi.stubGlobal("fetch", mockFetch);

    const records = await fetchCaptureIndex("twitter.com/testuser/status/*", 10);

    expect(records).toEqual([
      { timestamp: "20230615143022", original: "https://twitter.com/testuser/status/123", statusCode: "200" },
    ]);
    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(mockFetch.mock.calls[0][0]).toContain("limit=11");
  });

  it("throws FeedFetchError on network failure", async () => {
    vi.stubGlobal("fetch", vi.fn().mockRejectedValue(new Error("network error")));
    await expect(fetchCaptureIndex("q", 5)).rejects.toThrow("Archive index request failed: network error");
  });

  it("throws FeedFetchError on non-2xx status", async () => {
    vi.stubGlobal("fetch", mockTextResponse("", false, 503));
    await expect(fetchCaptureIndex("q", 5)).rejects.toThrow("Archive index error: 503");
  });

  it("throws FeedFetchError on a non-JSON body", async () => {
    vi.stubGlobal("fetch", mockTextResponse("<html>busy</html>"));
    await expect(fetchCaptureIndex("q", 5)).rejects.toBeInstanceOf(FeedFetchError);
  });
});
