import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createApp } from "./server";
import { Dashboard } from "../dashboard/dashboard";
import { FeedWidget } from "../dashboard/widget";
import type { ArchivedTweet, FeedData, WidgetConfig } from "../types";

const ARCHIVE_CONFIG: WidgetConfig = {
  type: "twitterArchive",
  title: "Archive",
  archiveQuery: "twitter.com/testuser*",
  maxItems: 10,
  position: { row: 0, col: 0 },
};

function makeItem(idx: number): ArchivedTweet {
  return {
    timestamp: "20230615143022",
    originalUrl: `https://twitter.com/testuser/status/${idx}`,
    archiveUrl: `https://web.archive.org/web/20230615143022id_/https://twitter.com/testuser/status/${idx}`,
    tweetText: `Tweet ${idx}`,
    author: "@testuser",
    dateDisplay: "2023-06-15 14:30",
  };
}

const DATA: FeedData = { kind: "twitterArchive", items: [makeItem(1), makeItem(2)] };

function setup() {
  const fetch = vi.fn(async (): Promise<FeedData> => DATA);
  const dashboard = new Dashboard([new FeedWidget(ARCHIVE_CONFIG)], () => ({ fetch }));
  return { app: createApp(dashboard), dashboard, fetch };
}

function postJson(body: unknown) {
  return {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  };
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("dashboard API", () => {
  it("reports health", async () => {
    const { app } = setup();
    const res = await app.request("/");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ service: "feedboard", version: "0.1.0", widgets: 1 });
  });

  it("lists widget snapshots", async () => {
    const { app } = setup();
    const res = await app.request("/api/widgets");
    expect(await res.json()).toMatchObject([{ id: "twitter_archive-0-0", loading: true, items: [] }]);
  });

  it("returns 404 for an unknown widget", async () => {
    const { app } = setup();
    const res = await app.request("/api/widgets/github-9-9");
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "Widget not found" });
  });

  it("refreshes one widget and returns its snapshot", async () => {
    const { app, fetch } = setup();
    const res = await app.request("/api/widgets/twitter_archive-0-0/refresh", { method: "POST" });
    expect(fetch).toHaveBeenCalledTimes(1);
    expect(await res.json()).toMatchObject({
      loading: false,
      items: [{ tweetText: "Tweet 1" }, { tweetText: "Tweet 2" }],
    });
  });

  it("refreshes all widgets", async () => {
    const { app } = setup();
    const res = await app.request("/api/refresh", { method: "POST" });
    expect(await res.json()).toMatchObject([{ items: [{ tweetText: "Tweet 1" }, { tweetText: "Tweet 2" }] }]);
  });

  it("moves the cursor and reports the selected item", async () => {
    const { app, dashboard } = setup();
    await dashboard.refreshAll();

    const scroll = await app.request("/api/widgets/twitter_archive-0-0/scroll", postJson({ direction: "down" }));
    expect(await scroll.json()).toEqual({ cursor: 1 });

    const selected = await app.request("/api/widgets/twitter_archive-0-0/selected");
    expect(await selected.json()).toMatchObject({ title: "Tweet 2", source: "@testuser" });
  });

  it("returns null when nothing is selected", async () => {
    const { app } = setup();
    const res = await app.request("/api/widgets/twitter_archive-0-0/selected");
    expect(await res.json()).toBeNull();
  });

  it("rejects a bad scroll direction", async () => {
    const { app } = setup();
    const res = await app.request("/api/widgets/twitter_archive-0-0/scroll", postJson({ direction: "left" }));
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'direction must be "up" or "down"' });
  });

  it("rejects a non-JSON scroll body", async () => {
    const { app } = setup();
    const res = await app.request("/api/widgets/twitter_archive-0-0/scroll", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: "down",
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Invalid JSON body" });
  });
});
