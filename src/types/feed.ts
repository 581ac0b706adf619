import { z } from "zod";

/**
 * ArchivedTweet - one historical capture of a post page, as recovered
 * from the Wayback Machine.
 *
 * Built once per fetch, never mutated afterwards. `tweetText` is the only
 * field enrichment fills in.
 */
export const ArchivedTweetSchema = z.object({
  timestamp: z.string(),                 // YYYYMMDDHHMMSS, precision varies
  originalUrl: z.string(),               // URL as archived
  archiveUrl: z.string(),                // {base}/web/{timestamp}id_/{originalUrl}
  tweetText: z.string().nullable(),      // null = nothing recovered
  author: z.string().nullable(),         // "@handle" or null
  dateDisplay: z.string(),               // "2023-06-15 14:30"
});

export type ArchivedTweet = z.infer<typeof ArchivedTweetSchema>;

export const GithubNotificationSchema = z.object({
  id: z.string(),
  title: z.string(),
  notificationType: z.string(),
  repository: z.string(),
  url: z.string(),
  unread: z.boolean(),
  updatedAt: z.string(),
  reason: z.string(),
});

export type GithubNotification = z.infer<typeof GithubNotificationSchema>;

/**
 * Everything a fetcher can hand to a widget. Closed union, one variant per
 * feed kind plus the two lifecycle states.
 */
export type FeedData =
  | { kind: "loading" }
  | { kind: "twitterArchive"; items: ArchivedTweet[] }
  | { kind: "github"; notifications: GithubNotification[] }
  | { kind: "error"; message: string };

export type FeedKind = Exclude<FeedData["kind"], "loading" | "error">;

export interface FeedFetcher {
  fetch(): Promise<FeedData>;
}

/**
 * Projection of the row under a widget's cursor, used by front ends to
 * open or preview the item.
 */
export interface SelectedItem {
  title: string;
  url?: string;
  description?: string;
  source: string;
  metadata?: string;
}

export class FeedFetchError extends Error {
  readonly feed: string;

  constructor(feed: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FeedFetchError";
    this.feed = feed;
  }
}
