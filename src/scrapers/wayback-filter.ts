import type { ArchivedTweet } from "../types";

export const DEFAULT_ARCHIVE_BASE = "https://web.archive.org";

// "id_" asks the archive for the original bytes without its toolbar/wrapper
export const RAW_FLAG = "id_";

const STATUS_MARKER = "/status/";
const ID_TERMINATORS = ["?", "%", "#", '"'];
const HOST_PREFIXES = ["twitter.com/", "x.com/", "mobile.twitter.com/"];

/** One decoded index row: [timestamp, original, statuscode] */
export interface RawCaptureRecord {
  timestamp: string;
  original: string;
  statusCode: string;
}

/**
 * Parse a Wayback timestamp (YYYYMMDDHHmmss) into a human-readable date.
 * Inputs shorter than a full date come back unchanged.
 */
export function formatWaybackTimestamp(ts: string): string {
  if (ts.length < 8) return ts;

  const date = `${ts.slice(0, 4)}-${ts.slice(4, 6)}-${ts.slice(6, 8)}`;
  if (ts.length < 12) return date;

  return `${date} ${ts.slice(8, 10)}:${ts.slice(10, 12)}`;
}

/**
 * Pull the Twitter handle out of twitter.com/{handle}/status/... style URLs.
 */
export function extractAuthorFromUrl(url: string): string | null {
  let path = url;
  if (path.startsWith("https://")) path = path.slice("https://".length);
  else if (path.startsWith("http://")) path = path.slice("http://".length);

  if (path.startsWith("www.")) path = path.slice("www.".length);

  const prefix = HOST_PREFIXES.find((p) => path.startsWith(p));
  if (!prefix) return null;

  const username = path.slice(prefix.length).split("/")[0];
  return username ? `@${username}` : null;
}

/**
 * The candidate post id: whatever follows "/status/", cut at the first
 * query/encoding/quote artifact. Null when the marker is missing.
 */
export function extractStatusId(url: string): string | null {
  const parts = url.split(STATUS_MARKER);
  if (parts.length < 2) return null;

  let id = parts[1];
  for (const ch of ID_TERMINATORS) {
    const at = id.indexOf(ch);
    if (at !== -1) id = id.slice(0, at);
  }
  return id;
}

export function buildArchiveUrl(
  timestamp: string,
  originalUrl: string,
  archiveBase = DEFAULT_ARCHIVE_BASE
): string {
  return `${archiveBase}/web/${timestamp}${RAW_FLAG}/${originalUrl}`;
}

/**
 * Decide whether a capture is a single-post page and, if so, build the
 * record for it. Never throws; rejection is just null.
 */
export function classifyCapture(
  record: RawCaptureRecord,
  archiveBase = DEFAULT_ARCHIVE_BASE
): ArchivedTweet | null {
  const { timestamp, original } = record;

  // Skips bare /status pages, profile pages and media pages
  const id = extractStatusId(original);
  if (!id || !/^[0-9]/.test(id)) return null;

  return {
    timestamp,
    originalUrl: original,
    archiveUrl: buildArchiveUrl(timestamp, original, archiveBase),
    tweetText: null,
    author: extractAuthorFromUrl(original),
    dateDisplay: formatWaybackTimestamp(timestamp),
  };
}

export function filterCaptures(
  records: RawCaptureRecord[],
  maxItems: number,
  archiveBase = DEFAULT_ARCHIVE_BASE
): ArchivedTweet[] {
  const tweets: ArchivedTweet[] = [];
  for (const record of records) {
    if (tweets.length >= maxItems) break;
    const tweet = classifyCapture(record, archiveBase);
    if (tweet) tweets.push(tweet);
  }
  return tweets;
}
