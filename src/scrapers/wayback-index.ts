import { z } from "zod";
import { FeedFetchError } from "../types";
import { DEFAULT_ARCHIVE_BASE, type RawCaptureRecord } from "./wayback-filter";

export const USER_AGENT = "feedboard/1.0";
export const REQUEST_TIMEOUT_MS = 20_000;

const FEED_NAME = "twitterArchive";

// Variable-width rows: only the first three columns are read
const CaptureRowSchema = z.tuple([z.string(), z.string(), z.string()]).rest(z.unknown());
const IndexBodySchema = z.array(z.unknown());

/**
 * Scope a profile/search query to per-post pages (/status/*) so the small
 * result limit isn't spent on profile or media captures.
 */
export function buildCaptureQuery(archiveQuery: string): string {
  if (archiveQuery.includes("/status")) return archiveQuery;

  const base = archiveQuery.replace(/\*+$/, "").replace(/\/+$/, "");
  return `${base}/status/*`;
}

/**
 * CDX search URL. The limit is one higher than asked for because the first
 * row of a JSON response is always the header.
 */
export function buildIndexUrl(
  query: string,
  limit: number,
  archiveBase = DEFAULT_ARCHIVE_BASE
): string {
  const params = [
    `url=${encodeURIComponent(query)}`,
    "output=json",
    `limit=${limit + 1}`,
    "fl=timestamp,original,statuscode",
    "filter=statuscode:200",
    "collapse=urlkey",
  ];
  return `${archiveBase}/cdx/search/cdx?${params.join("&")}`;
}

export function parseCaptureRow(row: unknown): RawCaptureRecord | null {
  const parsed = CaptureRowSchema.safeParse(row);
  if (!parsed.success) return null;

  const [timestamp, original, statusCode] = parsed.data;
  return { timestamp, original, statusCode };
}

/**
 * Decode a CDX JSON body into capture records.
 * Row 0 is the header (["timestamp","original","statuscode"]) and is always
 * dropped; malformed rows are dropped too.
 */
export function decodeIndexBody(body: unknown): RawCaptureRecord[] {
  const parsed = IndexBodySchema.safeParse(body);
  if (!parsed.success) {
    throw new FeedFetchError(FEED_NAME, "Archive index response is not a JSON array");
  }

  const records: RawCaptureRecord[] = [];
  for (const row of parsed.data.slice(1)) {
    const record = parseCaptureRow(row);
    if (record) records.push(record);
  }
  return records;
}

export interface CaptureIndexOptions {
  archiveBase?: string;
  timeoutMs?: number;
}

/**
 * Ask the archive which captures exist for a URL pattern.
 * Any failure here is fatal for the whole fetch: partial index results
 * mean nothing.
 */
export async function fetchCaptureIndex(
  query: string,
  limit: number,
  options: CaptureIndexOptions = {}
): Promise<RawCaptureRecord[]> {
  const { archiveBase = DEFAULT_ARCHIVE_BASE, timeoutMs = REQUEST_TIMEOUT_MS } = options;
  const url = buildIndexUrl(query, limit, archiveBase);

  let response: Response;
  try {
    response = await fetch(url, {
      headers: { "User-Agent": USER_AGENT },
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    throw new FeedFetchError(FEED_NAME, `Archive index request failed: ${describeError(error)}`, {
      cause: error,
    });
  }

  if (!response.ok) {
    throw new FeedFetchError(FEED_NAME, `Archive index error: ${response.status}`);
  }

  let body: unknown;
  try {
    body = JSON.parse(await response.text());
  } catch (error) {
    throw new FeedFetchError(FEED_NAME, "Archive index returned an undecodable body", {
      cause: error,
    });
  }

  return decodeIndexBody(body);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
