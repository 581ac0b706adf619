/**
 * Twitter Archive Scraper — recovers old tweets from the Wayback Machine
 *
 * 1. INDEX: ask the CDX API which captures exist for the profile/search
 *    pattern, scoped to /status/* pages and deduplicated by urlkey.
 * 2. FILTER: keep captures that are real single-tweet pages.
 * 3. ENRICH: fetch each capture (3 at a time) and pull the tweet text out
 *    of the archived HTML.
 *
 * Only step 1 can fail the fetch. Everything after it degrades to missing
 * text instead.
 */

import type { ArchivedTweet, FeedFetcher } from "../types";
import { buildCaptureQuery, fetchCaptureIndex } from "./wayback-index";
import { DEFAULT_ARCHIVE_BASE, filterCaptures } from "./wayback-filter";
import { enrichCaptures } from "./wayback-enrich";

export interface TwitterArchiveConfig {
  archiveQuery: string;
  maxItems?: number;
  archiveBase?: string;
  boilerplatePhrases?: string[];
  concurrency?: number;
  timeoutMs?: number;
}

export async function scrapeTwitterArchive(config: TwitterArchiveConfig): Promise<ArchivedTweet[]> {
  const { archiveQuery, maxItems = 10, archiveBase = DEFAULT_ARCHIVE_BASE } = config;

  const query = buildCaptureQuery(archiveQuery);
  console.log(`[wayback] Querying captures for ${query} (limit=${maxItems})`);

  const records = await fetchCaptureIndex(query, maxItems, {
    archiveBase,
    timeoutMs: config.timeoutMs,
  });
  const captures = filterCaptures(records, maxItems, archiveBase);

  console.log(`[wayback] ${captures.length}/${records.length} captures are tweet pages`);

  return enrichCaptures(captures, {
    concurrency: config.concurrency,
    timeoutMs: config.timeoutMs,
    boilerplatePhrases: config.boilerplatePhrases,
  });
}

export function createTwitterArchiveFetcher(config: TwitterArchiveConfig): FeedFetcher {
  return {
    async fetch() {
      const items = await scrapeTwitterArchive(config);
      return { kind: "twitterArchive", items };
    },
  };
}
