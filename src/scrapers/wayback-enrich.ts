import type { ArchivedTweet } from "../types";
import { extractTweetText, type ExtractOptions } from "./tweet-text";
import { describeError, REQUEST_TIMEOUT_MS, USER_AGENT } from "./wayback-index";

// Kept low: the archive throttles aggressive clients
export const ENRICH_CONCURRENCY = 3;

export interface EnrichOptions extends ExtractOptions {
  concurrency?: number;
  timeoutMs?: number;
}

/**
 * Fetch one archived page and run the extraction cascade over it.
 * Throws on network errors, timeouts and non-2xx responses.
 */
export async function fetchArchivedText(
  archiveUrl: string,
  options: EnrichOptions = {}
): Promise<string | null> {
  const res = await fetch(archiveUrl, {
    headers: { "User-Agent": USER_AGENT },
    signal: AbortSignal.timeout(options.timeoutMs ?? REQUEST_TIMEOUT_MS),
    redirect: "follow",
  });

  if (!res.ok) {
    throw new Error(`HTTP ${res.status}`);
  }

  const html = await res.text();
  return extractTweetText(html, options);
}

/**
 * Fill in tweetText for each capture by fetching its archived page.
 * Never fails the batch: a failed item keeps tweetText = null. Output is
 * index-aligned with the input whatever order the fetches finish in.
 */
export async function enrichCaptures(
  captures: ArchivedTweet[],
  options: EnrichOptions = {}
): Promise<ArchivedTweet[]> {
  const concurrency = Math.max(1, options.concurrency ?? ENRICH_CONCURRENCY);
  const results: ArchivedTweet[] = captures.slice();
  if (captures.length === 0) return results;

  console.log(`[enrich] Fetching ${captures.length} archived pages (concurrency=${concurrency})...`);

  let idx = 0;
  async function worker() {
    while (idx < captures.length) {
      const i = idx++;
      const capture = captures[i];
      let tweetText: string | null = null;
      try {
        tweetText = await fetchArchivedText(capture.archiveUrl, options);
      } catch (error) {
        console.log(`[enrich] Failed ${capture.archiveUrl}: ${describeError(error)}`);
      }
      results[i] = { ...capture, tweetText };
    }
  }

  const workers = Array.from({ length: Math.min(concurrency, captures.length) }, () => worker());
  await Promise.all(workers);

  const recovered = results.filter((r) => r.tweetText !== null).length;
  console.log(`[enrich] Recovered text for ${recovered}/${captures.length} captures`);

  return results;
}
