#!/usr/bin/env tsx
/**
 * One-off run of the Wayback archive scraper.
 * No API keys needed — the archive is public.
 *
 * Usage: npm run archive -- "twitter.com/someone*" [maxItems]
 */

import { getEnvConfig, loadDotEnv } from "../config";
import { scrapeTwitterArchive } from "../scrapers/twitter-archive";

async function main() {
  const [archiveQuery, maxArg] = process.argv.slice(2);
  if (!archiveQuery) {
    console.error("Usage: npm run archive -- <archiveQuery> [maxItems]");
    process.exit(1);
  }

  loadDotEnv();
  const { archiveBase } = getEnvConfig();
  const maxItems = Number(maxArg) || 10;

  console.log(`Fetching archived tweets for ${archiveQuery}\n`);

  const tweets = await scrapeTwitterArchive({ archiveQuery, maxItems, archiveBase });

  if (tweets.length === 0) {
    console.log("No archived tweets found.");
    return;
  }

  tweets.forEach((t, i) => {
    console.log(`${i + 1}. ${t.tweetText ?? t.originalUrl}`);
    console.log(`   ${t.author ?? "unknown"} | ${t.dateDisplay}`);
    console.log(`   ${t.archiveUrl}`);
    console.log("");
  });
}

main().catch((error) => {
  console.error("[archive] Fetch failed:", error);
  process.exit(1);
});
