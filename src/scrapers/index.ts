// Wayback Machine — archived tweets for a profile or search pattern
export { scrapeTwitterArchive, createTwitterArchiveFetcher, type TwitterArchiveConfig } from "./twitter-archive";
export { buildCaptureQuery, buildIndexUrl, fetchCaptureIndex, decodeIndexBody, parseCaptureRow } from "./wayback-index";
export {
  classifyCapture,
  filterCaptures,
  formatWaybackTimestamp,
  extractAuthorFromUrl,
  extractStatusId,
  buildArchiveUrl,
  DEFAULT_ARCHIVE_BASE,
  type RawCaptureRecord,
} from "./wayback-filter";
export { enrichCaptures, fetchArchivedText, ENRICH_CONCURRENCY } from "./wayback-enrich";
export { extractTweetText, EXTRACTION_STRATEGIES, DEFAULT_BOILERPLATE_PHRASES } from "./tweet-text";

// GitHub notifications
export { fetchGithubNotifications, createGithubFetcher } from "./github-notifications";
