import type { FeedFetcher, WidgetConfig } from "../types";
import { createTwitterArchiveFetcher } from "../scrapers/twitter-archive";
import { createGithubFetcher } from "../scrapers/github-notifications";
import type { EnvConfig } from "../config";

export type FetcherEnv = Pick<EnvConfig, "githubToken" | "archiveBase">;

/**
 * One place that knows which fetcher backs which widget type.
 */
export function createFetcher(config: WidgetConfig, env: FetcherEnv): FeedFetcher {
  switch (config.type) {
    case "twitterArchive":
      return createTwitterArchiveFetcher({
        archiveQuery: config.archiveQuery,
        maxItems: config.maxItems,
        boilerplatePhrases: config.boilerplatePhrases,
        archiveBase: env.archiveBase,
      });
    case "github":
      return createGithubFetcher({
        token: config.token ?? env.githubToken,
        maxNotifications: config.maxNotifications,
      });
  }
}
