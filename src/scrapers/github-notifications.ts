import { z } from "zod";
import { FeedFetchError, type FeedFetcher, type GithubNotification } from "../types";
import { describeError, REQUEST_TIMEOUT_MS, USER_AGENT } from "./wayback-index";

const GITHUB_API = "https://api.github.com";

export interface GithubNotificationsConfig {
  token?: string;
  maxNotifications?: number;
}

const ApiNotificationSchema = z.object({
  id: z.string(),
  subject: z.object({
    title: z.string(),
    type: z.string(),
    url: z.string().nullable().optional(),
  }),
  repository: z.object({ full_name: z.string() }),
  unread: z.boolean(),
  updated_at: z.string(),
  reason: z.string(),
});

const ApiResponseSchema = z.array(ApiNotificationSchema);

/**
 * Unread + recent notifications for the authenticated user.
 */
export async function fetchGithubNotifications(
  config: GithubNotificationsConfig
): Promise<GithubNotification[]> {
  const { token, maxNotifications = 20 } = config;
  if (!token) throw new FeedFetchError("github", "GITHUB_TOKEN not set");

  let response: Response;
  try {
    response = await fetch(`${GITHUB_API}/notifications`, {
      headers: {
        Authorization: `Bearer ${token}`,
        Accept: "application/vnd.github.v3+json",
        "User-Agent": USER_AGENT,
      },
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });
  } catch (error) {
    throw new FeedFetchError("github", `GitHub request failed: ${describeError(error)}`, {
      cause: error,
    });
  }

  if (!response.ok) {
    console.error(`[github] API error: ${response.status}`);
    throw new FeedFetchError("github", `GitHub API error: ${response.status}`);
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    throw new FeedFetchError("github", "GitHub returned an undecodable body", { cause: error });
  }

  const parsed = ApiResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new FeedFetchError("github", "Unexpected GitHub notifications payload", {
      cause: parsed.error,
    });
  }

  console.log(`[github] ${parsed.data.length} notifications`);

  return parsed.data.slice(0, maxNotifications).map((n) => ({
    id: n.id,
    title: n.subject.title,
    notificationType: n.subject.type,
    repository: n.repository.full_name,
    url: n.subject.url ?? "N/A",
    unread: n.unread,
    updatedAt: n.updated_at,
    reason: n.reason,
  }));
}

export function createGithubFetcher(config: GithubNotificationsConfig): FeedFetcher {
  return {
    async fetch() {
      const notifications = await fetchGithubNotifications(config);
      return { kind: "github", notifications };
    },
  };
}
