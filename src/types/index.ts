export {
  ArchivedTweetSchema,
  GithubNotificationSchema,
  FeedFetchError,
  type ArchivedTweet,
  type GithubNotification,
  type FeedData,
  type FeedKind,
  type FeedFetcher,
  type SelectedItem,
} from "./feed";

export {
  PositionSchema,
  TwitterArchiveWidgetConfigSchema,
  GithubWidgetConfigSchema,
  WidgetConfigSchema,
  DashboardConfigSchema,
  type Position,
  type TwitterArchiveWidgetConfig,
  type GithubWidgetConfig,
  type WidgetConfig,
  type DashboardConfig,
} from "./widget";
