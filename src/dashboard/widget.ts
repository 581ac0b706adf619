import type {
  ArchivedTweet,
  FeedData,
  FeedKind,
  GithubNotification,
  Position,
  SelectedItem,
  WidgetConfig,
} from "../types";

type FeedContent = Extract<FeedData, { kind: FeedKind }>;

const ID_PREFIX: Record<FeedKind, string> = {
  twitterArchive: "twitter_archive",
  github: "github",
};

export interface WidgetSnapshot {
  id: string;
  type: FeedKind;
  title: string;
  position: Position;
  loading: boolean;
  error: string | null;
  cursor: number;
  items: ArchivedTweet[] | GithubNotification[];
}

function emptyContent(kind: FeedKind): FeedContent {
  return kind === "twitterArchive" ? { kind, items: [] } : { kind, notifications: [] };
}

function contentItems(content: FeedContent): ArchivedTweet[] | GithubNotification[] {
  return content.kind === "twitterArchive" ? content.items : content.notifications;
}

export function selectedTweet(item: ArchivedTweet): SelectedItem {
  return {
    title: item.tweetText ?? item.originalUrl,
    url: item.archiveUrl,
    description: item.tweetText ?? undefined,
    source: item.author ?? "Wayback Machine",
    metadata: item.dateDisplay,
  };
}

export function selectedNotification(item: GithubNotification): SelectedItem {
  return {
    title: item.title,
    url: item.url,
    source: item.repository,
    metadata: `${item.notificationType} · ${item.reason}`,
  };
}

/**
 * UI-side state for one dashboard panel: what the last fetch produced,
 * whether one is in flight, and where the cursor is.
 */
export class FeedWidget {
  readonly config: WidgetConfig;
  loading = true;
  error: string | null = null;
  cursor = 0;
  private content: FeedContent;

  constructor(config: WidgetConfig) {
    this.config = config;
    this.content = emptyContent(config.type);
  }

  get id(): string {
    const { row, col } = this.config.position;
    return `${ID_PREFIX[this.config.type]}-${row}-${col}`;
  }

  get title(): string {
    return this.config.title;
  }

  get position(): Position {
    return this.config.position;
  }

  get itemCount(): number {
    return contentItems(this.content).length;
  }

  updateData(data: FeedData): void {
    this.loading = false;
    switch (data.kind) {
      case "loading":
        this.loading = true;
        return;
      case "error":
        this.error = data.message;
        return;
      default:
        // Data for some other panel's feed kind
        if (data.kind !== this.config.type) return;
        this.content = data;
        this.error = null;
        this.cursor = Math.min(this.cursor, Math.max(0, this.itemCount - 1));
    }
  }

  scrollUp(): void {
    if (this.cursor > 0) this.cursor -= 1;
  }

  scrollDown(): void {
    if (this.cursor < this.itemCount - 1) this.cursor += 1;
  }

  getSelectedItem(): SelectedItem | null {
    const content = this.content;
    if (content.kind === "twitterArchive") {
      const item = content.items[this.cursor];
      return item ? selectedTweet(item) : null;
    }
    const item = content.notifications[this.cursor];
    return item ? selectedNotification(item) : null;
  }

  snapshot(): WidgetSnapshot {
    return {
      id: this.id,
      type: this.config.type,
      title: this.title,
      position: this.position,
      loading: this.loading,
      error: this.error,
      cursor: this.cursor,
      items: contentItems(this.content),
    };
  }
}
