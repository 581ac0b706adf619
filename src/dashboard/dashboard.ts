import cron, { type ScheduledTask } from "node-cron";
import type { DashboardConfig, FeedFetcher } from "../types";
import { describeError } from "../scrapers/wayback-index";
import { FeedWidget, type WidgetSnapshot } from "./widget";
import { createFetcher, type FetcherEnv } from "./fetchers";

interface WidgetEntry {
  widget: FeedWidget;
  fetcher: FeedFetcher;
}

export type FetcherFactory = (widget: FeedWidget) => FeedFetcher;

/**
 * Owns every panel and its fetcher. Fetch results (or failures) are
 * applied to the widget state; a failed fetch never escapes a refresh.
 */
export class Dashboard {
  private readonly entries = new Map<string, WidgetEntry>();
  private refreshing = false;
  private task: ScheduledTask | null = null;

  constructor(widgets: FeedWidget[], fetcherFor: FetcherFactory) {
    for (const widget of widgets) {
      if (this.entries.has(widget.id)) {
        throw new Error(`Two widgets share position ${widget.id}`);
      }
      this.entries.set(widget.id, { widget, fetcher: fetcherFor(widget) });
    }
  }

  static fromConfig(config: DashboardConfig, env: FetcherEnv): Dashboard {
    const widgets = config.widgets.map((w) => new FeedWidget(w));
    return new Dashboard(widgets, (widget) => createFetcher(widget.config, env));
  }

  get widgets(): FeedWidget[] {
    return Array.from(this.entries.values(), (e) => e.widget);
  }

  getWidget(id: string): FeedWidget | null {
    return this.entries.get(id)?.widget ?? null;
  }

  snapshots(): WidgetSnapshot[] {
    return this.widgets.map((w) => w.snapshot());
  }

  async refreshWidget(id: string): Promise<FeedWidget | null> {
    const entry = this.entries.get(id);
    if (!entry) return null;

    const { widget, fetcher } = entry;
    widget.updateData({ kind: "loading" });
    try {
      widget.updateData(await fetcher.fetch());
    } catch (error) {
      console.error(`[dashboard] ${id} fetch failed:`, error);
      widget.updateData({ kind: "error", message: describeError(error) });
    }
    return widget;
  }

  async refreshAll(): Promise<void> {
    if (this.refreshing) {
      console.log(`[dashboard] Refresh already in progress, skipping`);
      return;
    }

    this.refreshing = true;
    try {
      const ids = Array.from(this.entries.keys());
      console.log(`[dashboard] Refreshing ${ids.length} widget(s)`);
      await Promise.all(ids.map((id) => this.refreshWidget(id)));
    } finally {
      this.refreshing = false;
    }
  }

  startPolling(schedule: string): void {
    this.stopPolling();
    this.task = cron.schedule(schedule, async () => {
      await this.refreshAll();
    }, {
      timezone: "UTC",
    });
    console.log(`[cron] Polling widgets on schedule: ${schedule} UTC`);
  }

  stopPolling(): void {
    this.task?.stop();
    this.task = null;
  }
}
