// Re-export modules for library usage
export * from "./types";
export * from "./scrapers";
export * from "./config";
export { Dashboard, type FetcherFactory } from "./dashboard/dashboard";
export { FeedWidget, type WidgetSnapshot } from "./dashboard/widget";
export { createFetcher } from "./dashboard/fetchers";
export { createApp } from "./api/server";
