import { z } from "zod";

export const PositionSchema = z.object({
  row: z.number().int().min(0),
  col: z.number().int().min(0),
});

export type Position = z.infer<typeof PositionSchema>;

export const TwitterArchiveWidgetConfigSchema = z.object({
  type: z.literal("twitterArchive"),
  title: z.string().default("Archived Tweets"),
  archiveQuery: z.string().min(1),        // e.g. "twitter.com/someone*"
  maxItems: z.number().int().min(1).max(100).default(10),
  // Replaces the default generic-description blocklist when set
  boilerplatePhrases: z.array(z.string()).optional(),
  position: PositionSchema,
});

export const GithubWidgetConfigSchema = z.object({
  type: z.literal("github"),
  title: z.string().default("GitHub"),
  token: z.string().optional(),           // falls back to GITHUB_TOKEN
  maxNotifications: z.number().int().min(1).default(20),
  position: PositionSchema,
});

export const WidgetConfigSchema = z.discriminatedUnion("type", [
  TwitterArchiveWidgetConfigSchema,
  GithubWidgetConfigSchema,
]);

export const DashboardConfigSchema = z.object({
  widgets: z.array(WidgetConfigSchema).default([]),
});

export type TwitterArchiveWidgetConfig = z.infer<typeof TwitterArchiveWidgetConfigSchema>;
export type GithubWidgetConfig = z.infer<typeof GithubWidgetConfigSchema>;
export type WidgetConfig = z.infer<typeof WidgetConfigSchema>;
export type DashboardConfig = z.infer<typeof DashboardConfigSchema>;
