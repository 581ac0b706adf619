import { existsSync, readFileSync } from "fs";
import { join } from "path";
import { DashboardConfigSchema, type DashboardConfig } from "../types";
import { DEFAULT_ARCHIVE_BASE } from "../scrapers/wayback-filter";

export interface EnvConfig {
  port: number;
  pollSchedule: string;
  cronEnabled: boolean;
  dashboardConfigPath: string;
  githubToken?: string;
  archiveBase: string;
}

/**
 * Seed process.env from a .env file. Variables already set win.
 */
export function loadDotEnv(envPath = join(process.cwd(), ".env")): void {
  if (!existsSync(envPath)) return;
  for (const line of readFileSync(envPath, "utf-8").split("\n")) {
    const m = line.match(/^([A-Z_][A-Z0-9_]*)=(.*)$/);
    if (m && !process.env[m[1]]) {
      process.env[m[1]] = m[2].replace(/^["']|["']$/g, "");
    }
  }
}

export function getEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  return {
    port: Number(env.PORT) || 3000,
    pollSchedule: env.POLL_SCHEDULE || "*/10 * * * *",
    cronEnabled: env.DISABLE_CRON !== "true",
    dashboardConfigPath: env.DASHBOARD_CONFIG || join(process.cwd(), "dashboard.json"),
    githubToken: env.GITHUB_TOKEN || undefined,
    archiveBase: (env.ARCHIVE_BASE_URL || DEFAULT_ARCHIVE_BASE).replace(/\/+$/, ""),
  };
}

export function parseDashboardConfig(raw: unknown): DashboardConfig {
  const parsed = DashboardConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid dashboard config: ${issues}`);
  }
  return parsed.data;
}

export function loadDashboardConfig(path: string): DashboardConfig {
  if (!existsSync(path)) {
    throw new Error(`Dashboard config not found: ${path}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    throw new Error(`Dashboard config is not valid JSON: ${path}`, { cause: error });
  }
  return parseDashboardConfig(raw);
}
