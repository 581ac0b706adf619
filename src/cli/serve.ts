#!/usr/bin/env tsx
/**
 * Start the dashboard: load widgets, poll them, serve their state.
 *
 * Usage: npm start
 */

import { serve } from "@hono/node-server";
import { createApp } from "../api/server";
import { getEnvConfig, loadDashboardConfig, loadDotEnv } from "../config";
import { Dashboard } from "../dashboard/dashboard";

async function main() {
  loadDotEnv();
  const env = getEnvConfig();
  const config = loadDashboardConfig(env.dashboardConfigPath);
  const dashboard = Dashboard.fromConfig(config, env);

  await dashboard.refreshAll();
  if (env.cronEnabled) {
    dashboard.startPolling(env.pollSchedule);
  }

  const app = createApp(dashboard);

  console.log(`
Feedboard API Server

   URL:      http://localhost:${env.port}
   Config:   ${env.dashboardConfigPath}
   Widgets:  ${dashboard.widgets.map((w) => w.id).join(", ") || "(none)"}
   Cron:     ${env.cronEnabled ? env.pollSchedule + " UTC" : "DISABLED"}

Endpoints:
   GET  /                          Health check
   GET  /api/widgets               All panels
   GET  /api/widgets/:id           One panel
   GET  /api/widgets/:id/selected  Item under the cursor
   POST /api/widgets/:id/scroll    Move cursor {"direction":"up"|"down"}
   POST /api/widgets/:id/refresh   Refetch one panel
   POST /api/refresh               Refetch everything
`);

  serve({
    fetch: app.fetch,
    port: env.port,
  });
}

main().catch((error) => {
  console.error("[serve] Failed to start:", error);
  process.exit(1);
});
