import { Hono } from "hono";
import { cors } from "hono/cors";
import { z } from "zod";
import type { Dashboard } from "../dashboard/dashboard";

/**
 * Dashboard API
 *
 * Read-only views of every panel plus the few actions a front end needs:
 * move a panel's cursor and force a refresh.
 */

const SERVICE_VERSION = "0.1.0";

const ScrollBodySchema = z.object({
  direction: z.enum(["up", "down"]),
});

export function createApp(dashboard: Dashboard) {
  const app = new Hono();

  app.use("*", cors());

  app.get("/", (c) => {
    return c.json({
      service: "feedboard",
      version: SERVICE_VERSION,
      widgets: dashboard.widgets.length,
    });
  });

  app.get("/api/widgets", (c) => c.json(dashboard.snapshots()));

  app.get("/api/widgets/:id", (c) => {
    const widget = dashboard.getWidget(c.req.param("id"));
    if (!widget) return c.json({ error: "Widget not found" }, 404);
    return c.json(widget.snapshot());
  });

  app.get("/api/widgets/:id/selected", (c) => {
    const widget = dashboard.getWidget(c.req.param("id"));
    if (!widget) return c.json({ error: "Widget not found" }, 404);
    return c.json(widget.getSelectedItem());
  });

  app.post("/api/widgets/:id/scroll", async (c) => {
    const widget = dashboard.getWidget(c.req.param("id"));
    if (!widget) return c.json({ error: "Widget not found" }, 404);

    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json({ error: "Invalid JSON body" }, 400);
    }

    const parsed = ScrollBodySchema.safeParse(body);
    if (!parsed.success) {
      return c.json({ error: 'direction must be "up" or "down"' }, 400);
    }

    if (parsed.data.direction === "up") widget.scrollUp();
    else widget.scrollDown();

    return c.json({ cursor: widget.cursor });
  });

  app.post("/api/widgets/:id/refresh", async (c) => {
    const id = c.req.param("id");
    const widget = await dashboard.refreshWidget(id);
    if (!widget) return c.json({ error: "Widget not found" }, 404);

    console.log(`[api] Refreshed ${id}`);
    return c.json(widget.snapshot());
  });

  app.post("/api/refresh", async (c) => {
    await dashboard.refreshAll();
    return c.json(dashboard.snapshots());
  });

  return app;
}
