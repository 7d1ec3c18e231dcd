import express, { type Express } from "express";
import type { Server } from "http";
import { createFirefliesWebhookRouter, type WebhookOptions } from "./fireflies/webhook.js";
import type { PipelineDeps } from "./pipeline/runPipeline.js";
import type { RunStore } from "./pipeline/runStore.js";

export function createApp(deps: PipelineDeps & { store: RunStore }, webhook: WebhookOptions = {}): Express {
  const app = express();

  app.get("/", (_req, res) => {
    res.json({ status: "ok", service: "meeting-action-agent" });
  });

  app.get("/runs/:id", async (req, res) => {
    try {
      const report = await deps.store.getReport(req.params.id);
      if (!report) {
        res.status(404).json({ error: "No run for this transcript" });
        return;
      }
      res.json(report);
    } catch (err) {
      console.error("[server] Failed to read run:", err);
      res.status(500).json({ error: "Could not read run" });
    }
  });

  // The webhook router parses its own body: it needs the raw bytes for the signature.
  app.use("/webhooks", createFirefliesWebhookRouter(deps, webhook));

  return app;
}

export function startServer(app: Express, port: number): Server {
  return app.listen(port, () => {
    console.log(`[server] listening on port ${port}`);
  });
}
