#!/usr/bin/env node
import { createPipelineDeps } from "./bootstrap.js";
import { loadConfig } from "./config.js";
import { RunCancelledError } from "./errors.js";
import { runPipeline } from "./pipeline/runPipeline.js";
import { createApp, startServer } from "./server.js";

const USAGE = `Usage:
  meeting-agent <sourceRef>   run once and print the report
  meeting-agent serve         start the webhook server

sourceRef: mock:<id> | file:<path> | <fireflies meeting id>`;

async function main() {
  const [command] = process.argv.slice(2);
  if (!command || command === "--help" || command === "-h") {
    console.log(USAGE);
    process.exitCode = command ? 0 : 1;
    return;
  }

  console.log("=== Meeting Action Agent ===\n");
  const config = loadConfig();
  const deps = await createPipelineDeps(config);

  if (command === "serve") {
    const secret = config.fireflies.webhookSecret;
    if (!secret) console.warn("[server] FIREFLIES_WEBHOOK_SECRET not set; webhook calls are not authenticated");
    startServer(createApp(deps, { secret }), config.port);
    return;
  }

  const controller = new AbortController();
  process.once("SIGINT", () => {
    console.warn("\n[cli] Interrupted, cancelling run...");
    controller.abort(new RunCancelledError("Interrupted"));
  });

  const report = await runPipeline(command, deps, controller.signal);
  process.stdout.write(JSON.stringify(report, null, 2) + "\n");
  process.exitCode = report.overallStatus === "succeeded" ? 0 : 2;
}

main().catch((err) => {
  console.error("Fatal:", err);
  process.exit(1);
});
