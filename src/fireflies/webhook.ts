import { createHmac, timingSafeEqual } from "crypto";
import express, { Router, type Response } from "express";
import type { IncomingMessage } from "http";
import { z } from "zod";
import { InvalidInputError, NotFoundError, ProviderError, RunCancelledError, describeError } from "../errors.js";
import { runPipeline, type PipelineDeps } from "../pipeline/runPipeline.js";
import type { RunStore } from "../pipeline/runStore.js";
import type { RunReport } from "../types.js";

// Fireflies sends { meetingId, eventType, clientReferenceId }; `id` is accepted for manual triggers.
const payloadSchema = z
  .object({
    meetingId: z.string().trim().min(1).optional(),
    id: z.string().trim().min(1).optional(),
    eventType: z.string().optional(),
  })
  .passthrough();

// Fireflies ids are opaque alphanumerics. Anything else (a `file:` or `mock:`
// reference, a path) is refused so callers cannot reach the local providers.
const MEETING_ID_RE = /^[A-Za-z0-9_-]{1,128}$/;

export interface WebhookOptions {
  /** Shared secret for the `x-hub-signature` HMAC-SHA256 of the raw body. */
  secret?: string;
}

function signatureMatches(secret: string, body: Buffer, header: string | undefined): boolean {
  if (!header) return false;
  const expected = Buffer.from(createHmac("sha256", secret).update(body).digest("hex"));
  const given = Buffer.from(header.trim().replace(/^sha256=/, ""));
  return expected.length === given.length && timingSafeEqual(expected, given);
}

function statusFor(err: unknown): number {
  if (err instanceof InvalidInputError) return 422;
  if (err instanceof NotFoundError) return 404;
  if (err instanceof ProviderError) return 502;
  if (err instanceof RunCancelledError) return 503;
  return 500;
}

function sendError(res: Response, err: unknown): void {
  const status = statusFor(err);
  res.status(status).json({ error: status === 500 ? "Processing failed" : describeError(err) });
}

export function createFirefliesWebhookRouter(
  deps: PipelineDeps & { store: RunStore },
  options: WebhookOptions = {}
): Router {
  const router = Router();
  const rawBodies = new WeakMap<IncomingMessage, Buffer>();
  // One run per meeting at a time; Fireflies retries deliveries it thinks timed out.
  const inFlight = new Map<string, Promise<RunReport | null>>();

  const parseJson = express.json({
    limit: "5mb",
    verify: (req, _res, buf) => {
      rawBodies.set(req, buf);
    },
  });

  router.post("/fireflies", parseJson, async (req, res) => {
    const body = rawBodies.get(req) ?? Buffer.alloc(0);
    if (options.secret && !signatureMatches(options.secret, body, req.get("x-hub-signature"))) {
      console.warn("[webhook] Rejected: bad signature");
      res.status(401).json({ error: "Invalid signature" });
      return;
    }

    const parsed = payloadSchema.safeParse(req.body);
    const meetingId = parsed.success ? parsed.data.meetingId ?? parsed.data.id : undefined;

    if (!meetingId) {
      console.log("[webhook] Rejected: missing meetingId");
      res.status(400).json({ error: "Missing meetingId" });
      return;
    }
    if (!MEETING_ID_RE.test(meetingId)) {
      console.warn(`[webhook] Rejected: invalid meetingId ${JSON.stringify(meetingId.slice(0, 80))}`);
      res.status(400).json({ error: "Invalid meetingId" });
      return;
    }

    if (inFlight.has(meetingId)) {
      console.log(`[webhook] Skipped: ${meetingId} is already running`);
      res.status(202).json({ status: "in_progress", id: meetingId });
      return;
    }

    // Registered before the first await so a concurrent delivery sees it.
    const run = (async () => {
      if (await deps.store.isProcessed(meetingId)) return null;
      console.log(`[webhook] New meeting: ${meetingId}${parsed.success && parsed.data.eventType ? ` (${parsed.data.eventType})` : ""}`);
      return runPipeline(meetingId, deps);
    })();
    inFlight.set(meetingId, run);

    try {
      const report = await run;
      if (!report) {
        console.log(`[webhook] Skipped: ${meetingId} already processed`);
        res.json({ status: "already_processed", id: meetingId });
        return;
      }
      res.json({ status: "processed", report });
    } catch (err) {
      console.error("[webhook] Error:", describeError(err));
      sendError(res, err);
    } finally {
      inFlight.delete(meetingId);
    }
  });

  return router;
}
