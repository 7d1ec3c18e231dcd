import type { ExtractionResult, OverallStatus, RunReport, SinkOutcome } from "../types.js";

export function overallStatusOf(outcomes: readonly SinkOutcome[]): OverallStatus {
  return outcomes.every((o) => o.status === "skipped" || o.status === "succeeded") ? "succeeded" : "partial_failure";
}

export function buildRunReport(
  transcriptId: string,
  extraction: ExtractionResult,
  outcomes: readonly SinkOutcome[],
  timing: { startedAt?: string; finishedAt?: string } = {}
): RunReport {
  const now = new Date().toISOString();
  return Object.freeze({
    transcriptId,
    extraction,
    outcomes: Object.freeze(outcomes.map((o) => Object.freeze({ ...o }))),
    overallStatus: overallStatusOf(outcomes),
    startedAt: timing.startedAt ?? now,
    finishedAt: timing.finishedAt ?? now,
  });
}
