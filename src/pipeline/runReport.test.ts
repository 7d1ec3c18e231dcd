import { describe, expect, it } from "vitest";
import type { ExtractionResult, SinkOutcome } from "../types.js";
import { buildRunReport, overallStatusOf } from "./runReport.js";

const extraction: ExtractionResult = {
  summary: "s",
  actionItems: [],
  followUpRequested: false,
  rawModelOutput: "{}",
  usedFallback: false,
};

describe("overallStatusOf", () => {
  it("succeeds when every attempted sink succeeded", () => {
    const outcomes: SinkOutcome[] = [
      { sinkName: "tasks", status: "succeeded" },
      { sinkName: "calendar", status: "skipped", detail: "no follow-up requested" },
    ];
    expect(overallStatusOf(outcomes)).toBe("succeeded");
  });

  it("reports partial failure when any attempted sink failed", () => {
    const outcomes: SinkOutcome[] = [
      { sinkName: "tasks", status: "succeeded" },
      { sinkName: "notification", status: "failed", detail: "x" },
    ];
    expect(overallStatusOf(outcomes)).toBe("partial_failure");
  });

  it("succeeds with no sinks or only skipped ones", () => {
    expect(overallStatusOf([])).toBe("succeeded");
    expect(overallStatusOf([{ sinkName: "calendar", status: "skipped" }])).toBe("succeeded");
  });
});

describe("buildRunReport", () => {
  it("copies outcomes in order and freezes the report", () => {
    const outcomes: SinkOutcome[] = [
      { sinkName: "tasks", status: "failed", detail: "x" },
      { sinkName: "notification", status: "succeeded" },
    ];
    const report = buildRunReport("mtg-1", extraction, outcomes, {
      startedAt: "2026-01-05T09:00:00.000Z",
      finishedAt: "2026-01-05T09:00:02.000Z",
    });

    expect(report).toEqual({
      transcriptId: "mtg-1",
      extraction,
      outcomes,
      overallStatus: "partial_failure",
      startedAt: "2026-01-05T09:00:00.000Z",
      finishedAt: "2026-01-05T09:00:02.000Z",
    });
    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.outcomes)).toBe(true);

    outcomes.push({ sinkName: "late", status: "failed" });
    expect(report.outcomes).toHaveLength(2);
  });
});
