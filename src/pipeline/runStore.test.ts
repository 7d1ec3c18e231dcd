import fs from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { ExtractionResult, SinkOutcome } from "../types.js";
import { buildRunReport } from "./runReport.js";
import { RunStore } from "./runStore.js";

const extraction: ExtractionResult = {
  summary: "s",
  actionItems: [{ description: "Send deck", owner: "Alex" }],
  followUpRequested: false,
  rawModelOutput: "{}",
  usedFallback: false,
};

describe("RunStore", () => {
  let dir: string;
  let store: RunStore;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "run-store-"));
    store = new RunStore(dir);
    await store.init();
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("knows nothing about a new transcript", async () => {
    expect(await store.deliveredSinks("mtg-1")).toEqual(new Set());
    expect(await store.isProcessed("mtg-1")).toBe(false);
    expect(await store.getReport("mtg-1")).toBeNull();
  });

  it("remembers succeeded sinks across partial runs", async () => {
    const first: SinkOutcome[] = [
      { sinkName: "tasks", status: "succeeded" },
      { sinkName: "notification", status: "failed", detail: "down" },
    ];
    await store.recordRun(buildRunReport("mtg-1", extraction, first));

    expect(await store.deliveredSinks("mtg-1")).toEqual(new Set(["tasks"]));
    expect(await store.isProcessed("mtg-1")).toBe(false);

    const second: SinkOutcome[] = [
      { sinkName: "tasks", status: "skipped", detail: "already delivered" },
      { sinkName: "notification", status: "succeeded" },
    ];
    await store.recordRun(buildRunReport("mtg-1", extraction, second));

    expect(await store.deliveredSinks("mtg-1")).toEqual(new Set(["tasks", "notification"]));
    expect(await store.isProcessed("mtg-1")).toBe(true);
  });

  it("keeps item keys per sink and ignores duplicates", async () => {
    await store.recordDeliveredItem("mtg-1", "tasks", "item:a");
    await store.recordDeliveredItem("mtg-1", "tasks", "item:a");
    await store.recordDeliveredItem("mtg-1", "notification", "summary:1.2");

    expect(await store.deliveredItems("mtg-1")).toEqual(
      new Map([
        ["tasks", new Set(["item:a"])],
        ["notification", new Set(["summary:1.2"])],
      ])
    );
    expect(await store.deliveredItems("mtg-2")).toEqual(new Map());
    expect(await store.isProcessed("mtg-1")).toBe(false);
  });

  it("keeps item keys when a run is recorded afterwards", async () => {
    await store.recordDeliveredItem("mtg-1", "tasks", "item:a");
    await store.recordRun(buildRunReport("mtg-1", extraction, [{ sinkName: "tasks", status: "failed", detail: "x" }]));

    expect(await store.deliveredItems("mtg-1")).toEqual(new Map([["tasks", new Set(["item:a"])]]));
  });

  it("reads a delivery log written before item keys existed", async () => {
    await fs.writeFile(
      path.join(dir, "delivered.json"),
      JSON.stringify({ "mtg-1": { sinks: ["tasks"], completed: true } }),
      "utf-8"
    );

    expect(await store.isProcessed("mtg-1")).toBe(true);
    expect(await store.deliveredItems("mtg-1")).toEqual(new Map());
  });

  it("round-trips the latest report", async () => {
    const report = buildRunReport("team/weekly 1", extraction, [{ sinkName: "tasks", status: "succeeded" }], {
      startedAt: "2026-01-05T09:00:00.000Z",
      finishedAt: "2026-01-05T09:00:01.000Z",
    });
    await store.recordRun(report);

    expect(await store.getReport("team/weekly 1")).toEqual(report);
  });

  it("serializes concurrent writes to the delivery log", async () => {
    await Promise.all(
      ["a", "b", "c"].map((id) =>
        store.recordRun(buildRunReport(id, extraction, [{ sinkName: "tasks", status: "succeeded" }]))
      )
    );

    for (const id of ["a", "b", "c"]) {
      expect(await store.isProcessed(id)).toBe(true);
    }
  });

  it("starts fresh when the delivery log is corrupt", async () => {
    await fs.writeFile(path.join(dir, "delivered.json"), "{not json", "utf-8");

    expect(await store.deliveredSinks("mtg-1")).toEqual(new Set());
  });
});
