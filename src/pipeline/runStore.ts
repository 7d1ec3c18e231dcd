import fs from "fs/promises";
import path from "path";
import { z } from "zod";
import { PRIORITIES, type RunReport } from "../types.js";

const deliveryLogSchema = z.record(
  z.object({
    sinks: z.array(z.string()),
    completed: z.boolean(),
    // Per sink, keys of the individual side effects (issues, messages) already made.
    items: z.record(z.array(z.string())).default({}),
  })
);

type DeliveryLog = z.infer<typeof deliveryLogSchema>;
type DeliveryEntry = DeliveryLog[string];

const actionItemSchema = z.object({
  description: z.string(),
  owner: z.string().optional(),
  dueDate: z.string().optional(),
  priority: z.enum(PRIORITIES).optional(),
  project: z.string().optional(),
});

const runReportSchema = z.object({
  transcriptId: z.string(),
  extraction: z.object({
    summary: z.string(),
    actionItems: z.array(actionItemSchema),
    followUpRequested: z.boolean(),
    followUp: z
      .object({
        title: z.string().optional(),
        start: z.string().optional(),
        end: z.string().optional(),
        attendees: z.array(z.string()),
      })
      .optional(),
    rawModelOutput: z.string(),
    usedFallback: z.boolean(),
  }),
  outcomes: z.array(
    z.object({
      sinkName: z.string(),
      status: z.enum(["succeeded", "failed", "skipped"]),
      detail: z.string().optional(),
    })
  ),
  overallStatus: z.enum(["succeeded", "partial_failure"]),
  startedAt: z.string(),
  finishedAt: z.string(),
});

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

/**
 * JSON-file record of past runs. Remembers which sinks, and which items
 * within a sink, already delivered a transcript so a rerun does not file the
 * same tasks twice.
 */
export class RunStore {
  private readonly runsDir: string;
  private readonly logFile: string;
  private writes: Promise<void> = Promise.resolve();

  constructor(dataDir: string) {
    this.runsDir = path.resolve(dataDir, "runs");
    this.logFile = path.resolve(dataDir, "delivered.json");
  }

  async init(): Promise<void> {
    await fs.mkdir(this.runsDir, { recursive: true });
  }

  private reportPath(transcriptId: string): string {
    return path.join(this.runsDir, `${encodeURIComponent(transcriptId)}.json`);
  }

  private async readLog(): Promise<DeliveryLog> {
    let raw: string;
    try {
      raw = await fs.readFile(this.logFile, "utf-8");
    } catch (err) {
      if (isMissingFile(err)) return {};
      throw err;
    }
    const parsed = deliveryLogSchema.safeParse(parseJson(raw));
    if (!parsed.success) {
      console.warn(`[store] ${this.logFile} is malformed, starting a fresh delivery log`);
      return {};
    }
    return parsed.data;
  }

  async deliveredSinks(transcriptId: string): Promise<Set<string>> {
    const log = await this.readLog();
    return new Set(log[transcriptId]?.sinks ?? []);
  }

  async isProcessed(transcriptId: string): Promise<boolean> {
    const log = await this.readLog();
    return log[transcriptId]?.completed ?? false;
  }

  /** Item keys each sink already delivered for this transcript, by sink name. */
  async deliveredItems(transcriptId: string): Promise<Map<string, Set<string>>> {
    const log = await this.readLog();
    const items = log[transcriptId]?.items ?? {};
    return new Map(Object.entries(items).map(([sink, keys]) => [sink, new Set(keys)]));
  }

  /** Records one side effect as soon as it happens, so a retry after a crash or partial failure skips it. */
  recordDeliveredItem(transcriptId: string, sinkName: string, key: string): Promise<void> {
    return this.updateLog(transcriptId, (entry) => {
      const keys = entry.items[sinkName] ?? [];
      if (!keys.includes(key)) entry.items[sinkName] = [...keys, key];
    });
  }

  async recordRun(report: RunReport): Promise<void> {
    await this.updateLog(report.transcriptId, async (entry) => {
      await this.init();
      await fs.writeFile(this.reportPath(report.transcriptId), JSON.stringify(report, null, 2), "utf-8");

      const sinks = new Set(entry.sinks);
      for (const o of report.outcomes) {
        if (o.status === "succeeded") sinks.add(o.sinkName);
      }
      entry.sinks = [...sinks];
      entry.completed = entry.completed || report.overallStatus === "succeeded";
    });
    console.log(`[store] Saved run ${report.transcriptId} (${report.overallStatus})`);
  }

  // Serializes read-modify-write of the shared log file.
  private updateLog(transcriptId: string, mutate: (entry: DeliveryEntry) => void | Promise<void>): Promise<void> {
    const write = this.writes.then(async () => {
      const log = await this.readLog();
      const entry: DeliveryEntry = log[transcriptId] ?? { sinks: [], completed: false, items: {} };
      await mutate(entry);
      log[transcriptId] = entry;
      await fs.mkdir(path.dirname(this.logFile), { recursive: true });
      await fs.writeFile(this.logFile, JSON.stringify(log, null, 2), "utf-8");
    });
    this.writes = write.catch(() => undefined);
    return write;
  }

  async getReport(transcriptId: string): Promise<RunReport | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.reportPath(transcriptId), "utf-8");
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw err;
    }
    const parsed = runReportSchema.safeParse(parseJson(raw));
    return parsed.success ? parsed.data : null;
  }
}
