import { ProviderError, RunCancelledError, TimeoutError } from "../errors.js";
import type { ExtractionEngine } from "../extraction/engine.js";
import type { Sink } from "../sinks/types.js";
import type { TranscriptProvider } from "../transcripts/types.js";
import type { RunReport, Transcript } from "../types.js";
import { throwIfCancelled, withDeadline } from "../util/deadline.js";
import { dispatch } from "./dispatcher.js";
import { buildRunReport } from "./runReport.js";
import type { RunStore } from "./runStore.js";

export interface PipelineDeps {
  transcripts: TranscriptProvider;
  engine: ExtractionEngine;
  sinks: readonly Sink[];
  timeoutMs: number;
  store?: RunStore;
}

async function fetchTranscript(
  provider: TranscriptProvider,
  sourceRef: string,
  timeoutMs: number,
  signal?: AbortSignal
): Promise<Transcript> {
  try {
    return await withDeadline((s) => provider.fetch(sourceRef, s), { timeoutMs, signal });
  } catch (err) {
    if (err instanceof TimeoutError) {
      throw new ProviderError(`${provider.name} did not return ${sourceRef} within ${err.timeoutMs}ms`, "timeout", undefined, {
        cause: err,
      });
    }
    throw err;
  }
}

/**
 * One full run: fetch → extract → dispatch → report. Extraction failures
 * abort before any sink is called. A cancelled run rejects with
 * RunCancelledError and persists no report. Item keys recorded by sinks
 * before the cancellation are kept.
 */
export async function runPipeline(sourceRef: string, deps: PipelineDeps, signal?: AbortSignal): Promise<RunReport> {
  const startedAt = new Date().toISOString();

  try {
    const transcript = await fetchTranscript(deps.transcripts, sourceRef, deps.timeoutMs, signal);
    console.log(`[pipeline] Processing: ${transcript.meetingTitle} (${transcript.id})`);

    const extraction = await deps.engine.extract(transcript, signal);

    const store = deps.store;
    const outcomes = await dispatch(extraction, deps.sinks, {
      transcript,
      timeoutMs: deps.timeoutMs,
      signal,
      alreadyDelivered: store ? await store.deliveredSinks(transcript.id) : undefined,
      deliveredItems: store ? await store.deliveredItems(transcript.id) : undefined,
      onItemDelivered: store ? (sinkName, key) => store.recordDeliveredItem(transcript.id, sinkName, key) : undefined,
    });

    throwIfCancelled(signal);
    const report = buildRunReport(transcript.id, extraction, outcomes, {
      startedAt,
      finishedAt: new Date().toISOString(),
    });

    if (deps.store) await deps.store.recordRun(report);
    console.log(`[pipeline] ${transcript.id}: ${report.overallStatus}`);
    return report;
  } catch (err) {
    if (signal?.aborted && !(err instanceof RunCancelledError)) {
      throw new RunCancelledError(undefined, { cause: err });
    }
    throw err;
  }
}
