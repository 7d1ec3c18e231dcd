import { RunCancelledError, describeError } from "../errors.js";
import type { DeliveryContext, Sink } from "../sinks/types.js";
import type { ExtractionResult, SinkOutcome, Transcript } from "../types.js";
import { throwIfCancelled, withDeadline } from "../util/deadline.js";

export interface DispatchOptions {
  transcript: Transcript;
  timeoutMs: number;
  signal?: AbortSignal;
  /** Sink names that already delivered this transcript in an earlier run. */
  alreadyDelivered?: ReadonlySet<string>;
  /** Item keys each sink recorded in earlier runs, by sink name. */
  deliveredItems?: ReadonlyMap<string, ReadonlySet<string>>;
  onItemDelivered?: (sinkName: string, key: string) => Promise<void>;
}

const NOTHING_DELIVERED: ReadonlySet<string> = new Set();

function skipReason(sink: Sink, result: ExtractionResult, alreadyDelivered?: ReadonlySet<string>): string | undefined {
  switch (sink.kind) {
    case "scheduler":
      if (!result.followUpRequested) return "no follow-up requested";
      break;
    case "task":
    case "notification":
      break;
  }
  if (alreadyDelivered?.has(sink.name)) return "already delivered";
  return undefined;
}

/**
 * Sends `result` to each sink in registration order. A failing sink becomes a
 * "failed" outcome and never stops the others; only cancellation escapes.
 */
export async function dispatch(
  result: ExtractionResult,
  sinks: readonly Sink[],
  { transcript, timeoutMs, signal, alreadyDelivered, deliveredItems, onItemDelivered }: DispatchOptions
): Promise<SinkOutcome[]> {
  const outcomes: SinkOutcome[] = [];

  for (const sink of sinks) {
    throwIfCancelled(signal);

    const reason = skipReason(sink, result, alreadyDelivered);
    if (reason) {
      console.log(`[dispatch] ${sink.name}: skipped (${reason})`);
      outcomes.push({ sinkName: sink.name, status: "skipped", detail: reason });
      continue;
    }

    try {
      const detail = await withDeadline(
        (s) => {
          const context: DeliveryContext = {
            transcript,
            signal: s,
            deliveredItems: deliveredItems?.get(sink.name) ?? NOTHING_DELIVERED,
            recordItem: async (key) => {
              if (onItemDelivered) await onItemDelivered(sink.name, key);
            },
          };
          return sink.send(result, context);
        },
        { timeoutMs, signal }
      );
      console.log(`[dispatch] ${sink.name}: succeeded${detail ? ` (${detail})` : ""}`);
      outcomes.push(detail ? { sinkName: sink.name, status: "succeeded", detail } : { sinkName: sink.name, status: "succeeded" });
    } catch (err) {
      if (err instanceof RunCancelledError) throw err;
      if (signal?.aborted) throw new RunCancelledError(undefined, { cause: err });

      const detail = describeError(err);
      console.error(`[dispatch] ${sink.name}: failed (${detail})`);
      outcomes.push({ sinkName: sink.name, status: "failed", detail });
    }
  }

  return outcomes;
}
