import type { ExtractionResult, Transcript } from "../types.js";

export type SinkKind = "task" | "notification" | "scheduler";

export interface DeliveryContext {
  transcript: Transcript;
  signal: AbortSignal;
  /** Keys this sink recorded for the transcript in earlier runs. */
  deliveredItems: ReadonlySet<string>;
  /**
   * Persists the key of one side effect right after it happens. A sink that
   * makes several (one issue per item) checks `deliveredItems` first so a
   * retry only redoes what failed.
   */
  recordItem(key: string): Promise<void>;
}

interface SinkOf<K extends SinkKind> {
  readonly name: string;
  readonly kind: K;
  /**
   * Delivers the result. Resolves with an optional human-readable detail;
   * throws (ideally a SinkError) on failure.
   */
  send(result: ExtractionResult, context: DeliveryContext): Promise<string | void>;
}

export type TaskSink = SinkOf<"task">;
export type NotificationSink = SinkOf<"notification">;
/** Only invoked when the extraction asks for a follow-up. */
export type SchedulerSink = SinkOf<"scheduler">;

export type Sink = TaskSink | NotificationSink | SchedulerSink;
