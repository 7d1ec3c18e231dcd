export interface Transcript {
  readonly id: string;
  readonly meetingTitle: string;
  readonly participants: readonly string[];
  readonly text: string;
  /** ISO 8601 */
  readonly timestamp: string;
}

export const PRIORITIES = ["urgent", "high", "medium", "low"] as const;
export type Priority = (typeof PRIORITIES)[number];

export interface ActionItem {
  description: string;
  owner?: string;
  /** YYYY-MM-DD */
  dueDate?: string;
  priority?: Priority;
  project?: string;
}

export interface FollowUpProposal {
  title?: string;
  start?: string;
  end?: string;
  attendees: string[];
}

export interface ExtractionResult {
  summary: string;
  actionItems: ActionItem[];
  followUpRequested: boolean;
  followUp?: FollowUpProposal;
  /** Model output exactly as received, kept for audit. */
  rawModelOutput: string;
  /** True when the output could not be parsed and a degraded result was built. */
  usedFallback: boolean;
}

export type SinkStatus = "succeeded" | "failed" | "skipped";

export interface SinkOutcome {
  sinkName: string;
  status: SinkStatus;
  detail?: string;
}

export type OverallStatus = "succeeded" | "partial_failure";

export interface RunReport {
  readonly transcriptId: string;
  readonly extraction: ExtractionResult;
  readonly outcomes: readonly SinkOutcome[];
  readonly overallStatus: OverallStatus;
  readonly startedAt: string;
  readonly finishedAt: string;
}
