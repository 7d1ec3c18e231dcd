import { createHash } from "crypto";
import { SinkError } from "../errors.js";
import type { ExtractionResult, Transcript } from "../types.js";
import type { DeliveryContext, SchedulerSink } from "./types.js";

const CALENDAR_API = "https://www.googleapis.com/calendar/v3/calendars";
const DEFAULT_DELAY_DAYS = 7;
const DEFAULT_DURATION_MINUTES = 30;
const EMAIL_RE = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export interface CalendarEventBody {
  id: string;
  summary: string;
  description: string;
  start: { dateTime: string; timeZone: string };
  end: { dateTime: string; timeZone: string };
  attendees: Array<{ email: string }>;
  conferenceData: {
    createRequest: { requestId: string; conferenceSolutionKey: { type: "hangoutsMeet" } };
  };
}

/**
 * Calendar event ids must be base32hex (0-9, a-v). A hash of the transcript
 * id keeps the id stable, so a redelivered follow-up hits 409 instead of
 * creating a duplicate.
 */
export function followUpEventId(transcriptId: string): string {
  return "fu" + createHash("sha1").update(transcriptId).digest("hex");
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** Wall-clock "YYYY-MM-DDTHH:mm:00" in the calendar's time zone. */
function localDateTime(date: Date, hour: number, minute: number): string {
  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}T${pad(hour)}:${pad(minute)}:00`;
}

const DATE_TIME_RE = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?$/;
const OFFSET_RE = /(Z|[+-]\d{2}:?\d{2})$/;

// Values without an offset are wall-clock times in the calendar's zone; read
// them as UTC so arithmetic keeps the wall-clock digits.
function toInstant(value: string): number {
  return new Date(OFFSET_RE.test(value) ? value : `${value}Z`).getTime();
}

/** Requires a date and a time; a bare date cannot go in `dateTime`. */
function isValidDateTime(value: string | undefined): value is string {
  return value !== undefined && DATE_TIME_RE.test(value) && !Number.isNaN(toInstant(value));
}

function plusMinutes(value: string, minutes: number): string {
  const shifted = new Date(toInstant(value) + minutes * 60_000).toISOString();
  return OFFSET_RE.test(value) ? shifted : shifted.slice(0, 19);
}

export function buildFollowUpEvent(
  result: ExtractionResult,
  transcript: Transcript,
  opts: { timeZone: string; now: Date }
): CalendarEventBody {
  const proposal = result.followUp;

  let start: string;
  let end: string;
  const proposedStart = proposal?.start;
  const proposedEnd = proposal?.end;
  if (isValidDateTime(proposedStart)) {
    start = proposedStart;
    end =
      isValidDateTime(proposedEnd) && toInstant(proposedEnd) > toInstant(start)
        ? proposedEnd
        : plusMinutes(start, DEFAULT_DURATION_MINUTES);
  } else {
    const day = new Date(opts.now.getTime() + DEFAULT_DELAY_DAYS * 86_400_000);
    start = localDateTime(day, 10, 0);
    end = localDateTime(day, 10, DEFAULT_DURATION_MINUTES);
  }

  const candidates = proposal && proposal.attendees.length > 0 ? proposal.attendees : transcript.participants;
  const attendees = [...new Set(candidates.filter((e) => EMAIL_RE.test(e)))].map((email) => ({ email }));

  const eventId = followUpEventId(transcript.id);
  return {
    id: eventId,
    summary: proposal?.title ?? `Follow-up: ${transcript.meetingTitle}`,
    description: result.summary,
    start: { dateTime: start, timeZone: opts.timeZone },
    end: { dateTime: end, timeZone: opts.timeZone },
    attendees,
    conferenceData: {
      createRequest: { requestId: eventId, conferenceSolutionKey: { type: "hangoutsMeet" } },
    },
  };
}

/** Creates a Google Meet follow-up event through the Calendar REST API. */
export class GoogleCalendarSchedulerSink implements SchedulerSink {
  readonly kind = "scheduler";

  constructor(
    private opts: { apiToken: string; calendarId: string; timeZone: string; now?: () => Date },
    private fetchImpl: typeof fetch = fetch,
    readonly name = "calendar"
  ) {}

  async send(result: ExtractionResult, { transcript, signal }: DeliveryContext): Promise<string> {
    const event = buildFollowUpEvent(result, transcript, {
      timeZone: this.opts.timeZone,
      now: this.opts.now?.() ?? new Date(),
    });
    const url = `${CALENDAR_API}/${encodeURIComponent(this.opts.calendarId)}/events?conferenceDataVersion=1&sendUpdates=all`;

    console.log(`[sink:calendar] Creating "${event.summary}" at ${event.start.dateTime}`);
    const res = await this.fetchImpl(url, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${this.opts.apiToken}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify(event),
      signal,
    });

    if (res.status === 409) {
      console.log(`[sink:calendar] Event ${event.id} already exists`);
      return `event ${event.id} already scheduled`;
    }
    if (!res.ok) {
      const body = await res.text().catch(() => "");
      throw new SinkError(this.name, `Google Calendar returned ${res.status}${body ? `: ${body.slice(0, 200)}` : ""}`);
    }
    return `scheduled "${event.summary}" (${event.id})`;
  }
}
