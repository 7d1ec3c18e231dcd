import { describe, expect, it, vi } from "vitest";
import type { ExtractionResult, Transcript } from "../types.js";
import { GoogleCalendarSchedulerSink, buildFollowUpEvent, followUpEventId } from "./googleCalendarSink.js";

const transcript: Transcript = {
  id: "mtg-1",
  meetingTitle: "Kickoff",
  participants: ["alice@example.com", "Bob"],
  text: "text",
  timestamp: "2026-01-05T09:00:00.000Z",
};

const result: ExtractionResult = {
  summary: "We agreed on scope.",
  actionItems: [],
  followUpRequested: true,
  rawModelOutput: "{}",
  usedFallback: false,
};

const now = new Date("2026-01-05T12:00:00.000Z");

function fakeFetch(response: () => Response) {
  return vi.fn<Parameters<typeof fetch>, ReturnType<typeof fetch>>(async () => response());
}

describe("followUpEventId", () => {
  it("is a stable base32hex id", () => {
    const id = followUpEventId("mtg-1");
    expect(id).toMatch(/^fu[0-9a-f]{40}$/);
    expect(followUpEventId("mtg-1")).toBe(id);
    expect(followUpEventId("mtg-2")).not.toBe(id);
  });
});

describe("buildFollowUpEvent", () => {
  it("defaults to 10:00 a week out with the participants who have emails", () => {
    const event = buildFollowUpEvent(result, transcript, { timeZone: "Europe/Berlin", now });

    expect(event.summary).toBe("Follow-up: Kickoff");
    expect(event.description).toBe("We agreed on scope.");
    expect(event.start).toEqual({ dateTime: "2026-01-12T10:00:00", timeZone: "Europe/Berlin" });
    expect(event.end).toEqual({ dateTime: "2026-01-12T10:30:00", timeZone: "Europe/Berlin" });
    expect(event.attendees).toEqual([{ email: "alice@example.com" }]);
    expect(event.conferenceData.createRequest.requestId).toBe(event.id);
  });

  it("uses the model's proposal when it has a valid start", () => {
    const event = buildFollowUpEvent(
      {
        ...result,
        followUp: { title: "Phoenix sync", start: "2026-01-12T15:00:00Z", attendees: ["carol@example.com", "nope"] },
      },
      transcript,
      { timeZone: "UTC", now }
    );

    expect(event.summary).toBe("Phoenix sync");
    expect(event.start.dateTime).toBe("2026-01-12T15:00:00Z");
    expect(event.end.dateTime).toBe("2026-01-12T15:30:00.000Z");
    expect(event.attendees).toEqual([{ email: "carol@example.com" }]);
  });
});

describe("buildFollowUpEvent proposal checks", () => {
  const withProposal = (start: string, end?: string) =>
    buildFollowUpEvent(
      { ...result, followUp: end ? { start, end, attendees: [] } : { start, attendees: [] } },
      transcript,
      { timeZone: "UTC", now }
    );

  it("ignores a date-only start and uses the default slot", () => {
    const event = withProposal("2026-01-12");

    expect(event.start.dateTime).toBe("2026-01-12T10:00:00");
    expect(event.end.dateTime).toBe("2026-01-12T10:30:00");
  });

  it("replaces an end that is not after the start", () => {
    expect(withProposal("2026-01-12T15:00:00Z", "2026-01-12T14:00:00Z").end.dateTime).toBe("2026-01-12T15:30:00.000Z");
    expect(withProposal("2026-01-12T15:00:00Z", "2026-01-12T15:00:00Z").end.dateTime).toBe("2026-01-12T15:30:00.000Z");
  });

  it("keeps a later end as proposed", () => {
    expect(withProposal("2026-01-12T15:00:00Z", "2026-01-12T16:00:00Z").end.dateTime).toBe("2026-01-12T16:00:00Z");
  });

  it("keeps wall-clock proposals in wall-clock form", () => {
    const event = withProposal("2026-01-12T15:00:00");

    expect(event.start.dateTime).toBe("2026-01-12T15:00:00");
    expect(event.end.dateTime).toBe("2026-01-12T15:30:00");
  });
});

describe("GoogleCalendarSchedulerSink", () => {
  const context = {
    transcript,
    signal: new AbortController().signal,
    deliveredItems: new Set<string>(),
    recordItem: async () => {},
  };
  const opts = { apiToken: "test-token", calendarId: "team@group.calendar.google.com", timeZone: "UTC", now: () => now };

  it("inserts the event on the configured calendar", async () => {
    const fetchImpl = fakeFetch(() => new Response("{}", { status: 200 }));
    const sink = new GoogleCalendarSchedulerSink(opts, fetchImpl);

    const detail = await sink.send(result, context);

    expect(detail).toBe(`scheduled "Follow-up: Kickoff" (${followUpEventId("mtg-1")})`);
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe(
      "https://www.googleapis.com/calendar/v3/calendars/team%40group.calendar.google.com/events?conferenceDataVersion=1&sendUpdates=all"
    );
    expect(init?.method).toBe("POST");
    expect(JSON.parse(String(init?.body))).toMatchObject({ summary: "Follow-up: Kickoff", id: followUpEventId("mtg-1") });
  });

  it("treats an existing event as already scheduled", async () => {
    const sink = new GoogleCalendarSchedulerSink(opts, fakeFetch(() => new Response("", { status: 409 })));

    await expect(sink.send(result, context)).resolves.toBe(`event ${followUpEventId("mtg-1")} already scheduled`);
  });

  it("fails with the API's status and body", async () => {
    const sink = new GoogleCalendarSchedulerSink(opts, fakeFetch(() => new Response("invalid credentials", { status: 401 })));

    await expect(sink.send(result, context)).rejects.toMatchObject({
      name: "SinkError",
      message: "Google Calendar returned 401: invalid credentials",
    });
  });
});
