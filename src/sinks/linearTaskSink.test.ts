import { describe, expect, it, vi } from "vitest";
import { SinkError } from "../errors.js";
import type { LinearApi, NewIssue } from "../linear/client.js";
import type { ExtractionResult, Transcript } from "../types.js";
import { actionItemKey } from "./itemKey.js";
import { LinearTaskSink } from "./linearTaskSink.js";
import type { DeliveryContext } from "./types.js";

const transcript: Transcript = {
  id: "mtg-1",
  meetingTitle: "Kickoff",
  participants: [],
  text: "text",
  timestamp: "2026-01-05T09:00:00.000Z",
};

function result(actionItems: ExtractionResult["actionItems"]): ExtractionResult {
  return { summary: "s", actionItems, followUpRequested: false, rawModelOutput: "{}", usedFallback: false };
}

function fakeApi(overrides: Partial<LinearApi> = {}): LinearApi & { created: NewIssue[] } {
  const created: NewIssue[] = [];
  return {
    created,
    listUsers: async () => [
      { id: "u-1", name: "Alex Morgan", email: "alex@example.com" },
      { id: "u-2", name: "Sam Lee", email: "sam@example.com" },
    ],
    createIssue: async (input) => {
      created.push(input);
      return { id: `id-${created.length}`, identifier: `ENG-${created.length}` };
    },
    ...overrides,
  };
}

// Stands in for the run store: keys recorded by one send are seen by the next.
function deliveryContext(recorded = new Set<string>()): DeliveryContext & { recorded: Set<string> } {
  return {
    transcript,
    signal: new AbortController().signal,
    recorded,
    deliveredItems: new Set(recorded),
    recordItem: async (key) => {
      recorded.add(key);
    },
  };
}

const context = deliveryContext();

describe("LinearTaskSink", () => {
  it("files one issue per action item with matched assignees", async () => {
    const api = fakeApi();
    const sink = new LinearTaskSink(api, "team-1");

    const detail = await sink.send(
      result([
        { description: "Send deck", owner: "alex", dueDate: "2026-01-09" },
        { description: "Book room" },
      ]),
      context
    );

    expect(detail).toBe("created 2 issues (ENG-1, ENG-2)");
    expect(api.created).toEqual([
      {
        teamId: "team-1",
        title: "Send deck",
        description: "Send deck\n\nFrom meeting: Kickoff (2026-01-05)\nOwner: Alex Morgan\nDue: 2026-01-09",
        assigneeId: "u-1",
        dueDate: "2026-01-09",
      },
      {
        teamId: "team-1",
        title: "Book room",
        description: "Book room\n\nFrom meeting: Kickoff (2026-01-05)",
        assigneeId: undefined,
        dueDate: undefined,
      },
    ]);
  });

  it("keeps an unmatched owner in the description", async () => {
    const api = fakeApi();
    await new LinearTaskSink(api, "team-1").send(result([{ description: "Call vendor", owner: "Priya" }]), context);

    expect(api.created[0].assigneeId).toBeUndefined();
    expect(api.created[0].description).toContain("Owner: Priya");
  });

  it("succeeds without calling Linear when there is nothing to file", async () => {
    const listUsers = vi.fn(async () => []);
    const sink = new LinearTaskSink(fakeApi({ listUsers }), "team-1");

    await expect(sink.send(result([]), context)).resolves.toBe("no action items");
    expect(listUsers).not.toHaveBeenCalled();
  });

  it("still files issues when the user list is unavailable", async () => {
    const api = fakeApi({ listUsers: async () => Promise.reject(new Error("forbidden")) });

    await new LinearTaskSink(api, "team-1").send(result([{ description: "Send deck", owner: "Alex" }]), context);
    expect(api.created).toHaveLength(1);
    expect(api.created[0].assigneeId).toBeUndefined();
  });

  it("maps priority to Linear's scale and notes the project", async () => {
    const api = fakeApi();
    await new LinearTaskSink(api, "team-1").send(
      result([
        { description: "Fix login", priority: "urgent", project: "Phoenix" },
        { description: "Tidy docs", priority: "low" },
      ]),
      deliveryContext()
    );

    expect(api.created[0].priority).toBe(1);
    expect(api.created[0].description).toBe("Fix login\n\nFrom meeting: Kickoff (2026-01-05)\nProject: Phoenix");
    expect(api.created[1].priority).toBe(4);
  });

  it("retries only the issues that failed in an earlier run", async () => {
    const items = result([{ description: "Prepare slides" }, { description: "Build ingestion" }]);
    const recorded = new Set<string>();
    let failIngestion = true;
    const filed: string[] = [];
    const api = fakeApi({
      createIssue: async (input) => {
        if (input.title === "Build ingestion" && failIngestion) throw new Error("rate limited");
        filed.push(input.title);
        return { id: `id-${filed.length}`, identifier: `ENG-${filed.length}` };
      },
    });
    const sink = new LinearTaskSink(api, "team-1");

    await expect(sink.send(items, deliveryContext(recorded))).rejects.toMatchObject({
      message: 'created 1 of 2 issues; failed "Build ingestion": rate limited',
    });
    expect(recorded).toEqual(new Set([actionItemKey({ description: "Prepare slides" })]));

    failIngestion = false;
    await expect(sink.send(items, deliveryContext(recorded))).resolves.toBe("created 1 issues (ENG-2); 1 already filed");
    expect(filed).toEqual(["Prepare slides", "Build ingestion"]);

    await expect(sink.send(items, deliveryContext(recorded))).resolves.toBe("all 2 issues already filed");
    expect(filed).toHaveLength(2);
  });

  it("attempts every item and reports the ones that failed", async () => {
    let calls = 0;
    const api = fakeApi({
      createIssue: async () => {
        calls++;
        if (calls === 1) throw new Error("rate limited");
        return { id: "id-2", identifier: "ENG-2" };
      },
    });
    const sink = new LinearTaskSink(api, "team-1");

    const err = await sink
      .send(result([{ description: "First" }, { description: "Second" }]), deliveryContext())
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(SinkError);
    expect(err).toMatchObject({
      sinkName: "tasks",
      message: 'created 1 of 2 issues; failed "First": rate limited',
    });
    expect(calls).toBe(2);
  });
});
