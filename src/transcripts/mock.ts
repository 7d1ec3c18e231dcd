import type { Transcript } from "../types.js";
import { flattenSentences, type TranscriptProvider } from "./types.js";

export class MockTranscriptProvider implements TranscriptProvider {
  readonly name = "mock";

  constructor(private me: { name?: string; email?: string } = {}) {}

  async fetch(sourceRef: string): Promise<Transcript> {
    console.log(`[mock] Fetching transcript ${sourceRef}`);
    const myName = this.me.name || "Me";

    return {
      id: sourceRef,
      meetingTitle: "Project Phoenix kickoff",
      participants: ["alice@example.com", "bob@example.com", this.me.email || "me@example.com"],
      timestamp: "2026-01-05T09:00:00.000Z",
      text: flattenSentences([
        { speaker: "Alice", text: "We need to deliver the prototype by next Friday." },
        { speaker: "Bob", text: "I'll take the data pipeline action." },
        { speaker: myName, text: "I'll prepare the summary and arrange a follow-up call." },
      ]),
    };
  }
}
