import fs from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { InvalidInputError, NotFoundError } from "../errors.js";
import { FileTranscriptProvider } from "./file.js";

describe("FileTranscriptProvider", () => {
  let dir: string;
  const provider = new FileTranscriptProvider();

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "transcripts-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("reads a Fireflies-style JSON export", async () => {
    const file = path.join(dir, "kickoff.json");
    await fs.writeFile(
      file,
      JSON.stringify({
        id: "ff-42",
        title: "Kickoff",
        date: "2026-01-05T09:00:00Z",
        participants: ["alice@example.com"],
        sentences: [
          { speaker_name: "Alice", text: "Ship it Friday." },
          { speaker_name: "Bob", sentence: "On it." },
          { speaker_name: "Bob", text: "   " },
        ],
      })
    );

    await expect(provider.fetch(file)).resolves.toEqual({
      id: "ff-42",
      meetingTitle: "Kickoff",
      participants: ["alice@example.com"],
      text: "Alice: Ship it Friday.\nBob: On it.",
      timestamp: "2026-01-05T09:00:00.000Z",
    });
  });

  it("reads plain text with the file name as id and title", async () => {
    const file = path.join(dir, "standup.txt");
    await fs.writeFile(file, "\nWe talked about the release.\n");

    const transcript = await provider.fetch(file);
    expect(transcript.id).toBe("standup");
    expect(transcript.meetingTitle).toBe("standup");
    expect(transcript.text).toBe("We talked about the release.");
  });

  it("throws NotFoundError for a missing file", async () => {
    await expect(provider.fetch(path.join(dir, "missing.json"))).rejects.toBeInstanceOf(NotFoundError);
  });

  it("throws InvalidInputError for malformed JSON", async () => {
    const file = path.join(dir, "broken.json");
    await fs.writeFile(file, "{oops");

    await expect(provider.fetch(file)).rejects.toBeInstanceOf(InvalidInputError);
  });
});
