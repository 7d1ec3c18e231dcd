import type { AppConfig } from "../config.js";
import { InvalidInputError } from "../errors.js";
import { FirefliesTranscriptProvider } from "../fireflies/client.js";
import type { Transcript } from "../types.js";
import { FileTranscriptProvider } from "./file.js";
import { MockTranscriptProvider } from "./mock.js";
import type { TranscriptProvider } from "./types.js";

/**
 * Picks a provider from the reference's scheme:
 *   mock:<id>    canned transcript
 *   file:<path>  JSON export or plain text on disk
 *   <id>         Fireflies meeting id (mock when mocking or no API key)
 */
export class TranscriptRouter implements TranscriptProvider {
  readonly name = "router";

  constructor(
    private providers: {
      mock: TranscriptProvider;
      file: TranscriptProvider;
      remote: TranscriptProvider;
    }
  ) {}

  async fetch(sourceRef: string, signal?: AbortSignal): Promise<Transcript> {
    const ref = sourceRef.trim();
    if (!ref) throw new InvalidInputError("Empty transcript reference");

    if (ref.startsWith("mock:")) return this.providers.mock.fetch(ref.slice(5) || "mock-meeting", signal);
    if (ref.startsWith("file:")) return this.providers.file.fetch(ref.slice(5), signal);
    return this.providers.remote.fetch(ref, signal);
  }
}

export function createTranscriptProvider(config: AppConfig): TranscriptProvider {
  const mock = new MockTranscriptProvider(config.me);

  let remote: TranscriptProvider = mock;
  if (!config.useMock && config.fireflies.apiKey) {
    remote = new FirefliesTranscriptProvider(config.fireflies.apiKey);
  } else if (!config.useMock) {
    console.warn("[boot] FIREFLIES_API_KEY not set; meeting ids resolve to the mock transcript");
  }

  return new TranscriptRouter({ mock, file: new FileTranscriptProvider(), remote });
}
