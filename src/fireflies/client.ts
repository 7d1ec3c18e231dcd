import { z } from "zod";
import { NotFoundError, ProviderError, RunCancelledError, providerErrorFromStatus } from "../errors.js";
import type { Transcript } from "../types.js";
import { flattenSentences, type TranscriptProvider } from "../transcripts/types.js";

export const FIREFLIES_GRAPHQL_URL = "https://api.fireflies.ai/graphql";

const TRANSCRIPT_QUERY = `
query Transcript($transcriptId: String!) {
  transcript(id: $transcriptId) {
    id
    title
    date
    participants
    sentences { speaker_name text }
  }
}
`;

const responseSchema = z.object({
  data: z
    .object({
      transcript: z
        .object({
          title: z.string().nullish(),
          date: z.union([z.number(), z.string()]).nullish(),
          participants: z.array(z.string()).nullish(),
          sentences: z
            .array(z.object({ speaker_name: z.string().nullish(), text: z.string().nullish() }))
            .nullish(),
        })
        .nullish(),
    })
    .nullish(),
  errors: z.array(z.object({ message: z.string() })).optional(),
});

function toIso(date: number | string | null | undefined): string {
  const d = date == null ? new Date() : new Date(date);
  return Number.isNaN(d.getTime()) ? new Date().toISOString() : d.toISOString();
}

export class FirefliesTranscriptProvider implements TranscriptProvider {
  readonly name = "fireflies";

  constructor(
    private apiKey: string,
    private fetchImpl: typeof fetch = fetch
  ) {}

  async fetch(meetingId: string, signal?: AbortSignal): Promise<Transcript> {
    let response: Response;
    try {
      response = await this.fetchImpl(FIREFLIES_GRAPHQL_URL, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({ query: TRANSCRIPT_QUERY, variables: { transcriptId: meetingId } }),
        signal,
      });
    } catch (err) {
      if (signal?.aborted) {
        throw signal.reason instanceof Error ? signal.reason : new RunCancelledError(undefined, { cause: err });
      }
      throw new ProviderError(`Fireflies request failed: ${err instanceof Error ? err.message : String(err)}`, "transport", undefined, {
        cause: err,
      });
    }

    if (!response.ok) {
      throw providerErrorFromStatus("Fireflies", response.status);
    }

    let json: unknown;
    try {
      json = await response.json();
    } catch (err) {
      throw new ProviderError("Fireflies returned a non-JSON body", "transport", response.status, { cause: err });
    }

    const parsed = responseSchema.safeParse(json);
    if (!parsed.success) {
      throw new ProviderError(`Fireflies response had an unexpected shape: ${parsed.error.message}`, "transport");
    }
    const body = parsed.data;

    if (body.errors && body.errors.length > 0) {
      const message = body.errors.map((e) => e.message).join("; ");
      if (/not found/i.test(message)) throw new NotFoundError(`Fireflies transcript ${meetingId}: ${message}`);
      throw new ProviderError(`Fireflies GraphQL error: ${message}`, "http", response.status);
    }

    const t = body.data?.transcript;
    if (!t) {
      throw new NotFoundError(`Fireflies has no transcript ${meetingId}`);
    }

    console.log(`[fireflies] Fetched "${t.title ?? meetingId}" (${t.sentences?.length ?? 0} sentences)`);

    return {
      id: meetingId,
      meetingTitle: t.title || "Untitled Meeting",
      participants: t.participants ?? [],
      text: flattenSentences(
        (t.sentences ?? []).map((s) => ({ speaker: s.speaker_name ?? "", text: s.text ?? "" }))
      ),
      timestamp: toIso(t.date),
    };
  }
}
