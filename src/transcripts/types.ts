import type { Transcript } from "../types.js";

export interface TranscriptProvider {
  readonly name: string;
  /** Throws NotFoundError when the reference names nothing, ProviderError on upstream failure. */
  fetch(sourceRef: string, signal?: AbortSignal): Promise<Transcript>;
}

export interface TranscriptSentence {
  speaker: string;
  text: string;
}

export function flattenSentences(sentences: readonly TranscriptSentence[]): string {
  return sentences
    .filter((s) => s.text.trim())
    .map((s) => (s.speaker ? `${s.speaker}: ${s.text.trim()}` : s.text.trim()))
    .join("\n");
}
