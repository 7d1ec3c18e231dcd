import type { Stats } from "fs";
import fs from "fs/promises";
import path from "path";
import { z } from "zod";
import { InvalidInputError, NotFoundError } from "../errors.js";
import type { Transcript } from "../types.js";
import { flattenSentences, type TranscriptProvider } from "./types.js";

const sentenceSchema = z.object({
  speaker_name: z.string().catch(""),
  text: z.string().optional(),
  sentence: z.string().optional(),
});

// Accepts both Fireflies exports (sentences) and hand-written transcripts (text).
const transcriptFileSchema = z.object({
  id: z.string().optional(),
  title: z.string().optional(),
  date: z.union([z.string(), z.number()]).optional(),
  participants: z.array(z.string()).catch([]),
  sentences: z.array(sentenceSchema).optional(),
  text: z.string().optional(),
});

function toIsoDate(value: string | number | undefined, fallback: Date): string {
  if (value === undefined) return fallback.toISOString();
  const d = new Date(value);
  return Number.isNaN(d.getTime()) ? fallback.toISOString() : d.toISOString();
}

export class FileTranscriptProvider implements TranscriptProvider {
  readonly name = "file";

  async fetch(filePath: string): Promise<Transcript> {
    const resolved = path.resolve(filePath);
    let raw: string;
    let stat: Stats;
    try {
      [raw, stat] = await Promise.all([fs.readFile(resolved, "utf-8"), fs.stat(resolved)]);
    } catch (err) {
      throw new NotFoundError(`Transcript file not found: ${resolved}`, { cause: err });
    }

    const baseId = path.basename(resolved, path.extname(resolved));

    if (path.extname(resolved).toLowerCase() !== ".json") {
      return {
        id: baseId,
        meetingTitle: baseId,
        participants: [],
        text: raw.trim(),
        timestamp: stat.mtime.toISOString(),
      };
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new InvalidInputError(`Transcript file ${resolved} is not valid JSON`, { cause: err });
    }

    const parsed = transcriptFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new InvalidInputError(`Transcript file ${resolved} has an unexpected shape: ${parsed.error.message}`);
    }
    const t = parsed.data;

    const text = t.sentences
      ? flattenSentences(t.sentences.map((s) => ({ speaker: s.speaker_name, text: s.text ?? s.sentence ?? "" })))
      : (t.text ?? "").trim();

    return {
      id: t.id || baseId,
      meetingTitle: t.title || baseId,
      participants: t.participants,
      text,
      timestamp: toIsoDate(t.date, stat.mtime),
    };
  }
}
