import { z } from "zod";
import { PRIORITIES, type ActionItem, type ExtractionResult, type FollowUpProposal } from "../types.js";

export const FALLBACK_SUMMARY_LENGTH = 200;

// Upper bound on candidate objects tried during recovery, so pathological
// input with thousands of stray braces stays linear-ish.
const MAX_RECOVERY_CANDIDATES = 16;

type JsonObject = Record<string, unknown>;

const optionalText = z.string().trim().min(1).optional().catch(undefined);

const isoDate = z
  .string()
  .trim()
  .regex(/^\d{4}-\d{2}-\d{2}/)
  .transform((s) => s.slice(0, 10))
  .optional()
  .catch(undefined);

const priority = z
  .string()
  .transform((s) => s.trim().toLowerCase())
  .pipe(z.enum(PRIORITIES))
  .optional()
  .catch(undefined);

const actionItemSchema = z.object({
  description: z.string().trim().min(1),
  owner: optionalText,
  due_date: isoDate,
  priority,
  project: optionalText,
});

const stringList = z
  .array(z.unknown())
  .catch([])
  .transform((items) => items.filter((s): s is string => typeof s === "string" && s.trim() !== ""));

const followUpSchema = z
  .object({
    title: optionalText,
    start: optionalText,
    end: optionalText,
    attendees: stringList,
  })
  .optional()
  .catch(undefined);

const extractionSchema = z.object({
  summary: z.string().catch(""),
  action_items: z.array(z.unknown()).catch([]),
  follow_up_requested: z.boolean().catch(false),
  follow_up: followUpSchema,
});

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function tryParseObject(text: string): JsonObject | undefined {
  try {
    const value: unknown = JSON.parse(text);
    return isJsonObject(value) ? value : undefined;
  } catch {
    return undefined;
  }
}

/** Stage 1: the whole text must be one JSON object. */
export function parseStrict(rawText: string): JsonObject | undefined {
  return tryParseObject(rawText.trim());
}

/**
 * Returns the index of the `}` that closes the `{` at `start`, or -1.
 * Braces inside double-quoted strings are ignored.
 */
export function findMatchingBrace(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "{") depth++;
    else if (ch === "}") {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/**
 * Stage 2: pulls the first balanced `{...}` that parses as a JSON object out
 * of surrounding prose or code fences. An unclosed or unparseable candidate
 * moves the scan to the next `{`.
 */
export function extractJsonObject(rawText: string): JsonObject | undefined {
  let start = rawText.indexOf("{");
  let attempts = 0;

  while (start !== -1 && attempts < MAX_RECOVERY_CANDIDATES) {
    attempts++;
    const end = findMatchingBrace(rawText, start);
    if (end !== -1) {
      const parsed = tryParseObject(rawText.slice(start, end + 1));
      if (parsed) return parsed;
    }

    start = rawText.indexOf("{", start + 1);
  }
  return undefined;
}

function toActionItems(items: unknown[]): ActionItem[] {
  const out: ActionItem[] = [];
  for (const raw of items) {
    const parsed = actionItemSchema.safeParse(raw);
    if (!parsed.success) continue;

    const item: ActionItem = { description: parsed.data.description };
    if (parsed.data.owner) item.owner = parsed.data.owner;
    if (parsed.data.due_date) item.dueDate = parsed.data.due_date;
    if (parsed.data.priority) item.priority = parsed.data.priority;
    if (parsed.data.project) item.project = parsed.data.project;
    out.push(item);
  }
  return out;
}

function toFollowUp(value: z.infer<typeof followUpSchema>): FollowUpProposal | undefined {
  if (!value) return undefined;
  const proposal: FollowUpProposal = { attendees: value.attendees };
  if (value.title) proposal.title = value.title;
  if (value.start) proposal.start = value.start;
  if (value.end) proposal.end = value.end;
  return proposal;
}

export function coerceExtraction(obj: JsonObject, rawText: string): ExtractionResult {
  const fields = extractionSchema.parse(obj);

  const result: ExtractionResult = {
    summary: fields.summary,
    actionItems: toActionItems(fields.action_items),
    followUpRequested: fields.follow_up_requested,
    rawModelOutput: rawText,
    usedFallback: false,
  };

  const followUp = toFollowUp(fields.follow_up);
  if (followUp) result.followUp = followUp;
  return result;
}

export function fallbackExtraction(rawText: string): ExtractionResult {
  return {
    summary: Array.from(rawText).slice(0, FALLBACK_SUMMARY_LENGTH).join(""),
    actionItems: [],
    followUpRequested: false,
    rawModelOutput: rawText,
    usedFallback: true,
  };
}

/**
 * Turns arbitrary model output into a well-formed ExtractionResult.
 * Never throws: unparseable text yields a degraded result with
 * `usedFallback` set.
 */
export function validate(rawText: string): ExtractionResult {
  const obj = parseStrict(rawText) ?? extractJsonObject(rawText);
  return obj ? coerceExtraction(obj, rawText) : fallbackExtraction(rawText);
}
