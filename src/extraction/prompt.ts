import type { Transcript } from "../types.js";

export interface PromptIdentity {
  name?: string;
  email?: string;
}

export function buildExtractionPrompt(
  transcript: Transcript,
  me: PromptIdentity = {},
  today: Date = new Date()
): string {
  const identity = [me.name && `Name: ${me.name}`, me.email && `Email: ${me.email}`].filter(Boolean).join("\n");

  return `Convert the meeting transcript below into follow-up actions.

Return a single JSON object with exactly this shape:
{
  "summary": "2-3 sentence summary of the meeting",
  "action_items": [{"description": "what needs to be done", "owner": "person name or email, or null", "due_date": "YYYY-MM-DD or null", "priority": "urgent | high | medium | low or null", "project": "project name or null"}],
  "follow_up_requested": true or false,
  "follow_up": {"title": "meeting name", "start": "ISO 8601 datetime", "end": "ISO 8601 datetime", "attendees": ["email"]} or null
}

Rules:
- Only include action items someone actually committed to. Leave owner, due_date, priority and project null when not stated.
- Resolve relative dates ("next Friday") against today's date: ${today.toISOString().slice(0, 10)}.
- Set follow_up_requested to true only if the participants agreed to meet again.
${identity ? `\nThe person running this agent (refer to them as the owner when they take an action):\n${identity}\n` : ""}
## Meeting
Title: ${transcript.meetingTitle}
Date: ${transcript.timestamp}
Participants: ${transcript.participants.length > 0 ? transcript.participants.join(", ") : "unknown"}

## Transcript
${transcript.text}`;
}
