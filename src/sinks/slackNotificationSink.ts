import { WebClient } from "@slack/web-api";
import { SinkError, describeError } from "../errors.js";
import type { ActionItem, ExtractionResult, Transcript } from "../types.js";
import type { DeliveryContext, NotificationSink } from "./types.js";

const EMAIL_RE = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

/** What the notification sink needs from Slack. */
export interface SlackApi {
  postMessage(message: { channel: string; text: string; threadTs?: string }): Promise<{ ts?: string }>;
  lookupUserIdByEmail(email: string): Promise<string | undefined>;
}

export function createSlackApi(botToken: string): SlackApi {
  const client = new WebClient(botToken);
  return {
    async postMessage({ channel, text, threadTs }) {
      const res = threadTs
        ? await client.chat.postMessage({ channel, text, thread_ts: threadTs, unfurl_links: false })
        : await client.chat.postMessage({ channel, text, unfurl_links: false });
      return { ts: res.ts };
    },
    async lookupUserIdByEmail(email) {
      const res = await client.users.lookupByEmail({ email });
      return res.user?.id;
    },
  };
}

export interface OwnerNotice {
  owner: string;
  email?: string;
  items: ActionItem[];
}

/** Resolves "Bob" to "bob@example.com" when a participant's address matches the name. */
export function ownerEmail(owner: string, participants: readonly string[]): string | undefined {
  if (EMAIL_RE.test(owner)) return owner.toLowerCase();
  const name = owner.toLowerCase().trim();
  const first = name.split(/\s+/)[0];

  return participants
    .filter((p) => EMAIL_RE.test(p))
    .find((p) => {
      const local = p.toLowerCase().split("@")[0];
      return local === name || local === first || local.split(/[._-]/)[0] === first;
    })
    ?.toLowerCase();
}

/** Groups owned items by owner, in first-seen order. Unowned items notify no one. */
export function groupByOwner(items: readonly ActionItem[], participants: readonly string[]): OwnerNotice[] {
  const byOwner = new Map<string, OwnerNotice>();
  for (const item of items) {
    if (!item.owner) continue;
    const key = item.owner.toLowerCase();
    const notice = byOwner.get(key);
    if (notice) {
      notice.items.push(item);
    } else {
      byOwner.set(key, { owner: item.owner, email: ownerEmail(item.owner, participants), items: [item] });
    }
  }
  return [...byOwner.values()];
}

export function formatOwnerMessage(notice: OwnerNotice, transcript: Transcript, mention: string): string {
  const items = notice.items.map((a) => `  • ${a.description}${a.dueDate ? ` (due ${a.dueDate})` : ""}`);
  return [`${mention}, your action items from *${transcript.meetingTitle}*:`, ...items].join("\n");
}

export function formatSummaryMessage(result: ExtractionResult, transcript: Transcript): string {
  const actionList =
    result.actionItems.length > 0
      ? result.actionItems
          .map((a) => `  • ${a.description}${a.owner ? ` → *${a.owner}*` : ""}${a.dueDate ? ` (due ${a.dueDate})` : ""}`)
          .join("\n")
      : "  _None identified_";

  const lines = [
    `📋 *Meeting Summary: ${transcript.meetingTitle}*`,
    `_${transcript.timestamp.slice(0, 10)}_\n`,
    result.summary || "_No summary available_",
    `\n*Action Items (${result.actionItems.length}):*`,
    actionList,
  ];
  if (result.followUpRequested) {
    lines.push(`\n📅 A follow-up meeting was requested.`);
  }
  if (result.usedFallback) {
    lines.push(`\n⚠️ _The model's answer could not be parsed; this summary is the raw response._`);
  }
  return lines.join("\n");
}

const SUMMARY_KEY = "summary:";

function ownerKey(notice: OwnerNotice): string {
  return `owner:${notice.owner.toLowerCase()}`;
}

/**
 * Posts the meeting summary to a Slack channel, then a threaded reply to
 * each owner listing their own items, mentioning them when their Slack
 * account can be found by email.
 */
export class SlackNotificationSink implements NotificationSink {
  readonly kind = "notification";

  constructor(
    private api: SlackApi,
    private channelId: string,
    readonly name = "notification"
  ) {}

  private async mentionFor(notice: OwnerNotice): Promise<string> {
    if (!notice.email) return `*${notice.owner}*`;
    try {
      const userId = await this.api.lookupUserIdByEmail(notice.email);
      return userId ? `<@${userId}>` : `*${notice.owner}*`;
    } catch (err) {
      console.warn(`[sink:slack] No Slack user for ${notice.email}: ${describeError(err)}`);
      return `*${notice.owner}*`;
    }
  }

  private async postSummary(result: ExtractionResult, context: DeliveryContext): Promise<string | undefined> {
    console.log(`[sink:slack] Posting summary to ${this.channelId}`);
    let ts: string | undefined;
    try {
      ({ ts } = await this.api.postMessage({ channel: this.channelId, text: formatSummaryMessage(result, context.transcript) }));
    } catch (err) {
      throw new SinkError(this.name, `Slack post failed: ${describeError(err)}`, { cause: err });
    }
    await context.recordItem(SUMMARY_KEY + (ts ?? ""));
    return ts;
  }

  async send(result: ExtractionResult, context: DeliveryContext): Promise<string> {
    const previous = [...context.deliveredItems].find((k) => k.startsWith(SUMMARY_KEY));
    let ts: string | undefined;
    if (previous === undefined) {
      ts = await this.postSummary(result, context);
    } else {
      ts = previous.slice(SUMMARY_KEY.length) || undefined;
      console.log(`[sink:slack] Summary already posted to ${this.channelId}`);
    }

    const notified: string[] = [];
    const failures: string[] = [];
    for (const notice of groupByOwner(result.actionItems, context.transcript.participants)) {
      if (context.signal.aborted) break;
      if (context.deliveredItems.has(ownerKey(notice))) continue;

      try {
        const mention = await this.mentionFor(notice);
        await this.api.postMessage({
          channel: this.channelId,
          text: formatOwnerMessage(notice, context.transcript, mention),
          threadTs: ts,
        });
      } catch (err) {
        console.error(`[sink:slack] Failed to notify ${notice.owner}:`, describeError(err));
        failures.push(`${notice.owner}: ${describeError(err)}`);
        continue;
      }
      notified.push(notice.owner);
      await context.recordItem(ownerKey(notice));
    }

    if (failures.length > 0) {
      throw new SinkError(this.name, `summary posted; failed to notify ${failures.join("; ")}`);
    }

    const where = `${this.channelId}${ts ? ` (ts ${ts})` : ""}`;
    const summary = previous === undefined ? `posted to ${where}` : `summary already in ${where}`;
    return notified.length > 0 ? `${summary}; notified ${notified.join(", ")}` : summary;
  }
}
