import { SinkError, describeError } from "../errors.js";
import { fuzzyMatchUser, type LinearApi, type LinearUser } from "../linear/client.js";
import type { ActionItem, ExtractionResult, Priority } from "../types.js";
import { actionItemKey } from "./itemKey.js";
import type { DeliveryContext, TaskSink } from "./types.js";

const MAX_TITLE_LENGTH = 120;

const LINEAR_PRIORITY = { urgent: 1, high: 2, medium: 3, low: 4 } as const satisfies Record<Priority, number>;

function issueTitle(item: ActionItem): string {
  const first = item.description.split("\n")[0].trim();
  return first.length > MAX_TITLE_LENGTH ? `${first.slice(0, MAX_TITLE_LENGTH - 1)}…` : first;
}

function issueDescription(item: ActionItem, context: DeliveryContext, ownerLabel: string | undefined): string {
  return [
    item.description,
    "",
    `From meeting: ${context.transcript.meetingTitle} (${context.transcript.timestamp.slice(0, 10)})`,
    ownerLabel ? `Owner: ${ownerLabel}` : undefined,
    item.dueDate ? `Due: ${item.dueDate}` : undefined,
    item.project ? `Project: ${item.project}` : undefined,
  ]
    .filter((line): line is string => line !== undefined)
    .join("\n");
}

/** Files one Linear issue per action item, matching owners to Linear users by name. */
export class LinearTaskSink implements TaskSink {
  readonly kind = "task";
  private users: LinearUser[] | null = null;

  constructor(
    private api: LinearApi,
    private teamId: string,
    readonly name = "tasks"
  ) {}

  private async loadUsers(): Promise<LinearUser[]> {
    if (this.users) return this.users;
    try {
      this.users = await this.api.listUsers();
      console.log(`[sink:linear] Cached ${this.users.length} users`);
    } catch (err) {
      // Issues can still be filed unassigned.
      console.warn("[sink:linear] Could not list users:", describeError(err));
      this.users = [];
    }
    return this.users;
  }

  async send(result: ExtractionResult, context: DeliveryContext): Promise<string> {
    if (result.actionItems.length === 0) return "no action items";

    const pending = result.actionItems.filter((item) => !context.deliveredItems.has(actionItemKey(item)));
    const alreadyFiled = result.actionItems.length - pending.length;
    if (pending.length === 0) return `all ${alreadyFiled} issues already filed`;
    if (alreadyFiled > 0) console.log(`[sink:linear] Skipping ${alreadyFiled} issues filed in an earlier run`);

    const users = await this.loadUsers();
    const created: string[] = [];
    const failures: string[] = [];

    for (const item of pending) {
      if (context.signal.aborted) break;

      const assignee = item.owner ? fuzzyMatchUser(users, item.owner) : null;
      let identifier: string;
      try {
        const issue = await this.api.createIssue({
          teamId: this.teamId,
          title: issueTitle(item),
          description: issueDescription(item, context, assignee?.name ?? item.owner),
          assigneeId: assignee?.id,
          dueDate: item.dueDate,
          priority: item.priority ? LINEAR_PRIORITY[item.priority] : undefined,
        });
        identifier = issue.identifier ?? issue.id;
      } catch (err) {
        console.error(`[sink:linear] Failed to create issue for "${item.description}":`, describeError(err));
        failures.push(`"${issueTitle(item)}": ${describeError(err)}`);
        continue;
      }
      created.push(identifier);
      console.log(`[sink:linear] Created ${identifier}: ${issueTitle(item)}`);
      await context.recordItem(actionItemKey(item));
    }

    const skippedNote = alreadyFiled > 0 ? `; ${alreadyFiled} already filed` : "";
    if (failures.length > 0) {
      throw new SinkError(
        this.name,
        `created ${created.length} of ${pending.length} issues; failed ${failures.join("; ")}${skippedNote}`
      );
    }
    return `created ${created.length} issues (${created.join(", ")})${skippedNote}`;
  }
}
