import type { ExtractionResult } from "../types.js";
import { groupByOwner } from "./slackNotificationSink.js";
import type { DeliveryContext, NotificationSink, SchedulerSink, TaskSink } from "./types.js";

export class MockTaskSink implements TaskSink {
  readonly kind = "task";
  constructor(readonly name = "tasks") {}

  async send(result: ExtractionResult): Promise<string> {
    console.log(`[mock] Creating ${result.actionItems.length} tasks`);
    for (const item of result.actionItems) {
      console.log(`[mock]   • ${item.description}${item.owner ? ` → ${item.owner}` : ""}${item.dueDate ? ` (due ${item.dueDate})` : ""}${item.priority ? ` [${item.priority}]` : ""}`);
    }
    return `mock: ${result.actionItems.length} tasks`;
  }
}

export class MockNotificationSink implements NotificationSink {
  readonly kind = "notification";
  constructor(readonly name = "notification") {}

  async send(result: ExtractionResult, { transcript }: DeliveryContext): Promise<string> {
    console.log(`[mock] Notifying about "${transcript.meetingTitle}": ${result.summary.slice(0, 100)}`);
    for (const notice of groupByOwner(result.actionItems, transcript.participants)) {
      console.log(`[mock]   → ${notice.email ?? notice.owner}: ${notice.items.length} items`);
    }
    return "mock: notification sent";
  }
}

export class MockSchedulerSink implements SchedulerSink {
  readonly kind = "scheduler";
  constructor(readonly name = "calendar") {}

  async send(result: ExtractionResult, { transcript }: DeliveryContext): Promise<string> {
    const title = result.followUp?.title ?? `Follow-up: ${transcript.meetingTitle}`;
    console.log(`[mock] Scheduling "${title}"`);
    return `mock: scheduled "${title}"`;
  }
}
