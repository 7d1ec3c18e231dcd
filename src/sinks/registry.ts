import type { AppConfig, SinkId } from "../config.js";
import { createLinearApi } from "../linear/client.js";
import { GoogleCalendarSchedulerSink } from "./googleCalendarSink.js";
import { LinearTaskSink } from "./linearTaskSink.js";
import { MockNotificationSink, MockSchedulerSink, MockTaskSink } from "./mock.js";
import { SlackNotificationSink, createSlackApi } from "./slackNotificationSink.js";
import type { Sink } from "./types.js";

type SinkFactory = (config: AppConfig) => Sink;

function mockFallback(id: SinkId, missing: string): void {
  console.warn(`[boot] ${id} sink: ${missing} not set, using mock`);
}

const factories: Record<SinkId, SinkFactory> = {
  tasks(config) {
    const { apiKey, teamId } = config.linear;
    if (config.useMock) return new MockTaskSink();
    if (!apiKey || !teamId) {
      mockFallback("tasks", "LINEAR_API_KEY/LINEAR_TEAM_ID");
      return new MockTaskSink();
    }
    return new LinearTaskSink(createLinearApi(apiKey), teamId);
  },

  notification(config) {
    const { botToken, channelId } = config.slack;
    if (config.useMock) return new MockNotificationSink();
    if (!botToken || !channelId) {
      mockFallback("notification", "SLACK_BOT_TOKEN/SLACK_CHANNEL_ID");
      return new MockNotificationSink();
    }
    return new SlackNotificationSink(createSlackApi(botToken), channelId);
  },

  calendar(config) {
    const { apiToken, calendarId, timeZone } = config.google;
    if (config.useMock) return new MockSchedulerSink();
    if (!apiToken) {
      mockFallback("calendar", "GOOGLE_API_TOKEN");
      return new MockSchedulerSink();
    }
    return new GoogleCalendarSchedulerSink({ apiToken, calendarId, timeZone });
  },
};

/** Builds the enabled sinks in the order SINKS lists them. */
export function createSinks(config: AppConfig): Sink[] {
  const sinks = config.sinks.map((id) => factories[id](config));
  console.log(`[boot] Sinks: ${sinks.map((s) => `${s.name} (${s.kind})`).join(", ") || "none"}`);
  return sinks;
}
