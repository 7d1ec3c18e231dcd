import "dotenv/config";
import { z } from "zod";
import { ConfigError } from "./errors.js";

export const SINK_IDS = ["tasks", "notification", "calendar"] as const;
export type SinkId = (typeof SINK_IDS)[number];

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

// dotenv yields "" for `KEY=`; treat that as unset so defaults apply.
function withDefault<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((v) => (typeof v === "string" && v.trim() === "" ? undefined : v), schema);
}

// Accepts true/false/1/0/yes/no in any case; blank means unset.
const optionalFlag = withDefault(
  z
    .string()
    .transform((v) => v.trim().toLowerCase())
    .pipe(z.enum(["true", "false", "1", "0", "yes", "no"]))
    .transform((v) => v === "true" || v === "1" || v === "yes")
    .optional()
);

const envSchema = z.object({
  USE_MOCK: optionalFlag,
  TIMEOUT_MS: withDefault(z.coerce.number().int().positive().default(30_000)),
  SINKS: withDefault(z.string().default(SINK_IDS.join(","))),
  PORT: withDefault(z.coerce.number().int().positive().default(3000)),
  DATA_DIR: withDefault(z.string().default("data")),
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: withDefault(z.string().default("gpt-4o-mini")),
  FIREFLIES_API_KEY: optionalString,
  FIREFLIES_WEBHOOK_SECRET: optionalString,
  LINEAR_API_KEY: optionalString,
  LINEAR_TEAM_ID: optionalString,
  SLACK_BOT_TOKEN: optionalString,
  SLACK_CHANNEL_ID: optionalString,
  GOOGLE_API_TOKEN: optionalString,
  GOOGLE_CALENDAR_ID: withDefault(z.string().default("primary")),
  GOOGLE_TIMEZONE: withDefault(z.string().default("UTC")),
  MY_NAME: optionalString,
  MY_EMAIL: optionalString,
});

export interface AppConfig {
  useMock: boolean;
  timeoutMs: number;
  sinks: SinkId[];
  port: number;
  dataDir: string;
  me: { name?: string; email?: string };
  openai: { apiKey?: string; model: string };
  fireflies: { apiKey?: string; webhookSecret?: string };
  linear: { apiKey?: string; teamId?: string };
  slack: { botToken?: string; channelId?: string };
  google: { apiToken?: string; calendarId: string; timeZone: string };
}

function parseSinkIds(raw: string): SinkId[] {
  const ids = raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);

  const sinks: SinkId[] = [];
  for (const id of ids) {
    const known = SINK_IDS.find((s) => s === id);
    if (!known) {
      throw new ConfigError(`Unknown sink "${id}" in SINKS. Expected any of: ${SINK_IDS.join(", ")}`);
    }
    if (!sinks.includes(known)) sinks.push(known);
  }
  return sinks;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid environment: ${issues}`);
  }
  const e = parsed.data;

  // Without a model key there is nothing real to run, so default to mock.
  const useMock = e.USE_MOCK ?? !e.OPENAI_API_KEY;

  return {
    useMock,
    timeoutMs: e.TIMEOUT_MS,
    sinks: parseSinkIds(e.SINKS),
    port: e.PORT,
    dataDir: e.DATA_DIR,
    me: { name: e.MY_NAME, email: e.MY_EMAIL },
    openai: { apiKey: e.OPENAI_API_KEY, model: e.OPENAI_MODEL },
    fireflies: { apiKey: e.FIREFLIES_API_KEY, webhookSecret: e.FIREFLIES_WEBHOOK_SECRET },
    linear: { apiKey: e.LINEAR_API_KEY, teamId: e.LINEAR_TEAM_ID },
    slack: { botToken: e.SLACK_BOT_TOKEN, channelId: e.SLACK_CHANNEL_ID },
    google: { apiToken: e.GOOGLE_API_TOKEN, calendarId: e.GOOGLE_CALENDAR_ID, timeZone: e.GOOGLE_TIMEZONE },
  };
}
