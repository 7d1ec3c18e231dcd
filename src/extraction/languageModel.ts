import OpenAI from "openai";
import { ProviderError, RunCancelledError, providerErrorFromStatus } from "../errors.js";

export interface CompletionOptions {
  signal?: AbortSignal;
}

export interface LanguageModelProvider {
  readonly name: string;
  /** Returns the model's raw text answer. Throws ProviderError. */
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}

/** The slice of the OpenAI client this module calls. */
export interface ChatClient {
  chat: {
    completions: {
      create(
        body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming,
        options?: { signal?: AbortSignal; maxRetries?: number }
      ): PromiseLike<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
}

const SYSTEM_PROMPT = "You extract structured follow-up actions from meeting transcripts. Reply with JSON only.";

export class OpenAILanguageModel implements LanguageModelProvider {
  readonly name = "openai";
  private client: ChatClient;

  constructor(
    private opts: { apiKey?: string; model: string },
    client?: ChatClient
  ) {
    // Retries belong to the caller, so the SDK's own retry loop is off.
    this.client = client ?? new OpenAI({ apiKey: opts.apiKey, maxRetries: 0 });
  }

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    let resp: Awaited<ReturnType<ChatClient["chat"]["completions"]["create"]>>;
    try {
      resp = await this.client.chat.completions.create(
        {
          model: this.opts.model,
          temperature: 0,
          response_format: { type: "json_object" },
          messages: [
            { role: "system", content: SYSTEM_PROMPT },
            { role: "user", content: prompt },
          ],
        },
        { signal: options.signal, maxRetries: 0 }
      );
    } catch (err) {
      throw toProviderError(err, options.signal);
    }

    const content = resp.choices[0]?.message?.content;
    if (typeof content !== "string") {
      throw new ProviderError("OpenAI response had no message content", "transport");
    }
    return content;
  }
}

function toProviderError(err: unknown, signal?: AbortSignal): Error {
  if (signal?.aborted) {
    // The deadline or the caller aborted; surface their reason, not the SDK's.
    return signal.reason instanceof Error ? signal.reason : new RunCancelledError(undefined, { cause: err });
  }
  if (err instanceof OpenAI.APIConnectionTimeoutError) {
    return new ProviderError("OpenAI request timed out", "timeout", undefined, { cause: err });
  }
  if (err instanceof OpenAI.APIConnectionError) {
    return new ProviderError(`OpenAI connection failed: ${err.message}`, "transport", undefined, { cause: err });
  }
  if (err instanceof OpenAI.APIError && typeof err.status === "number") {
    return providerErrorFromStatus("OpenAI", err.status, err.message, { cause: err });
  }
  const message = err instanceof Error ? err.message : String(err);
  return new ProviderError(`OpenAI request failed: ${message}`, "transport", undefined, { cause: err });
}

export const MOCK_MODEL_OUTPUT = {
  summary: "Prototype is due next Friday. Bob owns the data pipeline. A follow-up call is needed.",
  action_items: [
    {
      description: "Prepare meeting summary and demo slides",
      owner: "Me",
      due_date: null,
      priority: "high",
      project: "Phoenix",
    },
    {
      description: "Build data ingestion pipeline for the prototype",
      owner: "Bob",
      due_date: null,
      priority: "urgent",
      project: "Phoenix",
    },
  ],
  follow_up_requested: true,
  follow_up: {
    title: "Follow-up: Project Phoenix",
    attendees: ["alice@example.com", "bob@example.com"],
  },
} as const;

/**
 * Deterministic stand-in used when `useMock` is on. Always answers with the
 * same canned JSON, wrapped in a code fence the way chat models often do.
 */
export class MockLanguageModel implements LanguageModelProvider {
  readonly name = "mock";
  readonly prompts: string[] = [];

  constructor(private output: string = "```json\n" + JSON.stringify(MOCK_MODEL_OUTPUT, null, 2) + "\n```") {}

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    if (options.signal?.aborted) {
      throw options.signal.reason instanceof Error ? options.signal.reason : new RunCancelledError();
    }
    console.log("[mock] Analyzing transcript with language model");
    this.prompts.push(prompt);
    return this.output;
  }
}
