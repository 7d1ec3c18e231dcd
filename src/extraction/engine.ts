import { InvalidInputError, ProviderError, RunCancelledError, TimeoutError, describeError } from "../errors.js";
import type { ExtractionResult, Transcript } from "../types.js";
import { withDeadline } from "../util/deadline.js";
import type { LanguageModelProvider } from "./languageModel.js";
import { buildExtractionPrompt, type PromptIdentity } from "./prompt.js";
import { validate } from "./validator.js";

export interface ExtractionEngineOptions {
  timeoutMs: number;
  me?: PromptIdentity;
  now?: () => Date;
}

export class ExtractionEngine {
  constructor(
    private model: LanguageModelProvider,
    private opts: ExtractionEngineOptions
  ) {}

  /**
   * One model call per invocation; provider failures surface as
   * ProviderError and are never retried here.
   */
  async extract(transcript: Transcript, signal?: AbortSignal): Promise<ExtractionResult> {
    if (!transcript.text.trim()) {
      throw new InvalidInputError(`Transcript ${transcript.id} has no text`);
    }

    const prompt = buildExtractionPrompt(transcript, this.opts.me, this.opts.now?.() ?? new Date());
    console.log(`[extract] Sending ${transcript.text.length} chars to ${this.model.name}`);

    let raw: string;
    try {
      raw = await withDeadline((s) => this.model.complete(prompt, { signal: s }), {
        timeoutMs: this.opts.timeoutMs,
        signal,
      });
    } catch (err) {
      if (err instanceof TimeoutError) {
        throw new ProviderError(`${this.model.name} did not answer within ${err.timeoutMs}ms`, "timeout", undefined, {
          cause: err,
        });
      }
      if (err instanceof ProviderError || err instanceof RunCancelledError) throw err;
      throw new ProviderError(`${this.model.name} failed: ${describeError(err)}`, "transport", undefined, { cause: err });
    }

    const result = validate(raw);
    if (result.usedFallback) {
      console.warn(`[extract] Could not parse model output for ${transcript.id}; using degraded result`);
    }
    console.log(`[extract] ${result.actionItems.length} action items, follow-up: ${result.followUpRequested}`);
    return result;
  }
}
