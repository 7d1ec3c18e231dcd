import type { AppConfig } from "./config.js";
import { ExtractionEngine } from "./extraction/engine.js";
import { MockLanguageModel, OpenAILanguageModel, type LanguageModelProvider } from "./extraction/languageModel.js";
import type { PipelineDeps } from "./pipeline/runPipeline.js";
import { RunStore } from "./pipeline/runStore.js";
import { createSinks } from "./sinks/registry.js";
import { createTranscriptProvider } from "./transcripts/router.js";

export function createLanguageModel(config: AppConfig): LanguageModelProvider {
  if (config.useMock) return new MockLanguageModel();
  return new OpenAILanguageModel({ apiKey: config.openai.apiKey, model: config.openai.model });
}

/** Wires every collaborator from one explicit config; nothing reads globals after this. */
export async function createPipelineDeps(config: AppConfig): Promise<PipelineDeps & { store: RunStore }> {
  console.log(`[boot] Mode: ${config.useMock ? "MOCK" : "LIVE"} (timeout ${config.timeoutMs}ms)`);

  const store = new RunStore(config.dataDir);
  await store.init();
  console.log("[boot] Run store ready");

  const engine = new ExtractionEngine(createLanguageModel(config), {
    timeoutMs: config.timeoutMs,
    me: config.me,
  });

  return {
    transcripts: createTranscriptProvider(config),
    engine,
    sinks: createSinks(config),
    timeoutMs: config.timeoutMs,
    store,
  };
}
