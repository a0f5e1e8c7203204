import { generateText } from "ai";
import type { CoreMessage, LanguageModel } from "ai";
import { createGeminiClient, createOpenAIClient } from "../lib";
import type { EngineName, TranslationConfig } from "./config";

/**
 * One external translator. Calls may reject; callers never assume success.
 */
export interface TranslationEngine {
  readonly name: string;
  translate(text: string, targetLanguage: string): Promise<string>;
}

export interface LLMTranslationEngineOptions {
  name: string;
  modelId: string;
  model: LanguageModel;
  temperature?: number;
  maxRetries?: number;
}

const buildSystemPrompt = (targetLanguage: string) =>
  `You are a professional subtitle translator. Translate the user's text into the language with code "${targetLanguage}".

Guidelines:
- Some lines start with a marker such as "0_> ". Keep every marker exactly as written, at the start of its line.
- Keep the number of marked lines and their order unchanged. Never merge or split marked lines.
- Translate only the text after the marker. Preserve numbers and proper nouns.
- Keep translations concise and natural for spoken dialogue.

Format:
- Respond with the translated text only, no explanations, no code fences.`;

export const createLLMTranslationEngine = ({
  name,
  modelId,
  model,
  temperature = 0.2,
  maxRetries = 2,
}: LLMTranslationEngineOptions): TranslationEngine => ({
  name,
  async translate(text, targetLanguage) {
    const llmMessages: CoreMessage[] = [
      { role: "system", content: buildSystemPrompt(targetLanguage) },
      { role: "user", content: text },
    ];

    console.log("[TranslateEngine Request]", {
      engine: name,
      model: modelId,
      targetLanguage,
      characters: text.length,
      timestamp: new Date().toISOString(),
    });

    const response = await generateText({
      model,
      messages: llmMessages,
      temperature,
      maxRetries,
    });

    return response.text.trim();
  },
});

const engineFactories: Record<
  EngineName,
  (config: TranslationConfig) => TranslationEngine
> = {
  gemini: (config) =>
    createLLMTranslationEngine({
      name: "gemini",
      modelId: config.gemini.model,
      model: createGeminiClient({ apiKey: config.gemini.apiKey })(
        config.gemini.model
      ),
    }),
  openai: (config) =>
    createLLMTranslationEngine({
      name: "openai",
      modelId: config.openai.model,
      model: createOpenAIClient({
        apiKey: config.openai.apiKey,
        baseURL: config.openai.baseURL,
      })(config.openai.model),
    }),
};

export const createTranslationEngine = (
  name: EngineName,
  config: TranslationConfig
): TranslationEngine => engineFactories[name](config);

export const createTranslationEngines = (
  config: TranslationConfig
): { engines: TranslationEngine[]; perEntryEngine: TranslationEngine } => {
  const engines = config.engines.map((name) =>
    createTranslationEngine(name, config)
  );
  const perEntryEngine =
    engines.find((engine) => engine.name === config.perEntryEngine) ??
    createTranslationEngine(config.perEntryEngine, config);

  return { engines, perEntryEngine };
};
