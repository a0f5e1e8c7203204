import { z } from "zod";

export const ENGINE_NAMES = ["gemini", "openai"] as const;

export type EngineName = (typeof ENGINE_NAMES)[number];

const engineNameSchema = z.enum(ENGINE_NAMES);

// dotenv leaves unset values as empty strings
const emptyAsUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const optionalString = z.preprocess(emptyAsUndefined, z.string().trim().optional());

const translationEnvSchema = z.object({
  GOOGLE_GENERATIVE_AI_API_KEY: optionalString,
  OPENAI_API_KEY: optionalString,
  OPENAI_BASE_URL: z.preprocess(emptyAsUndefined, z.string().url().optional()),
  TRANSLATION_ENGINES: z.preprocess(
    emptyAsUndefined,
    z
      .string()
      .default("gemini,openai")
      .transform((value) =>
        value
          .split(",")
          .map((name) => name.trim())
          .filter(Boolean)
      )
      .pipe(z.array(engineNameSchema).min(1))
  ),
  TRANSLATION_PER_ENTRY_ENGINE: z.preprocess(
    emptyAsUndefined,
    engineNameSchema.optional()
  ),
  GEMINI_TRANSLATION_MODEL: z.preprocess(
    emptyAsUndefined,
    z.string().default("gemini-2.5-flash")
  ),
  OPENAI_TRANSLATION_MODEL: z.preprocess(
    emptyAsUndefined,
    z.string().default("gpt-4o-mini")
  ),
});

export interface TranslationConfig {
  engines: EngineName[];
  perEntryEngine: EngineName;
  gemini: {
    apiKey?: string;
    model: string;
  };
  openai: {
    apiKey?: string;
    baseURL?: string;
    model: string;
  };
}

export function loadTranslationConfig(
  env: Record<string, string | undefined> = process.env
): TranslationConfig {
  const parsed = translationEnvSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid translation configuration: ${issues}`);
  }

  const values = parsed.data;

  return {
    engines: values.TRANSLATION_ENGINES,
    perEntryEngine:
      values.TRANSLATION_PER_ENTRY_ENGINE ?? values.TRANSLATION_ENGINES[0],
    gemini: {
      apiKey: values.GOOGLE_GENERATIVE_AI_API_KEY,
      model: values.GEMINI_TRANSLATION_MODEL,
    },
    openai: {
      apiKey: values.OPENAI_API_KEY,
      baseURL: values.OPENAI_BASE_URL,
      model: values.OPENAI_TRANSLATION_MODEL,
    },
  };
}
