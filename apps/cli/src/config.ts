import { z } from "zod";

const emptyAsUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const optionalString = z.preprocess(emptyAsUndefined, z.string().trim().optional());

const stringOr = (fallback: string) =>
  z.preprocess(emptyAsUndefined, z.string().trim().default(fallback));

const cliEnvSchema = z.object({
  WHISPERKIT_BIN: stringOr("whisperkit-cli"),
  WHISPERKIT_MODEL: stringOr("large-v3"),
  WHISPERKIT_MODEL_PATH: optionalString,
  TRANSCRIPTION_LANGUAGE: optionalString,
  FFMPEG_BIN: stringOr("ffmpeg"),
});

export interface CliConfig {
  whisperKit: {
    bin: string;
    model: string;
    modelPath?: string;
    language?: string;
  };
  ffmpegBin: string;
}

export function loadCliConfig(
  env: Record<string, string | undefined> = process.env
): CliConfig {
  const parsed = cliEnvSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid CLI configuration: ${issues}`);
  }

  const values = parsed.data;
  return {
    whisperKit: {
      bin: values.WHISPERKIT_BIN,
      model: values.WHISPERKIT_MODEL,
      modelPath: values.WHISPERKIT_MODEL_PATH,
      language: values.TRANSCRIPTION_LANGUAGE,
    },
    ffmpegBin: values.FFMPEG_BIN,
  };
}
