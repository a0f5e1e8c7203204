import dotenv from "dotenv";
import { Command, InvalidArgumentError } from "commander";
import {
  DEFAULT_CUE_PAUSE_SECONDS,
  DEFAULT_MAX_CUE_CHARS,
  DEFAULT_SENTENCE_PAUSE_SECONDS,
  DEFAULT_SENTENCES_PER_PARAGRAPH,
} from "@wordcue/core";
import {
  DEFAULT_BATCH_SIZE,
  DEFAULT_INTER_BATCH_DELAY_MS,
  createTranslationEngines,
  loadTranslationConfig,
} from "@wordcue/ai";
import { loadCliConfig } from "./config";
import { ensureFfmpeg } from "./lib/ffmpeg";
import { createWhisperKitRecognizer, ensureWhisperKit } from "./lib/whisper-kit";
import { transcribeAudioFile } from "./tools/transcribe-audio";
import { transcribeVideoFile } from "./tools/transcribe-video";
import { translateSrtFile } from "./tools/translate-srt";
import { processFiles, resolveExitCode } from "./utils/outcome";

dotenv.config();

const parsePositiveInteger = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
};

const parseNonNegativeNumber = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a non-negative number.");
  }
  return parsed;
};

// 加载识别引擎，失败时在处理任何文件之前中止
const loadRecognizer = async () => {
  const config = loadCliConfig();
  console.log(`Loading WhisperKit model '${config.whisperKit.model}'...`);
  await ensureWhisperKit(config.whisperKit);
  return { config, recognizer: createWhisperKitRecognizer(config.whisperKit) };
};

const program = new Command();

program
  .name("wordcue")
  .description("Transcribe speech into text and subtitles, and translate subtitle files")
  .version("0.1.0");

program
  .command("transcribe")
  .description("Transcribe audio files into paragraph-formatted .txt files")
  .argument("<audio...>", "audio files to transcribe")
  .option(
    "--sentences-per-paragraph <n>",
    "sentences per paragraph",
    parsePositiveInteger,
    DEFAULT_SENTENCES_PER_PARAGRAPH
  )
  .option(
    "--pause <seconds>",
    "pause that ends a sentence",
    parseNonNegativeNumber,
    DEFAULT_SENTENCE_PAUSE_SECONDS
  )
  .action(
    async (
      inputs: string[],
      options: { sentencesPerParagraph: number; pause: number }
    ) => {
      const { recognizer } = await loadRecognizer();
      const outcomes = await processFiles(inputs, (input) =>
        transcribeAudioFile(input, {
          recognizer,
          sentencesPerParagraph: options.sentencesPerParagraph,
          pauseThreshold: options.pause,
        })
      );
      process.exitCode = resolveExitCode(outcomes);
    }
  );

program
  .command("subtitles")
  .description("Transcribe video files into .srt subtitle files")
  .argument("<video...>", "video files to transcribe")
  .option(
    "--max-chars <n>",
    "characters after which a cue line is broken",
    parsePositiveInteger,
    DEFAULT_MAX_CUE_CHARS
  )
  .option(
    "--pause <seconds>",
    "pause that ends a cue",
    parseNonNegativeNumber,
    DEFAULT_CUE_PAUSE_SECONDS
  )
  .action(
    async (inputs: string[], options: { maxChars: number; pause: number }) => {
      const { config, recognizer } = await loadRecognizer();
      await ensureFfmpeg({ ffmpegBin: config.ffmpegBin });

      const outcomes = await processFiles(inputs, (input) =>
        transcribeVideoFile(input, {
          recognizer,
          ffmpegBin: config.ffmpegBin,
          maxChars: options.maxChars,
          pauseThreshold: options.pause,
        })
      );
      process.exitCode = resolveExitCode(outcomes);
    }
  );

program
  .command("translate")
  .description("Translate .srt subtitle files into {name}_{language}.srt")
  .argument("<srt...>", "subtitle files to translate")
  .option("-t, --target <language>", "target language code", "vi")
  .option(
    "-b, --batch-size <n>",
    "subtitle entries per translation request",
    parsePositiveInteger,
    DEFAULT_BATCH_SIZE
  )
  .option(
    "--delay <ms>",
    "pause between batches in milliseconds",
    parseNonNegativeNumber,
    DEFAULT_INTER_BATCH_DELAY_MS
  )
  .action(
    async (
      inputs: string[],
      options: { target: string; batchSize: number; delay: number }
    ) => {
      const { engines, perEntryEngine } = createTranslationEngines(
        loadTranslationConfig()
      );

      const outcomes = await processFiles(inputs, (input) =>
        translateSrtFile(input, {
          engines,
          perEntryEngine,
          targetLanguage: options.target,
          batchSize: options.batchSize,
          interBatchDelayMs: options.delay,
        })
      );
      process.exitCode = resolveExitCode(outcomes);
    }
  );

program.parseAsync().catch((error) => {
  console.error("Error in CLI:", error);
  process.exit(1);
});
