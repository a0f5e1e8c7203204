import os from "os";
import path from "path";
import fs from "fs/promises";
import type {
  RecognitionOptions,
  RecognitionResult,
  SpeechRecognizer,
} from "@wordcue/core";
import { readJSON } from "../utils/file";
import { importRecognitionFromWhisperKit } from "../utils/import-whisper";
import { ensureCommand, runCommand } from "./run-command";

export interface WhisperKitOutputType {
  text: string;
  language: string;
  segments: Array<{
    text: string;
    start: number;
    end: number;
    words?: Array<{
      word: string;
      start: number;
      end: number;
    }>;
  }>;
}

export interface WhisperKitOptions {
  bin: string;
  model: string;
  modelPath?: string;
  // default: auto detect
  language?: string;
  onProgress?: (progress: number) => void;
}

export const buildWhisperKitArgs = (
  input: string,
  reportPath: string,
  options: WhisperKitOptions,
  recognition: RecognitionOptions = {}
): string[] => {
  const args = [
    "transcribe",
    "--audio-path",
    input,
    "--model",
    options.model,
    "--report",
    "--report-path",
    reportPath,
    "--concurrent-worker-count",
    "1",
    "--chunking-strategy",
    recognition.vad ? "vad" : "none",
    "--skip-special-tokens",
    "--word-timestamps",
  ];

  if (options.modelPath) {
    args.push(
      "--download-model-path",
      options.modelPath,
      "--download-tokenizer-path",
      options.modelPath
    );
  }

  const language = recognition.language ?? options.language;
  if (language && language !== "auto") {
    args.push("--language", language);
  }

  if (recognition.prompt) {
    args.push("--prompt", recognition.prompt);
  }

  return args;
};

export const transcribe = async (
  input: string,
  options: WhisperKitOptions,
  recognition: RecognitionOptions = {}
): Promise<WhisperKitOutputType> => {
  const reportPath = await fs.mkdtemp(path.join(os.tmpdir(), "wordcue-whisperkit-"));

  try {
    const args = buildWhisperKitArgs(input, reportPath, options, recognition);
    console.log(`Running command: ${options.bin} ${args.join(" ")}`);

    const { exitCode, stdout, stderr } = await runCommand(options.bin, args, {
      onStdout: (text) => {
        // 进度行形如：[=====     ] 97% | Elapsed Time: 311.06 s
        const progressMatch = text.match(/(\d+)%/);
        if (progressMatch && options.onProgress) {
          options.onProgress(Number.parseInt(progressMatch[1], 10));
        }
      },
    });

    if (exitCode !== 0) {
      throw new Error(
        `CLI exited with code ${exitCode}\nStderr:\n${stderr}\nStdout:\n${stdout}`
      );
    }

    const filename = path.basename(input, path.extname(input));
    const output = await readJSON<WhisperKitOutputType>(
      path.join(reportPath, `${filename}.json`)
    );

    if (!output) {
      throw new Error(`WhisperKit produced no report for ${input}`);
    }

    return output;
  } finally {
    await fs.rm(reportPath, { recursive: true, force: true });
  }
};

export const ensureWhisperKit = (options: WhisperKitOptions) =>
  ensureCommand("WhisperKit", options.bin, ["--help"]);

export const createWhisperKitRecognizer = (
  options: WhisperKitOptions
): SpeechRecognizer => ({
  async transcribe(audioPath, recognition): Promise<RecognitionResult> {
    const output = await transcribe(audioPath, options, recognition);
    return importRecognitionFromWhisperKit(output);
  },
});
