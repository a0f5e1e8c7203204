import os from "os";
import path from "path";
import fs from "fs/promises";
import { ensureCommand, runCommand } from "./run-command";

export interface ExtractAudioOptions {
  ffmpegBin: string;
}

export const buildExtractAudioArgs = (input: string, output: string): string[] => [
  "-y",
  "-i",
  input,
  "-vn",
  "-ac",
  "1",
  "-ar",
  "16000",
  output,
];

// 从视频中提取单声道 16kHz WAV
export const extractAudio = async (
  input: string,
  output: string,
  { ffmpegBin }: ExtractAudioOptions
): Promise<void> => {
  const { exitCode, stderr } = await runCommand(
    ffmpegBin,
    buildExtractAudioArgs(input, output)
  );

  if (exitCode !== 0) {
    throw new Error(`ffmpeg exited with code ${exitCode}\nStderr:\n${stderr}`);
  }
};

/**
 * Extracts the audio track into a private temp directory, hands its path to
 * `fn`, and removes the directory however `fn` ends.
 */
export const withExtractedAudio = async <T>(
  input: string,
  fn: (audioPath: string) => Promise<T>,
  options: ExtractAudioOptions
): Promise<T> => {
  const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "wordcue-audio-"));
  const audioPath = path.join(tempDir, "audio.wav");

  try {
    console.log("[ExtractAudio]", { input, audioPath });
    await extractAudio(input, audioPath, options);
    return await fn(audioPath);
  } finally {
    await fs.rm(tempDir, { recursive: true, force: true });
  }
};

export const ensureFfmpeg = ({ ffmpegBin }: ExtractAudioOptions) =>
  ensureCommand("ffmpeg", ffmpegBin, ["-version"]);
