import {
  cuesToEntries,
  describeError,
  renderSrt,
  segmentCues,
} from "@wordcue/core";
import type { SpeechRecognizer } from "@wordcue/core";
import { withExtractedAudio } from "../lib/ffmpeg";
import { fileExists, replaceExtension, writeText } from "../utils/file";
import type { ItemOutcome } from "../utils/outcome";
import { recognizeWords } from "./recognize-words";

export const VERBATIM_PROMPT =
  "The following is a raw, verbatim transcription, including all filler words like 'uhm' and 'ah'.";

export interface TranscribeVideoOptions {
  recognizer: SpeechRecognizer;
  ffmpegBin: string;
  maxChars?: number;
  pauseThreshold?: number;
}

/**
 * Transcribes one video file into an `.srt` beside it.
 */
export const transcribeVideoFile = async (
  videoPath: string,
  { recognizer, ffmpegBin, maxChars, pauseThreshold }: TranscribeVideoOptions
): Promise<ItemOutcome> => {
  if (!(await fileExists(videoPath))) {
    console.error("[Subtitles] File not found", { input: videoPath });
    return { status: "missing", input: videoPath };
  }

  console.log("[Subtitles] Starting transcription", { input: videoPath });

  try {
    const words = await withExtractedAudio(
      videoPath,
      (audioPath) =>
        recognizeWords(recognizer, audioPath, {
          vad: true,
          prompt: VERBATIM_PROMPT,
        }),
      { ffmpegBin }
    );

    const cues = segmentCues(words, { maxChars, pauseThreshold });
    if (!cues.length) {
      console.warn("[Subtitles] No speech detected", { input: videoPath });
      return { status: "empty", input: videoPath };
    }

    const outputPath = replaceExtension(videoPath, ".srt");
    await writeText(outputPath, renderSrt(cuesToEntries(cues)));

    console.log("[Subtitles] Subtitle file saved", {
      outputPath,
      cues: cues.length,
    });
    return { status: "written", input: videoPath, outputPath };
  } catch (error) {
    console.error("[Subtitles Error]", {
      input: videoPath,
      error: describeError(error),
    });
    return { status: "failed", input: videoPath, error: describeError(error) };
  }
};
