import {
  describeError,
  groupParagraphs,
  renderTranscript,
  segmentSentences,
} from "@wordcue/core";
import type { SpeechRecognizer } from "@wordcue/core";
import { fileExists, replaceExtension, writeText } from "../utils/file";
import type { ItemOutcome } from "../utils/outcome";
import { recognizeWords } from "./recognize-words";

export interface TranscribeAudioOptions {
  recognizer: SpeechRecognizer;
  sentencesPerParagraph?: number;
  pauseThreshold?: number;
}

/**
 * Transcribes one audio file into a paragraph-formatted `.txt` beside it.
 */
export const transcribeAudioFile = async (
  audioPath: string,
  { recognizer, sentencesPerParagraph, pauseThreshold }: TranscribeAudioOptions
): Promise<ItemOutcome> => {
  if (!(await fileExists(audioPath))) {
    console.error("[Transcribe] File not found", { input: audioPath });
    return { status: "missing", input: audioPath };
  }

  console.log("[Transcribe] Starting transcription", { input: audioPath });

  try {
    const words = await recognizeWords(recognizer, audioPath, { vad: true });

    if (!words.length) {
      console.warn("[Transcribe] No speech detected", { input: audioPath });
      return { status: "empty", input: audioPath };
    }

    const sentences = segmentSentences(words, pauseThreshold);
    const transcript = renderTranscript(
      groupParagraphs(sentences, sentencesPerParagraph)
    );

    const outputPath = replaceExtension(audioPath, ".txt");
    await writeText(outputPath, transcript);

    console.log("[Transcribe] Text file saved", {
      outputPath,
      sentences: sentences.length,
    });
    return { status: "written", input: audioPath, outputPath };
  } catch (error) {
    console.error("[Transcribe Error]", {
      input: audioPath,
      error: describeError(error),
    });
    return { status: "failed", input: audioPath, error: describeError(error) };
  }
};
