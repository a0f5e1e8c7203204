import type { RecognitionResult } from "@wordcue/core";
import type { WhisperKitOutputType } from "../lib/whisper-kit";

export const importRecognitionFromWhisperKit = (
  whisperJson: WhisperKitOutputType
): RecognitionResult => {
  const segments = whisperJson.segments.map((segment) => ({
    text: segment.text,
    start: segment.start,
    end: segment.end,
    words: (segment.words ?? []).map((word) => ({
      text: word.word,
      start: word.start,
      end: word.end,
    })),
  }));

  const lastSegment = segments[segments.length - 1];

  return {
    segments,
    info: {
      language: whisperJson.language || "unknown",
      duration: lastSegment ? lastSegment.end : 0,
    },
  };
};
