import { formatTimestamp, importWords } from "@wordcue/core";
import type { RecognitionOptions, SpeechRecognizer, Word } from "@wordcue/core";

export const recognizeWords = async (
  recognizer: SpeechRecognizer,
  audioPath: string,
  options: RecognitionOptions
): Promise<Word[]> => {
  const { segments, info } = await recognizer.transcribe(audioPath, options);

  console.log("[Recognition]", {
    language: info.language,
    languageProbability:
      info.languageProbability !== undefined
        ? info.languageProbability.toFixed(2)
        : "n/a",
    duration: formatTimestamp(Math.max(0, info.duration)),
    segments: segments.length,
  });

  return importWords(segments);
};
