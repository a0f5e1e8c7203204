import type { Word } from "../types/subtitle";
import type { RecognitionSegment } from "../types/transcription";

const TERMINAL_PUNCTUATION = /[.?!]$/;

/**
 * 判断单词（去除首尾空白后）是否以句末标点 . ? ! 结尾
 */
export function isEndOfSentence(text: string): boolean {
  return TERMINAL_PUNCTUATION.test(text.trim());
}

/**
 * Joins word texts as-is; recognition words carry their own leading spaces.
 */
export function joinWordsText(words: Word[]): string {
  return words.map((word) => word.text).join("");
}

/**
 * Joins trimmed word texts with single spaces, the layout used for cue lines.
 */
export function joinCueText(words: Word[]): string {
  return words.map((word) => word.text.trim()).join(" ");
}

// 将识别结果中的分段单词展开为一个有序的单词流
export const importWords = (segments: RecognitionSegment[]): Word[] => {
  return segments.flatMap((segment) =>
    (segment.words ?? []).map((word) => ({
      text: word.text,
      start: word.start,
      end: word.end,
    }))
  );
};
