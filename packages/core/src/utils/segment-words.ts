import type { Cue, Sentence, TextUnit, Word } from "../types/subtitle";
import { isEndOfSentence, joinCueText, joinWordsText } from "./words";

export const DEFAULT_SENTENCE_PAUSE_SECONDS = 0.7;
export const DEFAULT_CUE_PAUSE_SECONDS = 0.8;
export const DEFAULT_MAX_CUE_CHARS = 45;
export const DEFAULT_LOOKAHEAD_WORDS = 3;

export interface SentenceSegmentationOptions {
  mode: "sentence";
  pauseThreshold?: number;
}

export interface CueSegmentationOptions {
  mode: "cue";
  pauseThreshold?: number;
  maxChars?: number;
  lookaheadWords?: number;
}

export type SegmentationOptions =
  | SentenceSegmentationOptions
  | CueSegmentationOptions;

type NormalizedOptions =
  | Required<SentenceSegmentationOptions>
  | Required<CueSegmentationOptions>;

const optionOr = (
  name: string,
  value: number | undefined,
  fallback: number,
  isValid: (value: number) => boolean
): number => {
  if (value === undefined) {
    return fallback;
  }
  if (!Number.isFinite(value) || !isValid(value)) {
    throw new RangeError(`Invalid ${name}: ${value}`);
  }
  return value;
};

const isNonNegative = (value: number) => value >= 0;

const normalizeOptions = (options: SegmentationOptions): NormalizedOptions => {
  if (options.mode === "sentence") {
    return {
      mode: "sentence",
      pauseThreshold: optionOr(
        "pauseThreshold",
        options.pauseThreshold,
        DEFAULT_SENTENCE_PAUSE_SECONDS,
        isNonNegative
      ),
    };
  }

  return {
    mode: "cue",
    pauseThreshold: optionOr(
      "pauseThreshold",
      options.pauseThreshold,
      DEFAULT_CUE_PAUSE_SECONDS,
      isNonNegative
    ),
    maxChars: optionOr(
      "maxChars",
      options.maxChars,
      DEFAULT_MAX_CUE_CHARS,
      (value) => value > 0
    ),
    lookaheadWords: optionOr(
      "lookaheadWords",
      options.lookaheadWords,
      DEFAULT_LOOKAHEAD_WORDS,
      (value) => Number.isInteger(value) && value >= 0
    ),
  };
};

const hasSentenceEndAhead = (
  words: Word[],
  index: number,
  lookaheadWords: number
): boolean => {
  return words
    .slice(index + 1, index + 1 + lookaheadWords)
    .some((word) => isEndOfSentence(word.text));
};

// 按优先级判断当前单词之后是否需要断开：标点 > 停顿 > 长度（带前瞻）> 结尾
const shouldBreakAfter = (
  words: Word[],
  index: number,
  buffer: Word[],
  options: NormalizedOptions
): boolean => {
  const word = words[index];
  const isLastWord = index === words.length - 1;

  if (isEndOfSentence(word.text)) {
    return true;
  }

  if (!isLastWord && words[index + 1].start - word.end > options.pauseThreshold) {
    return true;
  }

  if (
    options.mode === "cue" &&
    joinCueText(buffer).length > options.maxChars &&
    !hasSentenceEndAhead(words, index, options.lookaheadWords)
  ) {
    return true;
  }

  return isLastWord;
};

/**
 * Splits an ordered word stream into sentences or subtitle cues.
 *
 * Every word lands in exactly one unit, in input order. Sentence text keeps
 * the words' own spacing; cue text joins trimmed words with single spaces.
 * An empty stream yields no units.
 */
export const segmentWords = (
  words: Word[],
  options: SegmentationOptions
): TextUnit[] => {
  const normalizedOptions = normalizeOptions(options);
  const units: TextUnit[] = [];
  let buffer: Word[] = [];

  const flushUnit = () => {
    if (!buffer.length) {
      return;
    }

    const text =
      normalizedOptions.mode === "cue"
        ? joinCueText(buffer)
        : joinWordsText(buffer).trim();

    units.push({
      text,
      start: buffer[0].start,
      end: buffer[buffer.length - 1].end,
      words: buffer,
    });
    buffer = [];
  };

  words.forEach((word, index) => {
    buffer.push(word);
    if (shouldBreakAfter(words, index, buffer, normalizedOptions)) {
      flushUnit();
    }
  });

  return units;
};

export const segmentSentences = (
  words: Word[],
  pauseThreshold?: number
): Sentence[] => segmentWords(words, { mode: "sentence", pauseThreshold });

export const segmentCues = (
  words: Word[],
  options: Omit<CueSegmentationOptions, "mode"> = {}
): Cue[] => segmentWords(words, { ...options, mode: "cue" });
