import { describe, it, expect } from "vitest";
import { segmentCues, segmentSentences, segmentWords } from "./segment-words";
import type { Word } from "../types/subtitle";

const word = (text: string, start: number, end: number): Word => ({
  text,
  start,
  end,
});

// Words laid out back to back, 0.3s each, without pauses
const contiguousWords = (texts: string[]): Word[] =>
  texts.map((text, index) => word(` ${text}`, index * 0.3, index * 0.3 + 0.3));

const createRandomWords = (count: number, seed: number): Word[] => {
  let state = seed;
  const next = () => {
    state = (state * 1103515245 + 12345) % 2147483648;
    return state / 2147483648;
  };
  const vocabulary = ["alpha", "beta,", "gamma.", "delta", "epsilon?", "zeta", "eta!", "theta"];

  const words: Word[] = [];
  let cursor = 0;
  for (let index = 0; index < count; index++) {
    const start = cursor + next() * 1.2;
    const end = start + 0.1 + next() * 0.4;
    words.push(word(` ${vocabulary[Math.floor(next() * vocabulary.length)]}`, start, end));
    cursor = end;
  }
  return words;
};

describe("segmentWords", () => {
  describe("sentence mode", () => {
    it("splits on punctuation and closes the last sentence at end of stream", () => {
      const words = [
        word(" Hello", 0, 0.4),
        word(" world.", 0.5, 0.9),
        word(" Next", 2.0, 2.3),
        word(" sentence", 2.3, 2.6),
      ];

      const sentences = segmentSentences(words, 0.7);

      expect(sentences.map((s) => s.text)).toEqual(["Hello world.", "Next sentence"]);
      expect(sentences.map((s) => [s.start, s.end])).toEqual([
        [0, 0.9],
        [2.0, 2.6],
      ]);
    });

    it("breaks on a pause longer than the threshold, even mid-sentence", () => {
      const sentences = segmentSentences([
        word(" so", 0, 0.3),
        word(" anyway", 1.2, 1.5),
        word(" right.", 1.6, 1.9),
      ]);

      expect(sentences.map((s) => s.text)).toEqual(["so", "anyway right."]);
    });

    it("does not break when the gap equals the threshold", () => {
      const sentences = segmentSentences(
        [word(" one", 0, 0.5), word(" two", 1.0, 1.2)],
        0.5
      );

      expect(sentences.map((s) => s.text)).toEqual(["one two"]);
    });

    it("ignores line length", () => {
      const words = contiguousWords(Array.from({ length: 20 }, () => "abcdefghij"));

      expect(segmentSentences(words)).toHaveLength(1);
    });

    it("uses the 0.7s default when no threshold is given", () => {
      const words = [word(" a", 0, 0.1), word(" b", 0.75, 0.9)];

      // gap of 0.65s stays under the default
      expect(segmentWords(words, { mode: "sentence" })).toHaveLength(1);
    });

    it("rejects an invalid pause threshold", () => {
      const words = [word(" a", 0, 0.1), word(" b", 0.75, 0.9)];

      expect(() => segmentWords(words, { mode: "sentence", pauseThreshold: -1 })).toThrow(
        RangeError
      );
      expect(() => segmentSentences(words, Number.NaN)).toThrow(
        "Invalid pauseThreshold: NaN"
      );
    });
  });

  describe("cue mode", () => {
    it("breaks once the line exceeds the character limit without punctuation ahead", () => {
      const words = contiguousWords(Array.from({ length: 12 }, () => "abcdefghij"));

      const cues = segmentCues(words);

      expect(cues.map((cue) => cue.words.length)).toEqual([5, 5, 2]);
      expect(cues[0].text).toBe(
        "abcdefghij abcdefghij abcdefghij abcdefghij abcdefghij"
      );
      expect(cues[0].start).toBe(0);
      expect(cues[1].start).toBe(words[5].start);
    });

    it("lets a long line run when a sentence end is within the lookahead", () => {
      const words = contiguousWords([
        ...Array.from({ length: 6 }, () => "abcdefghij"),
        "finished.",
        "after",
      ]);

      const cues = segmentCues(words);

      expect(cues.map((cue) => cue.words.length)).toEqual([7, 1]);
      expect(cues[0].text.endsWith("finished.")).toBe(true);
      expect(cues[1].text).toBe("after");
    });

    it("keeps going when the sentence end is exactly three words ahead", () => {
      // the fifth word is the first to push the line past 45 characters
      const words = contiguousWords([
        ...Array.from({ length: 7 }, () => "abcdefghij"),
        "end.",
        "after",
      ]);

      const cues = segmentCues(words);

      expect(cues.map((cue) => cue.words.length)).toEqual([8, 1]);
    });

    it("breaks when the sentence end is four words ahead", () => {
      const words = contiguousWords([
        ...Array.from({ length: 8 }, () => "abcdefghij"),
        "end.",
      ]);

      const cues = segmentCues(words);

      expect(cues.map((cue) => cue.words.length)).toEqual([5, 4]);
    });

    it("only looks three words ahead", () => {
      const words = contiguousWords([
        ...Array.from({ length: 9 }, () => "abcdefghij"),
        "end.",
      ]);

      const cues = segmentCues(words);

      expect(cues.map((cue) => cue.words.length)).toEqual([5, 5]);
    });

    it("honours a custom lookahead and character limit", () => {
      const words = contiguousWords(["aaaa", "bbbb", "cccc", "dddd."]);

      const cues = segmentCues(words, { maxChars: 8, lookaheadWords: 0 });

      expect(cues.map((cue) => cue.text)).toEqual(["aaaa bbbb", "cccc dddd."]);
    });

    it("breaks on punctuation regardless of length or pause", () => {
      const cues = segmentCues([
        word(" Hi.", 0, 0.2),
        word(" there", 0.25, 0.4),
        word(" friend", 0.45, 0.6),
      ]);

      expect(cues.map((cue) => cue.text)).toEqual(["Hi.", "there friend"]);
    });

    it("uses a 0.8s pause by default", () => {
      const cues = segmentCues([
        word(" one", 0, 0.2),
        word(" two", 0.95, 1.1),
        word(" three", 2.0, 2.2),
      ]);

      // 0.75s gap is kept, 0.9s gap breaks
      expect(cues.map((cue) => cue.text)).toEqual(["one two", "three"]);
    });

    it("rejects invalid cue options", () => {
      const words = contiguousWords(["one", "two"]);

      expect(() => segmentCues(words, { maxChars: 0 })).toThrow("Invalid maxChars: 0");
      expect(() => segmentCues(words, { lookaheadWords: 1.5 })).toThrow(
        "Invalid lookaheadWords: 1.5"
      );
      expect(() => segmentCues(words, { pauseThreshold: -0.1 })).toThrow(RangeError);
    });

    it("produces no cues for an empty stream", () => {
      expect(segmentCues([])).toEqual([]);
    });
  });

  describe("coverage", () => {
    it.each([1, 7, 42])("partitions every word exactly once (seed %i)", (seed) => {
      const words = createRandomWords(60, seed);

      for (const units of [segmentSentences(words), segmentCues(words)]) {
        expect(units.flatMap((unit) => unit.words)).toEqual(words);

        units.forEach((unit, index) => {
          expect(unit.words.length).toBeGreaterThan(0);
          expect(unit.start).toBe(unit.words[0].start);
          expect(unit.end).toBe(unit.words[unit.words.length - 1].end);
          if (index > 0) {
            expect(unit.start).toBeGreaterThanOrEqual(units[index - 1].end);
          }
        });

        expect(units[units.length - 1].words[units[units.length - 1].words.length - 1]).toBe(
          words[words.length - 1]
        );
      }
    });
  });
});
