import type { Paragraph, Sentence } from "../types/subtitle";

export const DEFAULT_SENTENCES_PER_PARAGRAPH = 5;

const PARAGRAPH_SEPARATOR = "\n\n";

const createParagraph = (sentences: Sentence[]): Paragraph => ({
  start: sentences[0].start,
  end: sentences[sentences.length - 1].end,
  text: sentences.map((sentence) => sentence.text).join(" "),
  sentences,
});

/**
 * Groups sentences into fixed-size paragraphs; the last paragraph may be
 * shorter. Throws `RangeError` unless the size is a positive integer.
 */
export const groupParagraphs = (
  sentences: Sentence[],
  sentencesPerParagraph = DEFAULT_SENTENCES_PER_PARAGRAPH
): Paragraph[] => {
  if (!Number.isInteger(sentencesPerParagraph) || sentencesPerParagraph <= 0) {
    throw new RangeError(`Invalid sentencesPerParagraph: ${sentencesPerParagraph}`);
  }

  const size = sentencesPerParagraph;
  const paragraphs: Paragraph[] = [];
  for (let index = 0; index < sentences.length; index += size) {
    paragraphs.push(createParagraph(sentences.slice(index, index + size)));
  }
  return paragraphs;
};

export const renderTranscript = (paragraphs: Paragraph[]): string =>
  paragraphs.map((paragraph) => paragraph.text).join(PARAGRAPH_SEPARATOR);
