export interface Word {
  text: string;
  start: number;
  end: number;
}

/**
 * A contiguous run of words closed by the segmentation pass.
 * `start` is the first word's start and `end` the last word's end.
 */
export interface TextUnit {
  text: string;
  start: number;
  end: number;
  words: Word[];
}

export type Sentence = TextUnit;

export type Cue = TextUnit;

export interface Paragraph {
  start: number;
  end: number;
  text: string;
  sentences: Sentence[];
}

export interface SubtitleEntry {
  index: number;
  start: string;
  end: string;
  text: string;
}
