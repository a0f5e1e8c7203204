import type { Word } from "./subtitle";

export interface RecognitionSegment {
  text: string;
  start: number;
  end: number;
  words: Word[];
}

export interface RecognitionInfo {
  language: string;
  languageProbability?: number;
  duration: number;
}

export interface RecognitionResult {
  segments: RecognitionSegment[];
  info: RecognitionInfo;
}

export interface RecognitionOptions {
  // voice-activity chunking
  vad?: boolean;
  prompt?: string;
  language?: string;
}

/**
 * Produces word-timed segments for an audio file. Word timing is always
 * requested.
 */
export interface SpeechRecognizer {
  transcribe(
    audioPath: string,
    options?: RecognitionOptions
  ): Promise<RecognitionResult>;
}
