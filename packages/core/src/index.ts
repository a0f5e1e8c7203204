export * from "./types/subtitle";
export * from "./types/transcription";
export * from "./types/errors";
export * from "./utils/words";
export * from "./utils/timestamp";
export * from "./utils/segment-words";
export * from "./utils/paragraphs";
export * from "./utils/srt";
