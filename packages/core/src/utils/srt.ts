import { parseSync } from "subtitle";
import type { Cue, SubtitleEntry } from "../types/subtitle";
import { formatTimestamp } from "./timestamp";

export const cuesToEntries = (cues: Cue[]): SubtitleEntry[] =>
  cues.map((cue, index) => ({
    index: index + 1,
    start: formatTimestamp(cue.start),
    end: formatTimestamp(cue.end),
    text: cue.text,
  }));

/**
 * Renders entries as SRT blocks. Blocks are renumbered from 1 in list order,
 * whatever index the entries carry.
 */
export const renderSrt = (entries: SubtitleEntry[]): string =>
  entries
    .map(
      (entry, position) =>
        `${position + 1}\n${entry.start} --> ${entry.end}\n${entry.text}\n\n`
    )
    .join("");

export function parseSrt(content: string): SubtitleEntry[] {
  try {
    const cues = parseSync(content).flatMap((node) =>
      node.type === "cue" ? [node.data] : []
    );

    return cues.map((cue, position) => ({
      index: position + 1,
      start: formatTimestamp(cue.start / 1000),
      end: formatTimestamp(cue.end / 1000),
      text: cue.text ?? "",
    }));
  } catch (error) {
    throw new Error(
      `Failed to parse SRT content: ${
        error instanceof Error ? error.message : "Unknown error"
      }`
    );
  }
}
