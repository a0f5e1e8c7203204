import type { FailureKind } from "@wordcue/core";

/**
 * Translated text keyed by the entry's position inside its batch.
 */
export type TranslatedMapping = Map<number, string>;

export type MappingValidation =
  | { success: true }
  | {
      success: false;
      kind: Extract<FailureKind, "BatchValidationFailure">;
      error: string;
    };

// 行首索引标记：可选空白、数字、可选空白、一个或多个分隔符 _ > . : -
const LINE_MARKER = /^\s*(\d+)\s*[_>.:-]+\s*(.*)$/;

export const encodeBatch = (texts: string[]): string =>
  texts.map((text, index) => `${index}_> ${text}`).join("\n");

/**
 * Parses a translator response back into a mapping. Lines without a marker
 * continue the previous entry; lines before the first marker are dropped.
 *
 * A continuation line that happens to start with digits and a separator
 * (for example "3. step") opens a new entry instead.
 */
export const decodeBatchResponse = (response: string): TranslatedMapping => {
  const mapping: TranslatedMapping = new Map();
  let currentIndex: number | null = null;
  let currentLines: string[] = [];

  const closeEntry = () => {
    if (currentIndex !== null) {
      mapping.set(currentIndex, currentLines.join("\n").trim());
    }
  };

  for (const line of response.split(/\r?\n/)) {
    const match = LINE_MARKER.exec(line);
    if (match) {
      closeEntry();
      currentIndex = Number.parseInt(match[1], 10);
      currentLines = [match[2].trim()];
    } else if (currentIndex !== null) {
      currentLines.push(line.trim());
    }
  }

  closeEntry();
  return mapping;
};

export const validateMapping = (
  mapping: TranslatedMapping,
  expectedSize: number
): MappingValidation => {
  if (mapping.size === expectedSize) {
    return { success: true };
  }

  return {
    success: false,
    kind: "BatchValidationFailure",
    error: `Mismatched line count in batch. Expected ${expectedSize}, got ${mapping.size}`,
  };
};

/**
 * Picks each position's translation, keeping the source text for positions
 * the mapping does not cover.
 */
export const applyMapping = (
  texts: string[],
  mapping: TranslatedMapping
): { texts: string[]; missing: number[] } => {
  const missing: number[] = [];

  const translated = texts.map((text, index) => {
    const value = mapping.get(index);
    if (value === undefined) {
      missing.push(index);
      return text;
    }
    return value;
  });

  return { texts: translated, missing };
};
