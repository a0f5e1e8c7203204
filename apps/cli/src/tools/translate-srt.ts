import { describeError, parseSrt, renderSrt } from "@wordcue/core";
import { translateEntries } from "@wordcue/ai";
import type { BatchProgress, TranslationEngine } from "@wordcue/ai";
import {
  fileExists,
  readText,
  translatedSubtitlePath,
  writeText,
} from "../utils/file";
import type { ItemOutcome } from "../utils/outcome";

export interface TranslateSrtOptions {
  engines: TranslationEngine[];
  perEntryEngine?: TranslationEngine;
  targetLanguage: string;
  batchSize?: number;
  interBatchDelayMs?: number;
}

const logProgress = ({
  batchNumber,
  totalBatches,
  processedEntries,
  totalEntries,
  strategy,
}: BatchProgress) => {
  const percent = ((processedEntries / totalEntries) * 100).toFixed(2);
  console.log(
    `[TranslateSrt Progress] batch ${batchNumber}/${totalBatches} (${strategy}) ${percent}%`
  );
};

/**
 * Translates one SRT file into `{name}_{language}.srt` beside it.
 */
export const translateSrtFile = async (
  srtPath: string,
  options: TranslateSrtOptions
): Promise<ItemOutcome> => {
  if (!(await fileExists(srtPath))) {
    console.error("[TranslateSrt] File not found", { input: srtPath });
    return { status: "missing", input: srtPath };
  }

  try {
    const entries = parseSrt(await readText(srtPath));
    if (!entries.length) {
      console.warn("[TranslateSrt] No subtitle entries found", { input: srtPath });
      return { status: "empty", input: srtPath };
    }

    console.log("[TranslateSrt] Starting translation", {
      input: srtPath,
      entries: entries.length,
      targetLanguage: options.targetLanguage,
      engines: options.engines.map((engine) => engine.name),
    });

    const startedAt = Date.now();
    const { entries: translated, batches } = await translateEntries(entries, {
      ...options,
      onBatchResult: logProgress,
    });

    const outputPath = translatedSubtitlePath(srtPath, options.targetLanguage);
    await writeText(outputPath, renderSrt(translated));

    console.log("[TranslateSrt] Translation complete", {
      outputPath,
      elapsedSeconds: ((Date.now() - startedAt) / 1000).toFixed(2),
      batches: batches.length,
      perEntryBatches: batches.filter((batch) => batch.strategy === "per-entry")
        .length,
      untranslatedEntries: batches.reduce(
        (count, batch) => count + batch.entryFailures.length,
        0
      ),
    });

    return { status: "written", input: srtPath, outputPath };
  } catch (error) {
    console.error("[TranslateSrt Error]", {
      input: srtPath,
      error: describeError(error),
    });
    return { status: "failed", input: srtPath, error: describeError(error) };
  }
};
