import { setTimeout as sleep } from "node:timers/promises";
import { describeError } from "@wordcue/core";
import type { FailureKind, SubtitleEntry } from "@wordcue/core";
import {
  applyMapping,
  decodeBatchResponse,
  encodeBatch,
  validateMapping,
} from "./batch-protocol";
import type { TranslationEngine } from "./engines";

export const DEFAULT_BATCH_SIZE = 20;
export const DEFAULT_INTER_BATCH_DELAY_MS = 200;

export type BatchStrategy = "batch" | "per-entry";

export interface EngineFailure {
  kind: Extract<FailureKind, "EngineCallFailure" | "BatchValidationFailure">;
  engine: string;
  error: string;
}

export interface EntryFailure {
  kind: Extract<FailureKind, "EntryTranslationFailure">;
  entryIndex: number;
  error: string;
}

export interface BatchReport {
  batchNumber: number;
  size: number;
  strategy: BatchStrategy;
  engine: string;
  engineFailures: EngineFailure[];
  entryFailures: EntryFailure[];
}

export interface BatchProgress {
  batchNumber: number;
  totalBatches: number;
  processedEntries: number;
  totalEntries: number;
  strategy: BatchStrategy;
}

export type BatchResultHandler = (progress: BatchProgress) => void | Promise<void>;

export interface TranslateEntriesOptions {
  engines: TranslationEngine[];
  // defaults to the first engine
  perEntryEngine?: TranslationEngine;
  targetLanguage: string;
  batchSize?: number;
  interBatchDelayMs?: number;
  onBatchResult?: BatchResultHandler;
}

export interface TranslateEntriesResult {
  entries: SubtitleEntry[];
  batches: BatchReport[];
}

type BatchState =
  | { type: "TryEngine"; engineIndex: number }
  | { type: "BatchSucceeded"; engine: string; texts: string[] }
  | { type: "BatchFailedAllEngines" }
  | { type: "PerEntryFallback" };

type EngineCallResult =
  | { success: true; text: string }
  | { success: false; error: string };

type BatchAttempt =
  | { success: true; texts: string[] }
  | { success: false; failure: EngineFailure };

const noopBatchHandler: BatchResultHandler = async () => {};

const normalizeBatchSize = (batchSize?: number): number => {
  if (batchSize === undefined) {
    return DEFAULT_BATCH_SIZE;
  }
  if (!Number.isInteger(batchSize) || batchSize <= 0) {
    throw new RangeError(`Invalid batchSize: ${batchSize}`);
  }
  return batchSize;
};

const normalizeDelay = (delay?: number): number => {
  if (delay === undefined) {
    return DEFAULT_INTER_BATCH_DELAY_MS;
  }
  if (!Number.isFinite(delay) || delay < 0) {
    throw new RangeError(`Invalid interBatchDelayMs: ${delay}`);
  }
  return delay;
};

const callEngine = async (
  engine: TranslationEngine,
  text: string,
  targetLanguage: string
): Promise<EngineCallResult> => {
  try {
    return { success: true, text: await engine.translate(text, targetLanguage) };
  } catch (error) {
    return { success: false, error: describeError(error) };
  }
};

const attemptBatch = async (
  engine: TranslationEngine,
  texts: string[],
  batchNumber: number,
  targetLanguage: string
): Promise<BatchAttempt> => {
  const payload = encodeBatch(texts);
  const result = await callEngine(engine, payload, targetLanguage);

  if (!result.success) {
    return {
      success: false,
      failure: { kind: "EngineCallFailure", engine: engine.name, error: result.error },
    };
  }

  const mapping = decodeBatchResponse(result.text);
  const validation = validateMapping(mapping, texts.length);

  if (!validation.success) {
    console.warn("[TranslateBatch Mismatch]", {
      batchNumber,
      engine: engine.name,
      expected: texts.length,
      parsed: mapping.size,
      payload,
      response: result.text,
      mapping: Object.fromEntries(mapping),
      timestamp: new Date().toISOString(),
    });
    return {
      success: false,
      failure: { kind: validation.kind, engine: engine.name, error: validation.error },
    };
  }

  const { texts: translated, missing } = applyMapping(texts, mapping);
  if (missing.length) {
    console.warn("[TranslateBatch Missing Index]", {
      batchNumber,
      engine: engine.name,
      missing,
      timestamp: new Date().toISOString(),
    });
  }

  return { success: true, texts: translated };
};

const translateBatch = async (
  batch: SubtitleEntry[],
  batchNumber: number,
  engines: TranslationEngine[],
  perEntryEngine: TranslationEngine,
  targetLanguage: string
): Promise<BatchReport> => {
  const engineFailures: EngineFailure[] = [];
  let state: BatchState = { type: "TryEngine", engineIndex: 0 };

  for (;;) {
    switch (state.type) {
      case "TryEngine": {
        if (state.engineIndex >= engines.length) {
          state = { type: "BatchFailedAllEngines" };
          break;
        }

        const engine: TranslationEngine = engines[state.engineIndex];
        const attempt = await attemptBatch(
          engine,
          batch.map((entry) => entry.text),
          batchNumber,
          targetLanguage
        );

        if (attempt.success) {
          state = { type: "BatchSucceeded", engine: engine.name, texts: attempt.texts };
          break;
        }

        engineFailures.push(attempt.failure);
        console.warn("[TranslateBatch Engine Failed]", {
          batchNumber,
          ...attempt.failure,
          timestamp: new Date().toISOString(),
        });
        state = { type: "TryEngine", engineIndex: state.engineIndex + 1 };
        break;
      }

      case "BatchSucceeded": {
        const { texts } = state;
        batch.forEach((entry, index) => {
          entry.text = texts[index];
        });

        console.log("[TranslateBatch Success]", {
          batchNumber,
          engine: state.engine,
          size: batch.length,
          timestamp: new Date().toISOString(),
        });

        return {
          batchNumber,
          size: batch.length,
          strategy: "batch",
          engine: state.engine,
          engineFailures,
          entryFailures: [],
        };
      }

      case "BatchFailedAllEngines": {
        console.warn("[TranslateBatch Fallback]", {
          batchNumber,
          engines: engines.map((engine) => engine.name),
          fallbackEngine: perEntryEngine.name,
          timestamp: new Date().toISOString(),
        });
        state = { type: "PerEntryFallback" };
        break;
      }

      case "PerEntryFallback": {
        const entryFailures: EntryFailure[] = [];

        for (const entry of batch) {
          const result = await callEngine(perEntryEngine, entry.text, targetLanguage);
          if (result.success) {
            entry.text = result.text.trim();
            continue;
          }

          entryFailures.push({
            kind: "EntryTranslationFailure",
            entryIndex: entry.index,
            error: result.error,
          });
          console.warn("[TranslateEntry Error]", {
            batchNumber,
            entryIndex: entry.index,
            text: entry.text,
            error: result.error,
            timestamp: new Date().toISOString(),
          });
        }

        return {
          batchNumber,
          size: batch.length,
          strategy: "per-entry",
          engine: perEntryEngine.name,
          engineFailures,
          entryFailures,
        };
      }
    }
  }
};

/**
 * Translates subtitle entries batch by batch. Each batch tries the engines in
 * order and, when all of them fail, falls back to translating entry by entry
 * with `perEntryEngine`. Entries that still fail keep their source text.
 *
 * Input entries are not modified; the result holds translated copies in the
 * original order.
 */
export const translateEntries = async (
  entries: SubtitleEntry[],
  options: TranslateEntriesOptions
): Promise<TranslateEntriesResult> => {
  const { engines, targetLanguage, onBatchResult = noopBatchHandler } = options;

  if (!engines.length) {
    throw new Error("At least one translation engine is required.");
  }

  const perEntryEngine = options.perEntryEngine ?? engines[0];
  const batchSize = normalizeBatchSize(options.batchSize);
  const interBatchDelayMs = normalizeDelay(options.interBatchDelayMs);

  const translatedEntries = entries.map((entry) => ({ ...entry }));
  const totalEntries = translatedEntries.length;
  const totalBatches = Math.ceil(totalEntries / batchSize);
  const batches: BatchReport[] = [];

  for (let start = 0; start < totalEntries; start += batchSize) {
    const batchNumber = start / batchSize + 1;
    const batch = translatedEntries.slice(start, start + batchSize);

    const report = await translateBatch(
      batch,
      batchNumber,
      engines,
      perEntryEngine,
      targetLanguage
    );
    batches.push(report);

    await onBatchResult({
      batchNumber,
      totalBatches,
      processedEntries: Math.min(start + batchSize, totalEntries),
      totalEntries,
      strategy: report.strategy,
    });

    if (batchNumber < totalBatches && interBatchDelayMs > 0) {
      await sleep(interBatchDelayMs);
    }
  }

  return { entries: translatedEntries, batches };
};
