export type FailureKind =
  | "InputMissing"
  | "EmptySpeech"
  | "BatchValidationFailure"
  | "EngineCallFailure"
  | "EntryTranslationFailure"
  | "ModelOrResourceLoadFailure";

export interface Failure {
  kind: FailureKind;
  error: string;
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
