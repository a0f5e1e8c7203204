import type { FailureKind } from "@wordcue/core";

/**
 * A collaborator the run depends on (recognition engine, transcoder) could
 * not be started. Raised before any input is processed.
 */
export class ResourceLoadError extends Error {
  readonly kind: FailureKind = "ModelOrResourceLoadFailure";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ResourceLoadError";
  }
}
