/**
 * Pipeline, store and model endpoint error types.
 *
 * Every failure that ends a pipeline run is a PatchPipelineError carrying the
 * taxonomy kind, the stage it came from and the raw text that caused it.
 */

import type { ErrorKind, PatchError, PipelineStage } from "./types.js";

export class PatchPipelineError extends Error {
  public readonly kind: ErrorKind;
  public readonly stage: PipelineStage;
  public readonly rawText?: string;
  public readonly cause?: unknown;

  constructor(
    kind: ErrorKind,
    stage: PipelineStage,
    message: string,
    options: { rawText?: string; cause?: unknown } = {}
  ) {
    super(message);
    this.name = "PatchPipelineError";
    this.kind = kind;
    this.stage = stage;
    this.rawText = options.rawText;
    this.cause = options.cause;
  }

  toPatchError(): PatchError {
    return {
      kind: this.kind,
      stage: this.stage,
      message: this.message,
      rawText: this.rawText,
      retryableApply: this.kind === "WriteError",
    };
  }
}

// =============================================================================
// STORE ERRORS
// =============================================================================

export class StoreError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = "StoreError";
  }
}

export class StoreNotFoundError extends StoreError {
  constructor(
    public readonly serviceName: string,
    what: "schema" | "values"
  ) {
    super(`No ${what} found for service: ${serviceName}`);
    this.name = "StoreNotFoundError";
  }
}

export class StoreWriteError extends StoreError {
  constructor(serviceName: string, cause?: unknown) {
    super(`Failed to write values for service: ${serviceName}`, cause);
    this.name = "StoreWriteError";
  }
}

// =============================================================================
// MODEL ENDPOINT ERRORS
// =============================================================================

export type ModelFailureReason = "timeout" | "unavailable";

export class ModelEndpointError extends Error {
  constructor(
    public readonly reason: ModelFailureReason,
    message: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = "ModelEndpointError";
  }
}
