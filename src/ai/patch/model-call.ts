/**
 * Model Call Policy
 *
 * Wraps every language model call made by the pipeline: a first attempt with
 * the normal prompt, then at most `maxRetries` further attempts with the
 * stricter prompt. Timeouts and unreachable endpoints surface as
 * ModelUnavailable; parse failures surface as whatever the parser threw.
 */

import { ModelEndpointError, PatchPipelineError } from "./errors.js";
import type { ModelEndpoint, PipelineStage } from "./types.js";

export interface ModelCallRequest<T> {
  stage: PipelineStage;
  /** Tag used in log lines */
  agent: string;
  prompt: string;
  strictPrompt: string;
  /** Turns raw model text into a result; throws PatchPipelineError when it can't */
  parse: (text: string) => T;
}

export interface ModelCallPolicyOptions {
  timeoutMs: number;
  maxRetries?: number;
}

export class ModelCallPolicy {
  readonly timeoutMs: number;
  readonly maxRetries: number;

  constructor(
    private readonly endpoint: ModelEndpoint,
    options: ModelCallPolicyOptions
  ) {
    this.timeoutMs = options.timeoutMs;
    // At most one retry per call
    this.maxRetries = Math.min(Math.max(options.maxRetries ?? 1, 0), 1);
  }

  async call<T>(request: ModelCallRequest<T>): Promise<T> {
    let lastError: PatchPipelineError | undefined;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      const prompt = attempt === 0 ? request.prompt : request.strictPrompt;
      if (attempt > 0) {
        console.log(
          `[${request.agent}] retrying with strict prompt after ${lastError?.kind ?? "failure"}`
        );
      }

      let text: string;
      try {
        text = await this.endpoint.complete(prompt, this.timeoutMs);
      } catch (error) {
        lastError = toUnavailable(error, request.stage);
        continue;
      }

      try {
        return request.parse(text);
      } catch (error) {
        if (!(error instanceof PatchPipelineError)) throw error;
        lastError = error;
      }
    }

    throw (
      lastError ??
      new PatchPipelineError("ModelUnavailable", request.stage, "Model was not called")
    );
  }
}

function toUnavailable(error: unknown, stage: PipelineStage): PatchPipelineError {
  if (error instanceof ModelEndpointError) {
    return new PatchPipelineError(
      "ModelUnavailable",
      stage,
      error.reason === "timeout" ? `Model call timed out: ${error.message}` : `Model unavailable: ${error.message}`,
      { cause: error }
    );
  }
  return new PatchPipelineError(
    "ModelUnavailable",
    stage,
    `Model call failed: ${error instanceof Error ? error.message : String(error)}`,
    { cause: error }
  );
}
