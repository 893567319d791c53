/**
 * Startup checks for a local Ollama host: wait until it answers, then make
 * sure the configured model has been pulled. Both are best effort; callers
 * log the outcome and keep serving.
 */

import { z } from "zod";
import { logApplicationEvent } from "#patchbot/util/safe-logging.js";

const TagsResponseSchema = z.object({
  models: z.array(z.object({ name: z.string() })).default([]),
});

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export async function waitForOllama(
  baseUrl: string,
  options: { maxRetries?: number; delayMs?: number } = {}
): Promise<boolean> {
  const maxRetries = options.maxRetries ?? 30;
  const delayMs = options.delayMs ?? 2000;

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    let reason: string;
    try {
      const response = await fetch(`${baseUrl}/api/tags`, { signal: AbortSignal.timeout(5000) });
      if (response.ok) {
        logApplicationEvent("model-readiness", "ollama-ready", { attempt });
        return true;
      }
      reason = `status ${response.status}`;
    } catch (error) {
      reason = error instanceof Error ? error.message : String(error);
    }

    if (attempt < maxRetries) {
      logApplicationEvent("model-readiness", "ollama-waiting", { attempt, maxRetries, reason });
      await sleep(delayMs);
    }
  }

  logApplicationEvent("model-readiness", "ollama-not-ready", { maxRetries });
  return false;
}

export async function ensureModelPulled(baseUrl: string, model: string): Promise<boolean> {
  try {
    const tags = await fetch(`${baseUrl}/api/tags`, { signal: AbortSignal.timeout(10_000) });
    if (tags.ok) {
      const { models } = TagsResponseSchema.parse(await tags.json());
      if (models.some((m) => m.name === model || m.name.startsWith(`${model}:`))) {
        logApplicationEvent("model-readiness", "model-available", { model });
        return true;
      }
    }

    logApplicationEvent("model-readiness", "model-pulling", { model });
    const pull = await fetch(`${baseUrl}/api/pull`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({ name: model, stream: false }),
      signal: AbortSignal.timeout(600_000),
    });
    logApplicationEvent("model-readiness", pull.ok ? "model-pulled" : "model-pull-failed", {
      model,
      status: pull.status,
    });
    return pull.ok;
  } catch (error) {
    console.error("[model-readiness] Error ensuring model is available:", error);
    return false;
  }
}
