import { HumanMessage, type MessageContent } from "@langchain/core/messages";
import { LangChainTracer } from "@langchain/core/tracers/tracer_langchain";
import { getModel } from "#patchbot/ai/model.js";
import { ModelEndpointError } from "#patchbot/ai/patch/errors.js";
import type { ModelEndpoint } from "#patchbot/ai/patch/types.js";

/**
 * Model configuration options
 */
export interface ModelConfigOptions {
  modelName: string;
  ollamaUrl?: string;
  tracerProjectName?: string;
  maxTokens?: number;
}

/**
 * Flattens chat message content (plain string or structured parts) to text
 */
export function messageText(content: MessageContent): string {
  if (typeof content === "string") {
    return content;
  }
  return content
    .map((part) => ("text" in part && typeof part.text === "string" ? part.text : ""))
    .join("");
}

/**
 * Creates LangSmith tracer callbacks when a project name is configured
 */
export const createTracerCallbacks = (tracerProjectName?: string): LangChainTracer[] => {
  if (!tracerProjectName) {
    return [];
  }
  return [new LangChainTracer({ projectName: tracerProjectName })];
};

/**
 * Builds the pipeline's model endpoint over a LangChain chat model.
 * Each call gets its own abort timer; an abort is reported as a timeout,
 * every other failure as unavailable.
 */
export const setupModelEndpoint = async (
  options: ModelConfigOptions
): Promise<ModelEndpoint> => {
  if (!options.modelName) {
    throw new Error(
      "Model name must be provided either through options or environment variables"
    );
  }

  const model = await getModel(options.modelName, {
    ollamaUrl: options.ollamaUrl,
    maxTokens: options.maxTokens,
  });
  const callbacks = createTracerCallbacks(options.tracerProjectName);

  const complete = async (prompt: string, timeoutMs: number): Promise<string> => {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await model.invoke([new HumanMessage(prompt)], {
        callbacks,
        signal: controller.signal,
        metadata: { agent: "patch-pipeline" },
      });
      return messageText(response.content);
    } catch (error) {
      if (controller.signal.aborted) {
        throw new ModelEndpointError(
          "timeout",
          `${options.modelName} did not answer within ${timeoutMs}ms`,
          error
        );
      }
      throw new ModelEndpointError(
        "unavailable",
        `${options.modelName} failed: ${error instanceof Error ? error.message : String(error)}`,
        error
      );
    } finally {
      clearTimeout(timer);
    }
  };

  return { complete };
};
