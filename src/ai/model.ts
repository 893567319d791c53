import { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { initChatModel } from "langchain/chat_models/universal";
import { ChatAnthropic } from "@langchain/anthropic";
import { ChatOllama } from "@langchain/ollama";

export const OLLAMA_PREFIX = "ollama:";

export interface GetModelOptions {
    /** Base URL for Ollama models */
    ollamaUrl?: string;
    maxTokens?: number;
}

// Keyed by name, endpoint and token limit
const modelCache = new Map<string, BaseChatModel>();

export const getModel = async (
    modelName: string,
    options: GetModelOptions = {}
): Promise<BaseChatModel> => {
    const cacheKey = [modelName, options.ollamaUrl ?? "", options.maxTokens ?? ""].join("|");

    const cached = modelCache.get(cacheKey);
    if (cached) {
        return cached;
    }

    console.log(`[getModel] Initializing new model: ${modelName}`);

    let model: BaseChatModel;

    if (modelName.startsWith(OLLAMA_PREFIX)) {
        model = new ChatOllama({
            model: modelName.slice(OLLAMA_PREFIX.length),
            baseUrl: options.ollamaUrl,
            temperature: 0,
            numPredict: options.maxTokens,
        });
    } else if (modelName.startsWith('claude-')) {
        model = new ChatAnthropic({
            model: modelName,
            maxTokens: options.maxTokens || 1024,
            temperature: 0,
        });
    } else {
        model = await initChatModel(modelName, { temperature: 0 });
    }

    modelCache.set(cacheKey, model);
    return model;
}
