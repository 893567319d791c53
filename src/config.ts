import { z } from "zod";

let config: Record<string, string> = {
    "max-model-retries": "1",
}

export function getConfig(configKey: string): string | undefined {
    return config[configKey];
}

export function setConfig(configKey: string, configValue: string): void {
    config[configKey] = configValue;
}

export class ConfigError extends Error {
    constructor(message: string, public readonly cause?: unknown) {
        super(message);
        this.name = "ConfigError";
    }
}

const optionalUrl = z
    .string()
    .url()
    .optional()
    .or(z.literal("").transform(() => undefined));

const SettingsSchema = z.object({
    PATCHBOT_API_PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    PATCHBOT_API_HOST: z.string().min(1).default("0.0.0.0"),
    PATCHBOT_API_KEY: z.string().optional(),
    PATCHBOT_MODEL_NAME: z.string().min(1).default("ollama:llama3.2"),
    PATCHBOT_OLLAMA_URL: z.string().url().default("http://localhost:11434"),
    PATCHBOT_MODEL_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
    PATCHBOT_STORE_BACKEND: z.enum(["file", "http"]).default("file"),
    PATCHBOT_SCHEMA_DIR: z.string().min(1).default("data/schemas"),
    PATCHBOT_VALUES_DIR: z.string().min(1).default("data/values"),
    PATCHBOT_SCHEMA_URL: optionalUrl,
    PATCHBOT_VALUES_URL: optionalUrl,
    PATCHBOT_KEYWORDS_FILE: z.string().min(1).default("config/service-keywords.json"),
    PATCHBOT_TRACER_PROJECT: z.string().optional(),
});

export interface Settings {
    port: number;
    host: string;
    apiKey?: string;
    modelName: string;
    ollamaUrl: string;
    modelTimeoutMs: number;
    storeBackend: "file" | "http";
    schemaDir: string;
    valuesDir: string;
    schemaUrl?: string;
    valuesUrl?: string;
    keywordsFile: string;
    tracerProjectName?: string;
}

/**
 * Reads settings from the environment (after dotenv has loaded .env).
 * @throws ConfigError when a value is malformed or the http backend lacks URLs
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
    const result = SettingsSchema.safeParse(env);
    if (!result.success) {
        const issues = result.error.errors
            .map((e) => `${e.path.join(".")}: ${e.message}`)
            .join("; ");
        throw new ConfigError(`Invalid configuration: ${issues}`, result.error);
    }

    const parsed = result.data;
    if (parsed.PATCHBOT_STORE_BACKEND === "http" && (!parsed.PATCHBOT_SCHEMA_URL || !parsed.PATCHBOT_VALUES_URL)) {
        throw new ConfigError(
            "PATCHBOT_SCHEMA_URL and PATCHBOT_VALUES_URL are required when PATCHBOT_STORE_BACKEND=http"
        );
    }

    return {
        port: parsed.PATCHBOT_API_PORT,
        host: parsed.PATCHBOT_API_HOST,
        apiKey: parsed.PATCHBOT_API_KEY || undefined,
        modelName: parsed.PATCHBOT_MODEL_NAME,
        ollamaUrl: parsed.PATCHBOT_OLLAMA_URL,
        modelTimeoutMs: parsed.PATCHBOT_MODEL_TIMEOUT_MS,
        storeBackend: parsed.PATCHBOT_STORE_BACKEND,
        schemaDir: parsed.PATCHBOT_SCHEMA_DIR,
        valuesDir: parsed.PATCHBOT_VALUES_DIR,
        schemaUrl: parsed.PATCHBOT_SCHEMA_URL,
        valuesUrl: parsed.PATCHBOT_VALUES_URL,
        keywordsFile: parsed.PATCHBOT_KEYWORDS_FILE,
        tracerProjectName: parsed.PATCHBOT_TRACER_PROJECT || undefined,
    };
}
