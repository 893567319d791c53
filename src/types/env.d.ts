declare global {
  namespace NodeJS {
    interface ProcessEnv {
      PATCHBOT_API_PORT?: string;
      PATCHBOT_API_HOST?: string;
      PATCHBOT_API_KEY?: string;
      PATCHBOT_MODEL_NAME?: string;
      PATCHBOT_OLLAMA_URL?: string;
      PATCHBOT_MODEL_TIMEOUT_MS?: string;
      PATCHBOT_STORE_BACKEND?: string;
      PATCHBOT_SCHEMA_DIR?: string;
      PATCHBOT_VALUES_DIR?: string;
      PATCHBOT_SCHEMA_URL?: string;
      PATCHBOT_VALUES_URL?: string;
      PATCHBOT_KEYWORDS_FILE?: string;
      PATCHBOT_TRACER_PROJECT?: string;
    }
  }
}

export {};
