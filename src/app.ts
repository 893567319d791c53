import path from 'path';
import { setupModelEndpoint } from '#patchbot/ai/model-config.js';
import { OLLAMA_PREFIX } from '#patchbot/ai/model.js';
import { ensureModelPulled, waitForOllama } from '#patchbot/ai/model-readiness.js';
import { loadKeywordTable } from '#patchbot/ai/patch/keyword-table.js';
import { PatchPipeline } from '#patchbot/ai/patch/pipeline.js';
import type { SchemaStore, ValuesStore } from '#patchbot/ai/patch/types.js';
import { getConfig, Settings } from '#patchbot/config.js';
import { FileSchemaStore, FileValuesStore } from '#patchbot/integrations/storage/file-store.js';
import { HttpSchemaStore, HttpValuesStore } from '#patchbot/integrations/storage/http-store.js';
import { logApplicationEvent } from '#patchbot/util/safe-logging.js';

export interface AppComponents {
  pipeline: PatchPipeline;
  schemaStore: SchemaStore;
  valuesStore: ValuesStore;
}

export function createStores(settings: Settings): { schemaStore: SchemaStore; valuesStore: ValuesStore } {
  if (settings.storeBackend === 'http' && settings.schemaUrl && settings.valuesUrl) {
    return {
      schemaStore: new HttpSchemaStore(settings.schemaUrl),
      valuesStore: new HttpValuesStore(settings.valuesUrl),
    };
  }
  return {
    schemaStore: new FileSchemaStore(path.resolve(settings.schemaDir)),
    valuesStore: new FileValuesStore(path.resolve(settings.valuesDir)),
  };
}

/**
 * Waits for a local Ollama host and pulls the model if needed. Other
 * providers are not checked.
 */
export async function checkModelReadiness(settings: Settings): Promise<void> {
  if (!settings.modelName.startsWith(OLLAMA_PREFIX)) return;

  const ready = await waitForOllama(settings.ollamaUrl);
  if (!ready) {
    console.warn('[app] Ollama is not reachable; model calls will fail until it is');
    return;
  }
  const pulled = await ensureModelPulled(settings.ollamaUrl, settings.modelName.slice(OLLAMA_PREFIX.length));
  if (!pulled) {
    console.warn(`[app] Model ${settings.modelName} is not available`);
  }
}

export async function createAppComponents(settings: Settings): Promise<AppComponents> {
  const { schemaStore, valuesStore } = createStores(settings);
  const keywordTable = await loadKeywordTable(path.resolve(settings.keywordsFile));
  const model = await setupModelEndpoint({
    modelName: settings.modelName,
    ollamaUrl: settings.ollamaUrl,
    tracerProjectName: settings.tracerProjectName,
  });

  const maxModelRetries = Number(getConfig('max-model-retries') ?? '1');
  const pipeline = new PatchPipeline({
    schemaStore,
    valuesStore,
    model,
    keywordTable,
    modelTimeoutMs: settings.modelTimeoutMs,
    maxModelRetries,
  });

  logApplicationEvent('app', 'components-ready', {
    storeBackend: settings.storeBackend,
    modelName: settings.modelName,
  });
  return { pipeline, schemaStore, valuesStore };
}
