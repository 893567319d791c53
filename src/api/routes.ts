import { FastifyInstance } from 'fastify';
import type { PatchPipeline } from '#patchbot/ai/patch/pipeline.js';
import type { SchemaStore, ValuesStore } from '#patchbot/ai/patch/types.js';
import { registerConfigRoutes } from '#patchbot/api/config/routes.js';
import { registerStoreRoutes } from '#patchbot/api/stores/routes.js';

export interface ApiDependencies {
  pipeline: PatchPipeline;
  schemaStore: SchemaStore;
  valuesStore: ValuesStore;
}

export async function registerApiRoutes(server: FastifyInstance, deps: ApiDependencies) {
  // Change requests under /api/config
  await server.register(async function (fastify) {
    await registerConfigRoutes(fastify, deps.pipeline);
  }, { prefix: '/api/config' });

  // Schema and values lookups under /api
  await server.register(async function (fastify) {
    await registerStoreRoutes(fastify, deps.schemaStore, deps.valuesStore);
  }, { prefix: '/api' });
}
