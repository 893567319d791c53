import { FastifyInstance } from "fastify";
import { zodToJsonSchema } from "zod-to-json-schema";
import type { SchemaStore, ValuesStore } from "#patchbot/ai/patch/types.js";
import { createStoreHandlers } from "./handler.js";
import { ListServicesResponseSchema, ServiceParams } from "#patchbot/api/stores/schemas.js";

export async function registerStoreRoutes(
  server: FastifyInstance,
  schemaStore: SchemaStore,
  valuesStore: ValuesStore
) {
  const { handleListServices, handleGetSchema, handleGetValues } = createStoreHandlers(
    schemaStore,
    valuesStore
  );

  server.get("/services", {
    schema: {
      response: {
        200: zodToJsonSchema(ListServicesResponseSchema, "listServicesResponse"),
      },
    },
    handler: handleListServices,
  });

  server.get<{ Params: ServiceParams }>("/schemas/:service", { handler: handleGetSchema });

  server.get<{ Params: ServiceParams }>("/values/:service", { handler: handleGetValues });
}
