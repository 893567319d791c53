import { FastifyRequest, FastifyReply } from "fastify";
import { StoreNotFoundError } from "#patchbot/ai/patch/errors.js";
import type { SchemaStore, ValuesStore } from "#patchbot/ai/patch/types.js";
import {
  ListServicesResponse,
  ServiceParams,
  ServiceParamsSchema,
} from "#patchbot/api/stores/schemas.js";

export function createStoreHandlers(schemaStore: SchemaStore, valuesStore: ValuesStore) {
  async function handleListServices(): Promise<ListServicesResponse> {
    return { services: await schemaStore.listServices() };
  }

  async function handleGetSchema(
    request: FastifyRequest<{ Params: ServiceParams }>,
    reply: FastifyReply
  ) {
    const parsed = ServiceParamsSchema.safeParse(request.params);
    if (!parsed.success) {
      return reply.code(400).send({ error: "Invalid service name" });
    }
    try {
      return reply.send(await schemaStore.getSchema(parsed.data.service));
    } catch (error) {
      if (error instanceof StoreNotFoundError) {
        return reply.code(404).send({ error: error.message });
      }
      throw error;
    }
  }

  async function handleGetValues(
    request: FastifyRequest<{ Params: ServiceParams }>,
    reply: FastifyReply
  ) {
    const parsed = ServiceParamsSchema.safeParse(request.params);
    if (!parsed.success) {
      return reply.code(400).send({ error: "Invalid service name" });
    }
    try {
      return reply.send(await valuesStore.getValue(parsed.data.service));
    } catch (error) {
      if (error instanceof StoreNotFoundError) {
        return reply.code(404).send({ error: error.message });
      }
      throw error;
    }
  }

  return { handleListServices, handleGetSchema, handleGetValues };
}
