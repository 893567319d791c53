import { FastifyInstance } from "fastify";
import { zodToJsonSchema } from "zod-to-json-schema";
import type { PatchPipeline } from "#patchbot/ai/patch/pipeline.js";
import { createConfigHandlers } from "./handler.js";
import {
  ApplyChangeRequest,
  ApplyChangeRequestSchema,
  ConfigMessageRequest,
  ConfigMessageRequestSchema,
} from "#patchbot/api/config/schemas.js";

export async function registerConfigRoutes(server: FastifyInstance, pipeline: PatchPipeline) {
  const { handleConfigMessage, handleApplyChange } = createConfigHandlers(pipeline);

  // Natural-language change request
  server.post<{ Body: ConfigMessageRequest }>("/message", {
    schema: {
      body: zodToJsonSchema(ConfigMessageRequestSchema, "configMessageRequest"),
    },
    handler: handleConfigMessage,
  });

  // Re-apply an already resolved change
  server.post<{ Body: ApplyChangeRequest }>("/apply", {
    schema: {
      body: zodToJsonSchema(ApplyChangeRequestSchema, "applyChangeRequest"),
    },
    handler: handleApplyChange,
  });
}
