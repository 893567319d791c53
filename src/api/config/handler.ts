import { FastifyRequest, FastifyReply } from "fastify";
import type { PatchPipeline } from "#patchbot/ai/patch/pipeline.js";
import {
  JsonValueSchema,
  type ErrorKind,
  type PatchResult,
} from "#patchbot/ai/patch/types.js";
import {
  ApplyChangeRequest,
  ApplyChangeRequestSchema,
  ConfigMessageRequest,
  ConfigMessageRequestSchema,
} from "#patchbot/api/config/schemas.js";

/**
 * HTTP status for a pipeline result: 200 on success (applied or dry run),
 * 503 when the model could not be reached, 502 when only persisting
 * failed, 422 for every other failure.
 */
export function statusForResult(result: PatchResult): number {
  if (!result.error) return 200;
  const statusByKind: Partial<Record<ErrorKind, number>> = {
    ModelUnavailable: 503,
    WriteError: 502,
  };
  return statusByKind[result.error.kind] ?? 422;
}

export function createConfigHandlers(pipeline: PatchPipeline) {
  async function handleConfigMessage(
    request: FastifyRequest<{ Body: ConfigMessageRequest }>,
    reply: FastifyReply
  ) {
    const parsed = ConfigMessageRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: "Invalid request", details: parsed.error.issues });
    }

    const { input, service, dryRun } = parsed.data;
    const result = await pipeline.handle(input, { service, dryRun });
    return reply.code(statusForResult(result)).send(result);
  }

  async function handleApplyChange(
    request: FastifyRequest<{ Body: ApplyChangeRequest }>,
    reply: FastifyReply
  ) {
    const parsed = ApplyChangeRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: "Invalid request", details: parsed.error.issues });
    }

    const value = JsonValueSchema.safeParse(parsed.data.change.value);
    if (!value.success) {
      return reply.code(400).send({ error: "Invalid request", details: value.error.issues });
    }

    const { service, change, dryRun } = parsed.data;
    const result = await pipeline.applyChange(
      service,
      { path: change.path, value: value.data, source: change.source },
      { dryRun }
    );
    return reply.code(statusForResult(result)).send(result);
  }

  return { handleConfigMessage, handleApplyChange };
}
