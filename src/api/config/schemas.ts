import { z } from "zod";
import { ChangeSourceSchema, JsonPathSchema } from "#patchbot/ai/patch/types.js";

export const ConfigMessageRequestSchema = z.object({
  input: z.string().min(1).max(2000),
  service: z.string().min(1).optional(),
  dryRun: z.boolean().optional(),
});

export type ConfigMessageRequest = z.infer<typeof ConfigMessageRequestSchema>;

// `value` is any JSON value; it is checked against the service schema later
export const ApplyChangeRequestSchema = z.object({
  service: z.string().min(1),
  change: z.object({
    path: JsonPathSchema,
    value: z.unknown(),
    source: ChangeSourceSchema.default("Model"),
  }),
  dryRun: z.boolean().optional(),
});

export type ApplyChangeRequest = z.infer<typeof ApplyChangeRequestSchema>;
