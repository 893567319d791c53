/**
 * Patch Pipeline Types
 *
 * Shared shapes for the change-resolution pipeline: who is being changed
 * (ServiceIdentity), where (JsonPath), what (ProposedChange) and how it
 * went (PatchResult).
 */

import { z } from "zod";

// ─── JSON values ───

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

/**
 * A JSON Schema node. Kept structural: the stores hand us whatever the
 * schema files contain and we only read the keywords we understand.
 */
export type SchemaDocument = { [key: string]: JsonValue };

export type ValueDocument = JsonValue;

// ─── Identity ───

export const ConfidenceSourceSchema = z.enum(["Keyword", "Model", "Explicit"]);
export type ConfidenceSource = z.infer<typeof ConfidenceSourceSchema>;

export const ServiceIdentitySchema = z.object({
  name: z.string().min(1),
  confidence: ConfidenceSourceSchema,
});
export type ServiceIdentity = z.infer<typeof ServiceIdentitySchema>;

// ─── Paths and changes ───

export const PathSegmentSchema = z.union([z.string(), z.number().int().min(0)]);
export type PathSegment = z.infer<typeof PathSegmentSchema>;

export const JsonPathSchema = z.array(PathSegmentSchema);
export type JsonPath = z.infer<typeof JsonPathSchema>;

export const ChangeSourceSchema = z.enum(["Heuristic", "Model"]);
export type ChangeSource = z.infer<typeof ChangeSourceSchema>;

export const ProposedChangeSchema = z.object({
  path: JsonPathSchema,
  value: JsonValueSchema,
  source: ChangeSourceSchema,
});
export type ProposedChange = z.infer<typeof ProposedChangeSchema>;

// ─── Errors and results ───

export const ErrorKindSchema = z.enum([
  "Unidentified",
  "AmbiguousPath",
  "NoSuchField",
  "NoJsonFound",
  "MalformedJson",
  "TypeMismatch",
  "ConstraintViolation",
  "PathNotInSchema",
  "ModelUnavailable",
  "WriteError",
]);
export type ErrorKind = z.infer<typeof ErrorKindSchema>;

export const PipelineStageSchema = z.enum([
  "identify",
  "locate",
  "extract",
  "validate",
  "apply",
  "persist",
]);
export type PipelineStage = z.infer<typeof PipelineStageSchema>;

export const PatchErrorSchema = z.object({
  kind: ErrorKindSchema,
  stage: PipelineStageSchema,
  message: z.string(),
  service: z.string().optional(),
  /** Utterance or model response that triggered the failure */
  rawText: z.string().optional(),
  /** Request the run was handling; absent for `applyChange` */
  utterance: z.string().optional(),
  /** True when the change was validated and only persisting it failed */
  retryableApply: z.boolean(),
});
export type PatchError = z.infer<typeof PatchErrorSchema>;

export const PatchResultSchema = z.object({
  applied: z.boolean(),
  dryRun: z.boolean(),
  identity: ServiceIdentitySchema.optional(),
  change: ProposedChangeSchema.optional(),
  /** Document as persisted (or as it would be, for dry runs) */
  document: JsonValueSchema.optional(),
  error: PatchErrorSchema.optional(),
});
export type PatchResult = z.infer<typeof PatchResultSchema>;

// ─── External collaborators ───

export interface SchemaStore {
  /** Names of every service the store holds a schema for */
  listServices(): Promise<string[]>;
  getSchema(serviceName: string): Promise<SchemaDocument>;
}

export interface ValuesStore {
  getValue(serviceName: string): Promise<ValueDocument>;
  putValue(serviceName: string, document: ValueDocument): Promise<void>;
}

export interface ModelEndpoint {
  /**
   * Completes a prompt. Rejects with a ModelEndpointError on timeout or
   * when the endpoint cannot be reached; the returned text is untrusted.
   */
  complete(prompt: string, timeoutMs: number): Promise<string>;
}
