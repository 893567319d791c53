/**
 * Schema Validator
 *
 * Last gate before mutation: resolves the target path against the service
 * schema and checks the proposed value against that node's type and
 * constraints (enum, bounds, pattern, nested properties) using Ajv.
 */

import Ajv, { type ErrorObject, type ValidateFunction } from "ajv";
import { LRUCache } from "lru-cache";
import { PatchPipelineError } from "./errors.js";
import { formatPointer } from "./json-pointer.js";
import { isJsonObject, jsonTypeOf, resolveSchemaPath, schemaTypes } from "./schema-fields.js";
import type { JsonObject, JsonPath, JsonValue, SchemaDocument } from "./types.js";

export interface ValidatedChange {
  /** Path with array indices as numbers */
  path: JsonPath;
  value: JsonValue;
  node: JsonObject;
}

const ajv = new Ajv({ allErrors: true, strict: false, validateFormats: false });

export const VALIDATOR_CACHE_SIZE = 256;

interface CompiledNode {
  schema: JsonObject;
  validate: ValidateFunction;
}

// Keyed by the serialized standalone schema; evicted entries leave Ajv too
const compiled = new LRUCache<string, CompiledNode>({
  max: VALIDATOR_CACHE_SIZE,
  dispose: (entry) => {
    ajv.removeSchema(entry.schema);
  },
});

function compile(schema: JsonObject): ValidateFunction {
  const key = JSON.stringify(schema);
  const cached = compiled.get(key);
  if (cached) return cached.validate;
  const validate = ajv.compile(schema);
  compiled.set(key, { schema, validate });
  return validate;
}

export function cachedValidatorCount(): number {
  return compiled.size;
}

function typeMatches(expected: string[], value: JsonValue): boolean {
  if (expected.length === 0) return true;
  const actual = jsonTypeOf(value);
  return expected.some(
    (type) => type === actual || (type === "number" && actual === "integer")
  );
}

/**
 * Builds a standalone schema for one node. Definitions are carried over so
 * that local refs inside the node keep resolving; identifiers are dropped so
 * Ajv does not register the same $id twice.
 */
function standaloneSchema(node: JsonObject, root: SchemaDocument): JsonObject {
  const { $schema: _schema, $id: _id, ...rest } = node;
  const standalone: JsonObject = { ...rest };
  if (isJsonObject(root.definitions)) standalone.definitions = root.definitions;
  if (isJsonObject(root.$defs)) standalone.$defs = root.$defs;
  return standalone;
}

function describeErrors(errors: ErrorObject[]): string {
  return errors
    .map((e) => `${e.instancePath || "(value)"} ${e.message ?? e.keyword}`.trim())
    .join("; ");
}

/**
 * Validates a (path, value) pair against the schema.
 *
 * @throws PatchPipelineError PathNotInSchema, TypeMismatch or ConstraintViolation
 */
export function validateChange(
  path: ReadonlyArray<string | number>,
  value: JsonValue,
  schema: SchemaDocument
): ValidatedChange {
  const pointer = formatPointer([...path]);
  const resolved = resolveSchemaPath(schema, path);

  if (!resolved || resolved.path.length === 0) {
    throw new PatchPipelineError(
      "PathNotInSchema",
      "validate",
      `Path ${pointer || "/"} is not declared in the schema`
    );
  }

  const expected = schemaTypes(resolved.node);
  if (!typeMatches(expected, value)) {
    throw new PatchPipelineError(
      "TypeMismatch",
      "validate",
      `Value for ${pointer} must be ${expected.join(" or ")}, got ${jsonTypeOf(value)}`
    );
  }

  let validate: ValidateFunction;
  try {
    validate = compile(standaloneSchema(resolved.node, schema));
  } catch (error) {
    throw new PatchPipelineError(
      "ConstraintViolation",
      "validate",
      `Schema for ${pointer} could not be compiled: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }

  if (!validate(value)) {
    const errors = validate.errors ?? [];
    const kind = errors.some((e) => e.keyword === "type") ? "TypeMismatch" : "ConstraintViolation";
    throw new PatchPipelineError(
      kind,
      "validate",
      `Value for ${pointer} violates the schema: ${describeErrors(errors)}`
    );
  }

  return { path: resolved.path, value, node: resolved.node };
}
