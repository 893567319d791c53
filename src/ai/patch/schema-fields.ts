/**
 * Schema Fields
 *
 * Flattens a JSON Schema into the list of addressable fields the locator and
 * the model work from, and resolves concrete paths back to schema nodes.
 * Only local $refs ("#/...") are followed.
 */

import { formatPointer } from "./json-pointer.js";
import type { JsonObject, JsonPath, JsonValue, SchemaDocument } from "./types.js";

/** Placeholder segments for fields that accept any key or index */
export const KEY_WILDCARD = "{key}";
export const INDEX_WILDCARD = "{index}";

export type FieldSegment = string;

export interface SchemaField {
  /** Template segments; may contain KEY_WILDCARD / INDEX_WILDCARD */
  segments: FieldSegment[];
  pointer: string;
  types: string[];
  enum?: JsonValue[];
  description?: string;
  minimum?: number;
  maximum?: number;
  pattern?: string;
  wildcard: boolean;
}

export interface ResolvedSchemaPath {
  node: JsonObject;
  /** The requested path with array indices converted to numbers */
  path: JsonPath;
}

const MAX_DEPTH = 16;
const MAX_REF_HOPS = 32;

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function lookupPointer(root: SchemaDocument, ref: string): JsonObject | undefined {
  if (!ref.startsWith("#")) return undefined;
  const tokens = ref
    .slice(1)
    .split("/")
    .filter((t) => t.length > 0)
    .map((t) => decodeURIComponent(t).replace(/~1/g, "/").replace(/~0/g, "~"));

  let current: JsonValue = root;
  for (const token of tokens) {
    if (isJsonObject(current)) {
      current = current[token];
    } else if (Array.isArray(current) && /^\d+$/.test(token)) {
      current = current[Number(token)];
    } else {
      return undefined;
    }
    if (current === undefined) return undefined;
  }
  return isJsonObject(current) ? current : undefined;
}

/**
 * Follows $ref chains and folds allOf branches into a single node. Sibling
 * keywords next to a $ref win over the referenced ones.
 */
export function derefNode(node: JsonObject, root: SchemaDocument): JsonObject {
  let current = node;

  for (let hops = 0; hops < MAX_REF_HOPS; hops++) {
    const ref = current.$ref;
    if (typeof ref !== "string") break;
    const target = lookupPointer(root, ref);
    if (!target) break;
    const { $ref: _ref, ...siblings } = current;
    current = { ...target, ...siblings };
  }

  const allOf = current.allOf;
  if (Array.isArray(allOf)) {
    const { allOf: _allOf, ...rest } = current;
    let merged: JsonObject = {};
    for (const branch of allOf) {
      if (!isJsonObject(branch)) continue;
      const resolved = derefNode(branch, root);
      merged = mergeNodes(merged, resolved);
    }
    current = mergeNodes(merged, rest);
  }

  return current;
}

function mergeNodes(a: JsonObject, b: JsonObject): JsonObject {
  const merged: JsonObject = { ...a, ...b };
  if (isJsonObject(a.properties) && isJsonObject(b.properties)) {
    merged.properties = { ...a.properties, ...b.properties };
  }
  if (Array.isArray(a.required) && Array.isArray(b.required)) {
    merged.required = [...a.required, ...b.required];
  }
  return merged;
}

export function schemaTypes(node: JsonObject): string[] {
  const type = node.type;
  if (typeof type === "string") return [type];
  if (Array.isArray(type)) {
    return type.filter((t): t is string => typeof t === "string");
  }
  if (isJsonObject(node.properties) || node.additionalProperties !== undefined) return ["object"];
  if (node.items !== undefined) return ["array"];
  if (Array.isArray(node.enum)) {
    return [...new Set(node.enum.map(jsonTypeOf))];
  }
  if (node.const !== undefined) return [jsonTypeOf(node.const)];
  return [];
}

/** JSON Schema type name of a value ("integer" for whole numbers) */
export function jsonTypeOf(value: JsonValue): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (typeof value === "number") return Number.isInteger(value) ? "integer" : "number";
  return typeof value;
}

function additionalSchema(node: JsonObject): JsonObject | undefined {
  const additional = node.additionalProperties;
  if (additional === true) return {};
  return isJsonObject(additional) ? additional : undefined;
}

function toField(segments: FieldSegment[], node: JsonObject): SchemaField {
  const field: SchemaField = {
    segments,
    pointer: formatPointer(segments),
    types: schemaTypes(node),
    wildcard: segments.some((s) => s === KEY_WILDCARD || s === INDEX_WILDCARD),
  };
  if (Array.isArray(node.enum)) field.enum = node.enum;
  if (typeof node.description === "string") field.description = node.description;
  if (typeof node.minimum === "number") field.minimum = node.minimum;
  if (typeof node.maximum === "number") field.maximum = node.maximum;
  if (typeof node.pattern === "string") field.pattern = node.pattern;
  return field;
}

/**
 * Lists every addressable field in the schema. Objects with declared
 * properties are walked; objects that only take additional keys and arrays
 * contribute wildcard children. Arrays are also fields themselves so a
 * whole list can be replaced.
 */
export function flattenSchema(schema: SchemaDocument): SchemaField[] {
  const fields: SchemaField[] = [];

  const walk = (raw: JsonObject, segments: FieldSegment[], depth: number): void => {
    const node = derefNode(raw, schema);
    const types = schemaTypes(node);

    if (depth > MAX_DEPTH) return;

    if (types.includes("object") && (isJsonObject(node.properties) || additionalSchema(node))) {
      if (isJsonObject(node.properties)) {
        for (const [key, child] of Object.entries(node.properties)) {
          if (isJsonObject(child)) walk(child, [...segments, key], depth + 1);
        }
      }
      const additional = additionalSchema(node);
      if (additional) walk(additional, [...segments, KEY_WILDCARD], depth + 1);
      return;
    }

    if (types.includes("array")) {
      if (segments.length > 0) fields.push(toField(segments, node));
      if (isJsonObject(node.items)) walk(node.items, [...segments, INDEX_WILDCARD], depth + 1);
      return;
    }

    if (segments.length > 0) fields.push(toField(segments, node));
  };

  walk(schema, [], 0);
  return fields;
}

/**
 * Resolves a concrete path to its schema node. Returns undefined when any
 * segment has no counterpart in the schema (undeclared keys on objects that
 * do not allow additional properties count as absent).
 */
export function resolveSchemaPath(
  schema: SchemaDocument,
  path: ReadonlyArray<string | number>
): ResolvedSchemaPath | undefined {
  let node = derefNode(schema, schema);
  const resolved: JsonPath = [];

  for (const segment of path) {
    const types = schemaTypes(node);
    const key = String(segment);

    if (types.includes("array") && /^\d+$/.test(key)) {
      const index = Number(key);
      const items = node.items;
      let next: JsonObject | undefined;
      if (isJsonObject(items)) {
        next = items;
      } else if (Array.isArray(items)) {
        const tuple = items[index];
        next = isJsonObject(tuple) ? tuple : undefined;
      }
      if (!next) return undefined;
      node = derefNode(next, schema);
      resolved.push(index);
      continue;
    }

    const properties = node.properties;
    if (isJsonObject(properties) && isJsonObject(properties[key])) {
      const child = properties[key];
      if (!isJsonObject(child)) return undefined;
      node = derefNode(child, schema);
      resolved.push(key);
      continue;
    }

    const additional = additionalSchema(node);
    if (additional) {
      node = derefNode(additional, schema);
      resolved.push(key);
      continue;
    }

    return undefined;
  }

  return { node, path: resolved };
}

/** Finds the flattened field a concrete path falls under, if any */
export function findField(fields: SchemaField[], path: JsonPath): SchemaField | undefined {
  return fields.find(
    (field) =>
      field.segments.length === path.length &&
      field.segments.every((segment, i) => {
        const actual = path[i];
        if (segment === KEY_WILDCARD) return typeof actual === "string";
        if (segment === INDEX_WILDCARD) return typeof actual === "number";
        return segment === String(actual);
      })
  );
}
