/**
 * Patch Applicator
 *
 * Sole writer of value documents. Applies one validated field change by
 * copying only the containers on the way to the target, then persists the
 * new document. The input document is never modified.
 */

import { PatchPipelineError } from "./errors.js";
import { formatPointer } from "./json-pointer.js";
import type { JsonPath, JsonValue, PathSegment, ValueDocument, ValuesStore } from "./types.js";

function describe(node: JsonValue | undefined): string {
  if (node === undefined) return "missing";
  if (node === null) return "null";
  return Array.isArray(node) ? "array" : typeof node;
}

function setChild(container: JsonValue, segment: PathSegment, child: JsonValue, path: JsonPath): JsonValue {
  if (Array.isArray(container)) {
    const index = typeof segment === "number" ? segment : Number.NaN;
    if (!Number.isInteger(index) || index < 0 || index > container.length) {
      throw new PatchPipelineError(
        "NoSuchField",
        "apply",
        `Index ${String(segment)} is out of range for the array at ${formatPointer(path)}`
      );
    }
    const copy = [...container];
    copy[index] = child;
    return copy;
  }

  if (typeof container === "object" && container !== null) {
    return { ...container, [String(segment)]: child };
  }

  throw new PatchPipelineError(
    "NoSuchField",
    "apply",
    `Cannot set ${String(segment)} on ${describe(container)} at ${formatPointer(path)}`
  );
}

function childOf(container: JsonValue, segment: PathSegment): JsonValue | undefined {
  if (Array.isArray(container)) {
    return typeof segment === "number" ? container[segment] : undefined;
  }
  if (typeof container === "object" && container !== null) {
    return Object.prototype.hasOwnProperty.call(container, segment) ? container[String(segment)] : undefined;
  }
  return undefined;
}

/**
 * Returns a new document with the value at `path` replaced. Every container
 * on the path except the last must already exist; the leaf itself may be new
 * (a direct child of an existing node).
 */
export function setAtPath(document: ValueDocument, path: JsonPath, value: JsonValue): ValueDocument {
  if (path.length === 0) {
    throw new PatchPipelineError("NoSuchField", "apply", "Refusing to replace the whole document");
  }

  const write = (node: JsonValue, depth: number): JsonValue => {
    const segment = path[depth];
    if (depth === path.length - 1) {
      return setChild(node, segment, value, path.slice(0, depth));
    }
    const child = childOf(node, segment);
    if (child === undefined || child === null || typeof child !== "object") {
      throw new PatchPipelineError(
        "NoSuchField",
        "apply",
        `Path ${formatPointer(path.slice(0, depth + 1))} does not exist in the current document (found ${describe(child)})`
      );
    }
    return setChild(node, segment, write(child, depth + 1), path.slice(0, depth));
  };

  return write(document, 0);
}

export interface ApplyOutcome {
  document: ValueDocument;
  persisted: boolean;
}

/**
 * Applies the change in memory and, unless `dryRun` is set, writes the
 * result back. A failed write leaves the store's copy as it was and is
 * reported as WriteError so the caller can retry just this step.
 */
export async function applyPatch(
  valuesStore: ValuesStore,
  serviceName: string,
  document: ValueDocument,
  path: JsonPath,
  value: JsonValue,
  options: { dryRun?: boolean } = {}
): Promise<ApplyOutcome> {
  const updated = setAtPath(document, path, value);

  if (options.dryRun) {
    return { document: updated, persisted: false };
  }

  try {
    await valuesStore.putValue(serviceName, updated);
  } catch (error) {
    throw new PatchPipelineError(
      "WriteError",
      "persist",
      `Failed to persist values for ${serviceName}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }

  return { document: updated, persisted: true };
}
