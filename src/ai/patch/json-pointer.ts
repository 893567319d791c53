import type { JsonPath } from "./types.js";

function unescapeToken(token: string): string {
  return token.replace(/~1/g, "/").replace(/~0/g, "~");
}

function escapeToken(token: string): string {
  return token.replace(/~/g, "~0").replace(/\//g, "~1");
}

/**
 * Parses a path written as a JSON Pointer ("/resources/memory/limitMiB") or
 * in dot notation ("resources.memory.limitMiB"). Segments come back as
 * strings; whether "0" is an array index depends on the schema, so callers
 * resolve that against it.
 */
export function parsePath(input: string): string[] {
  const trimmed = input.trim();
  if (trimmed === "" || trimmed === "/") return [];

  if (trimmed.startsWith("/")) {
    return trimmed.slice(1).split("/").map(unescapeToken);
  }

  return trimmed
    .replace(/^\$\.?/, "")
    .split(".")
    .filter((segment) => segment.length > 0);
}

export function formatPointer(path: JsonPath): string {
  return path.map((segment) => "/" + escapeToken(String(segment))).join("");
}
