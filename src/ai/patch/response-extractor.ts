/**
 * Response Extractor
 *
 * Isolates a JSON payload from free-form model text. Models wrap answers in
 * prose, markdown fences or "thinking out loud", so we scan for balanced
 * {...} / [...] spans and parse the last complete one.
 *
 * Pure: no model calls, no retries, no knowledge of what the JSON means.
 */

import { PatchPipelineError } from "./errors.js";
import type { JsonValue } from "./types.js";

export interface JsonSpan {
  start: number;
  /** Exclusive */
  end: number;
}

const CLOSER_FOR: Record<string, string> = { "{": "}", "[": "]" };

/**
 * Returns the index just past the bracket that closes the opener at `start`,
 * or -1 when the span never closes or closes with the wrong bracket.
 * Brackets inside double-quoted strings are ignored.
 */
function matchSpan(text: string, start: number): number {
  const expected: string[] = [];
  let inString = false;
  let escape = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escape) {
        escape = false;
      } else if (ch === "\\") {
        escape = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === "{" || ch === "[") {
      expected.push(CLOSER_FOR[ch]);
    } else if (ch === "}" || ch === "]") {
      if (expected.pop() !== ch) return -1;
      if (expected.length === 0) return i + 1;
    }
  }

  return -1;
}

/**
 * Finds every outermost balanced span in order of appearance. An opener that
 * never balances is skipped so that a complete span nested after it can
 * still be found.
 */
export function findJsonSpans(text: string): JsonSpan[] {
  const spans: JsonSpan[] = [];
  let i = 0;

  while (i < text.length) {
    const ch = text[i];
    if (ch === "{" || ch === "[") {
      const end = matchSpan(text, i);
      if (end !== -1) {
        spans.push({ start: i, end });
        i = end;
        continue;
      }
    }
    i++;
  }

  return spans;
}

/**
 * Extracts the last complete JSON object or array from model text.
 *
 * @throws PatchPipelineError NoJsonFound when no balanced span exists,
 *   MalformedJson when the chosen span does not parse
 */
export function extractJson(modelText: string): JsonValue {
  const spans = findJsonSpans(modelText);
  const last = spans.at(-1);

  if (!last) {
    throw new PatchPipelineError(
      "NoJsonFound",
      "extract",
      "No balanced JSON object or array found in model response",
      { rawText: modelText }
    );
  }

  const candidate = modelText.slice(last.start, last.end);
  try {
    const parsed: JsonValue = JSON.parse(candidate);
    return parsed;
  } catch (error) {
    throw new PatchPipelineError(
      "MalformedJson",
      "extract",
      `Extracted span is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      { rawText: modelText, cause: error }
    );
  }
}
