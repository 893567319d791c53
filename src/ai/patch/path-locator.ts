/**
 * Path Locator ("targeted patching")
 *
 * Turns an utterance plus a service schema into one ProposedChange. The
 * schema is flattened to its addressable fields; utterance tokens are matched
 * against field names and descriptions first, and only when that does not yield exactly one
 * field and a usable value is the model asked, with the field list alone as
 * context.
 */

import { PatchPipelineError } from "./errors.js";
import { parsePath } from "./json-pointer.js";
import type { ModelCallPolicy } from "./model-call.js";
import { buildLocatePrompt, buildStrictLocatePrompt } from "./prompts.js";
import { extractJson } from "./response-extractor.js";
import {
  findField,
  flattenSchema,
  isJsonObject,
  resolveSchemaPath,
  type SchemaField,
} from "./schema-fields.js";
import type { JsonValue, ProposedChange, SchemaDocument } from "./types.js";

const TRUE_WORDS = new Set(["enable", "enabled", "on", "true", "yes", "activate", "allow"]);
const FALSE_WORDS = new Set(["disable", "disabled", "off", "false", "no", "deactivate", "disallow"]);
const RELATIVE_WORDS = new Set([
  "by",
  "increase",
  "decrease",
  "raise",
  "lower",
  "reduce",
  "double",
  "halve",
  "percent",
]);

// Too common to tie an utterance to a field description
const DESCRIPTION_STOPWORDS = new Set([
  "the", "and", "for", "per", "set", "how", "many", "much", "this", "that",
  "with", "from", "into", "when", "used", "each", "are", "its", "not", "any",
]);

// ─── Tokenizing ───

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((token) => token.length > 0);
}

/** "limitMiB" -> ["limit", "mi"]; "max_players" -> ["max", "players"] */
export function segmentTokens(segment: string): string[] {
  return tokenize(segment.replace(/([a-z0-9])([A-Z])/g, "$1 $2")).filter(
    (token) => token.length > 1
  );
}

/** Content words of a field description */
export function descriptionTokens(description: string): string[] {
  return [...new Set(tokenize(description))].filter(
    (token) => token.length > 2 && !DESCRIPTION_STOPWORDS.has(token)
  );
}

function hasToken(tokens: Set<string>, token: string): boolean {
  return tokens.has(token) || tokens.has(`${token}s`);
}

// ─── Heuristic field match ───

export interface FieldMatch {
  field: SchemaField;
  score: number;
}

/**
 * Scores concrete scalar fields. A field is a candidate only when a token of
 * its own name or of its description appears; parent segments add to the
 * score. Name hits weigh double, description hits count once.
 */
export function scoreFields(utterance: string, fields: SchemaField[]): FieldMatch[] {
  const tokens = new Set(tokenize(utterance));

  return fields
    .filter((field) => !field.wildcard && !field.types.includes("array") && !field.types.includes("object"))
    .map((field) => {
      const name = field.segments[field.segments.length - 1];
      const parents = field.segments.slice(0, -1);
      const nameHits = segmentTokens(name).filter((t) => hasToken(tokens, t)).length;
      const parentHits = parents.flatMap(segmentTokens).filter((t) => hasToken(tokens, t)).length;
      const descriptionHits = field.description
        ? descriptionTokens(field.description).filter((t) => hasToken(tokens, t)).length
        : 0;
      const direct = nameHits * 2 + descriptionHits;
      return { field, score: direct > 0 ? direct + parentHits : 0 };
    })
    .filter((match) => match.score > 0)
    .sort((a, b) => b.score - a.score);
}

// ─── Heuristic value extraction ───

function numbersIn(text: string): number[] {
  return [...text.matchAll(/-?\d+(?:\.\d+)?/g)].map((m) => Number(m[0]));
}

function extractNumber(utterance: string, integer: boolean): number | undefined {
  const tokens = tokenize(utterance);
  if (utterance.includes("%") || tokens.some((t) => RELATIVE_WORDS.has(t))) return undefined;

  const afterTo = /\bto\s+(-?\d+(?:\.\d+)?)/i.exec(utterance);
  let value: number | undefined;
  if (afterTo) {
    value = Number(afterTo[1]);
  } else {
    const all = numbersIn(utterance);
    if (all.length === 1) value = all[0];
  }

  if (value === undefined || Number.isNaN(value)) return undefined;
  if (integer && !Number.isInteger(value)) return undefined;
  return value;
}

function extractString(utterance: string): string | undefined {
  const quoted = /"([^"]*)"|'([^']*)'/.exec(utterance);
  if (quoted) return quoted[1] ?? quoted[2];

  const index = utterance.toLowerCase().lastIndexOf(" to ");
  if (index === -1) return undefined;
  const rest = utterance.slice(index + 4).trim().replace(/[.!?]+$/, "").trim();
  return rest.length > 0 ? rest : undefined;
}

function extractEnum(utterance: string, options: JsonValue[]): JsonValue | undefined {
  const lowered = ` ${tokenize(utterance).join(" ")} `;
  const numbers = new Set(numbersIn(utterance));

  const hits = options.filter((option) => {
    if (typeof option === "string") {
      const phrase = tokenize(option).join(" ");
      return phrase.length > 0 && lowered.includes(` ${phrase} `);
    }
    if (typeof option === "number") return numbers.has(option);
    if (typeof option === "boolean") {
      const words = option ? TRUE_WORDS : FALSE_WORDS;
      return tokenize(utterance).some((t) => words.has(t));
    }
    return false;
  });

  return hits.length === 1 ? hits[0] : undefined;
}

function extractBoolean(utterance: string): boolean | undefined {
  const tokens = tokenize(utterance);
  const yes = tokens.some((t) => TRUE_WORDS.has(t));
  const no = tokens.some((t) => FALSE_WORDS.has(t));
  if (yes === no) return undefined;
  return yes;
}

/** Best-effort literal value for a field, or undefined when unsure */
export function extractValue(utterance: string, field: SchemaField): JsonValue | undefined {
  if (field.enum) return extractEnum(utterance, field.enum);

  const types = field.types;
  if (types.includes("boolean")) {
    const value = extractBoolean(utterance);
    if (value !== undefined) return value;
  }
  if (types.includes("integer") || types.includes("number")) {
    const value = extractNumber(utterance, !types.includes("number"));
    if (value !== undefined) return value;
  }
  if (types.includes("string")) return extractString(utterance);
  return undefined;
}

// ─── Model answer parsing ───

/**
 * Parses a model answer into a change. The answer must contain exactly one
 * {path, value} pair and the path must fall on a field in the list.
 */
export function parseLocateAnswer(
  text: string,
  schema: SchemaDocument,
  fields: SchemaField[]
): ProposedChange {
  let parsed = extractJson(text);

  if (Array.isArray(parsed)) {
    if (parsed.length !== 1) {
      throw new PatchPipelineError(
        "AmbiguousPath",
        "locate",
        `Expected exactly one change, model returned ${parsed.length}`,
        { rawText: text }
      );
    }
    parsed = parsed[0];
  }

  if (!isJsonObject(parsed) || !("value" in parsed) || parsed.path === undefined) {
    throw new PatchPipelineError(
      "AmbiguousPath",
      "locate",
      "Model answer is not a single {path, value} pair",
      { rawText: text }
    );
  }

  const rawPath = parsed.path;
  let segments: string[];
  if (typeof rawPath === "string") {
    segments = parsePath(rawPath);
  } else if (Array.isArray(rawPath) && rawPath.every((s) => typeof s === "string" || typeof s === "number")) {
    segments = rawPath.map((s) => String(s));
  } else {
    throw new PatchPipelineError("AmbiguousPath", "locate", "Model answer path is not a path", {
      rawText: text,
    });
  }

  const resolved = resolveSchemaPath(schema, segments);
  const field = resolved ? findField(fields, resolved.path) : undefined;
  if (!resolved || !field) {
    throw new PatchPipelineError(
      "NoSuchField",
      "locate",
      `Model chose a path that is not a known field: ${typeof rawPath === "string" ? rawPath : JSON.stringify(rawPath)}`,
      { rawText: text }
    );
  }

  return { path: resolved.path, value: parsed.value, source: "Model" };
}

// ─── Locator ───

export class PathLocator {
  constructor(private readonly policy: ModelCallPolicy) {}

  /**
   * Deterministic match only. Returns undefined when no single field wins or
   * no value can be read off the utterance.
   */
  locateHeuristically(utterance: string, fields: SchemaField[]): ProposedChange | undefined {
    const matches = scoreFields(utterance, fields);
    if (matches.length === 0) return undefined;
    if (matches.length > 1 && matches[0].score === matches[1].score) {
      console.log(
        `[path-locator] heuristic tie between ${matches[0].field.pointer} and ${matches[1].field.pointer}`
      );
      return undefined;
    }

    const { field } = matches[0];
    const value = extractValue(utterance, field);
    if (value === undefined) {
      console.log(`[path-locator] heuristic matched ${field.pointer} but found no value`);
      return undefined;
    }

    return { path: [...field.segments], value, source: "Heuristic" };
  }

  /**
   * @throws PatchPipelineError AmbiguousPath, NoSuchField, NoJsonFound,
   *   MalformedJson or ModelUnavailable
   */
  async locate(utterance: string, schema: SchemaDocument): Promise<ProposedChange> {
    const fields = flattenSchema(schema);
    if (fields.length === 0) {
      throw new PatchPipelineError("NoSuchField", "locate", "Schema declares no fields", {
        rawText: utterance,
      });
    }

    const heuristic = this.locateHeuristically(utterance, fields);
    if (heuristic) {
      console.log(`[path-locator] heuristic located ${heuristic.path.join(".")}`);
      return heuristic;
    }

    console.log(`[path-locator] falling back to model with ${fields.length} fields`);
    return this.policy.call({
      stage: "locate",
      agent: "path-locator",
      prompt: buildLocatePrompt(utterance, fields),
      strictPrompt: buildStrictLocatePrompt(utterance, fields),
      parse: (text) => parseLocateAnswer(text, schema, fields),
    });
  }
}
