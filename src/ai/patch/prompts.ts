/**
 * Prompt builders for the two model-assisted stages.
 *
 * Each stage has a normal prompt and a stricter retry prompt that repeats the
 * output contract and asks for JSON only. Prompts never include the value
 * document or the raw schema, only service names or the flattened field list.
 */

import type { SchemaField } from "./schema-fields.js";

// ─── Identification ───

export function buildIdentifyPrompt(
  utterance: string,
  serviceNames: string[],
  keywordCandidates: string[] = []
): string {
  const hint =
    keywordCandidates.length > 1
      ? `\nThe request mentions terms from several services: ${keywordCandidates.join(", ")}\n`
      : "";
  return `You route configuration change requests to the service they are about.

Known services: ${serviceNames.join(", ")}
${hint}
Request: "${utterance}"

Pick exactly one service from the known list. Respond with JSON in this form:
{"service": "<one of the known services>"}`;
}

export function buildStrictIdentifyPrompt(utterance: string, serviceNames: string[]): string {
  return `Respond with JSON only. No explanation, no markdown.

Valid values for "service": ${serviceNames.map((n) => JSON.stringify(n)).join(", ")}

Request: "${utterance}"

Output exactly: {"service": "<value>"}`;
}

// ─── Field location ───

function describeField(field: SchemaField): string {
  const parts: string[] = [field.types.length > 0 ? field.types.join("|") : "any"];
  if (field.enum) parts.push(`one of: ${field.enum.map((v) => JSON.stringify(v)).join(", ")}`);
  if (field.minimum !== undefined) parts.push(`min ${field.minimum}`);
  if (field.maximum !== undefined) parts.push(`max ${field.maximum}`);
  if (field.pattern) parts.push(`pattern ${field.pattern}`);

  const description = field.description ? ` - ${field.description}` : "";
  return `${field.pointer} (${parts.join("; ")})${description}`;
}

export function formatFieldList(fields: SchemaField[]): string {
  return fields.map((field) => `- ${describeField(field)}`).join("\n");
}

export function buildLocatePrompt(utterance: string, fields: SchemaField[]): string {
  return `You turn a configuration change request into a single field update.

Available fields (JSON Pointer paths; {key} and {index} stand for any key or array index):
${formatFieldList(fields)}

Request: "${utterance}"

Rules:
1. Choose exactly ONE field from the list. Replace {key}/{index} with the concrete key or index.
2. The value must match the field's type and constraints.
3. Respond with JSON in this form:
{"path": "/path/to/field", "value": <new value>}`;
}

export function buildStrictLocatePrompt(utterance: string, fields: SchemaField[]): string {
  return `Respond with JSON only. No explanation, no markdown, no code fences.

Fields:
${formatFieldList(fields)}

Request: "${utterance}"

Output exactly one object: {"path": "<field path>", "value": <value>}`;
}
