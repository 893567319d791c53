/**
 * Identifier Resolver
 *
 * Maps an utterance to the service it targets. Runs an ordered chain of
 * strategies: keyword matching first, the model only when keywords match
 * zero or several services. The model's answer is accepted only if it names
 * a known service.
 */

import { PatchPipelineError } from "./errors.js";
import { escapeRegExp, matchServices, type KeywordTable } from "./keyword-table.js";
import type { ModelCallPolicy } from "./model-call.js";
import { buildIdentifyPrompt, buildStrictIdentifyPrompt } from "./prompts.js";
import { extractJson } from "./response-extractor.js";
import { isJsonObject } from "./schema-fields.js";
import type { ServiceIdentity } from "./types.js";

export type ResolutionOutcome =
  | { resolved: true; identity: ServiceIdentity }
  | { resolved: false; reason: string; candidates: string[] };

export interface ResolutionStrategy {
  readonly name: string;
  resolve(utterance: string, knownServices: string[], candidates: string[]): Promise<ResolutionOutcome>;
}

// ─── Strategies ───

export class KeywordStrategy implements ResolutionStrategy {
  readonly name = "keyword";

  constructor(private readonly table: KeywordTable) {}

  async resolve(utterance: string, knownServices: string[]): Promise<ResolutionOutcome> {
    const matches = matchServices(utterance, knownServices, this.table);
    if (matches.length === 1) {
      return { resolved: true, identity: { name: matches[0], confidence: "Keyword" } };
    }
    return {
      resolved: false,
      reason: matches.length === 0 ? "no keyword match" : `keywords matched ${matches.join(", ")}`,
      candidates: matches,
    };
  }
}

/**
 * Reads the service name out of a model answer. Prefers {"service": "..."};
 * when no usable JSON is present, a bare answer is accepted if it names
 * exactly one known service. Anything else is Unidentified.
 */
export function parseServiceAnswer(text: string, knownServices: string[]): string {
  let named: string | undefined;

  try {
    const parsed = extractJson(text);
    if (isJsonObject(parsed) && typeof parsed.service === "string") {
      named = parsed.service.trim();
    }
  } catch (error) {
    if (!(error instanceof PatchPipelineError)) throw error;
    const lowered = text.toLowerCase();
    const mentioned = knownServices.filter((service) =>
      new RegExp(`\\b${escapeRegExp(service.toLowerCase())}\\b`).test(lowered)
    );
    if (mentioned.length === 1) named = mentioned[0];
  }

  const match = named
    ? knownServices.find((service) => service.toLowerCase() === named?.toLowerCase())
    : undefined;

  if (!match) {
    throw new PatchPipelineError(
      "Unidentified",
      "identify",
      named ? `Model named an unknown service: ${named}` : "Model answer did not name a known service",
      { rawText: text }
    );
  }
  return match;
}

export class ModelStrategy implements ResolutionStrategy {
  readonly name = "model";

  constructor(private readonly policy: ModelCallPolicy) {}

  async resolve(
    utterance: string,
    knownServices: string[],
    candidates: string[]
  ): Promise<ResolutionOutcome> {
    const name = await this.policy.call({
      stage: "identify",
      agent: "identifier-resolver",
      prompt: buildIdentifyPrompt(utterance, knownServices, candidates),
      strictPrompt: buildStrictIdentifyPrompt(utterance, knownServices),
      parse: (text) => parseServiceAnswer(text, knownServices),
    });
    return { resolved: true, identity: { name, confidence: "Model" } };
  }
}

// ─── Resolver ───

export class IdentifierResolver {
  constructor(private readonly strategies: ResolutionStrategy[]) {}

  static create(table: KeywordTable, policy: ModelCallPolicy): IdentifierResolver {
    return new IdentifierResolver([new KeywordStrategy(table), new ModelStrategy(policy)]);
  }

  /**
   * @throws PatchPipelineError Unidentified when no strategy resolves a known
   *   service; ModelUnavailable when the model fallback cannot be reached
   */
  async resolve(utterance: string, knownServices: string[]): Promise<ServiceIdentity> {
    if (knownServices.length === 0) {
      throw new PatchPipelineError("Unidentified", "identify", "No services are known", {
        rawText: utterance,
      });
    }

    let candidates: string[] = [];
    for (const strategy of this.strategies) {
      const outcome = await strategy.resolve(utterance, knownServices, candidates);
      if (outcome.resolved) {
        console.log(
          `[identifier-resolver] ${strategy.name} resolved service=${outcome.identity.name}`
        );
        return outcome.identity;
      }
      console.log(`[identifier-resolver] ${strategy.name} fell through: ${outcome.reason}`);
      candidates = outcome.candidates;
    }

    throw new PatchPipelineError(
      "Unidentified",
      "identify",
      "Could not identify the target service",
      { rawText: utterance }
    );
  }
}
