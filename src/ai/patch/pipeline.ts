/**
 * Pipeline Coordinator
 *
 * utterance → identify → locate → validate → apply → persist
 *
 * Short-circuits on the first failure and reports it as a PatchResult with
 * the stage, the service and the offending text. The validate→apply span
 * runs under a per-service lock so two runs against one service never
 * interleave their read-modify-write.
 */

import { PatchPipelineError, StoreNotFoundError } from "./errors.js";
import { IdentifierResolver } from "./identifier-resolver.js";
import { KeyedLock } from "./keyed-lock.js";
import type { KeywordTable } from "./keyword-table.js";
import { ModelCallPolicy } from "./model-call.js";
import { applyPatch } from "./patch-applicator.js";
import { PathLocator } from "./path-locator.js";
import { validateChange } from "./schema-validator.js";
import type {
  ModelEndpoint,
  PatchResult,
  ProposedChange,
  SchemaDocument,
  SchemaStore,
  ServiceIdentity,
  ValueDocument,
  ValuesStore,
} from "./types.js";

export interface PatchPipelineDeps {
  schemaStore: SchemaStore;
  valuesStore: ValuesStore;
  model: ModelEndpoint;
  keywordTable: KeywordTable;
  modelTimeoutMs: number;
  /** 0 or 1 */
  maxModelRetries?: number;
  lock?: KeyedLock;
}

export interface HandleOptions {
  /** Bypasses identification */
  service?: string;
  /** Resolve and validate but do not persist */
  dryRun?: boolean;
}

interface RunContext {
  utterance?: string;
  identity?: ServiceIdentity;
  change?: ProposedChange;
  dryRun: boolean;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    for (const nested of Object.values(value)) deepFreeze(nested);
    Object.freeze(value);
  }
  return value;
}

/** Results own copies of what they report and are frozen all the way down. */
function buildResult(
  context: RunContext,
  outcome: { document: ValueDocument; persisted: boolean } | { error: PatchPipelineError }
): PatchResult {
  const base = {
    dryRun: context.dryRun,
    identity: context.identity && { ...context.identity },
    change: context.change && structuredClone(context.change),
  };

  if ("error" in outcome) {
    const { error } = outcome;
    return deepFreeze({
      ...base,
      applied: false,
      error: {
        ...error.toPatchError(),
        service: context.identity?.name,
        rawText: error.rawText ?? context.utterance,
        utterance: context.utterance,
      },
    });
  }

  return deepFreeze({
    ...base,
    applied: outcome.persisted,
    document: structuredClone(outcome.document),
  });
}

export class PatchPipeline {
  private readonly resolver: IdentifierResolver;
  private readonly locator: PathLocator;
  private readonly lock: KeyedLock;

  constructor(private readonly deps: PatchPipelineDeps) {
    const policy = new ModelCallPolicy(deps.model, {
      timeoutMs: deps.modelTimeoutMs,
      maxRetries: deps.maxModelRetries,
    });
    this.resolver = IdentifierResolver.create(deps.keywordTable, policy);
    this.locator = new PathLocator(policy);
    this.lock = deps.lock ?? new KeyedLock();
  }

  async listServices(): Promise<string[]> {
    return this.deps.schemaStore.listServices();
  }

  /**
   * Runs one utterance through the whole pipeline. Pipeline failures come
   * back as a result with `applied: false`; anything else is rethrown.
   */
  async handle(utterance: string, options: HandleOptions = {}): Promise<PatchResult> {
    const context: RunContext = { utterance, dryRun: options.dryRun ?? false };
    console.log(`[patch-pipeline] run started (explicitService=${options.service !== undefined})`);

    try {
      const knownServices = await this.deps.schemaStore.listServices();
      context.identity = options.service
        ? this.explicitIdentity(options.service, knownServices, utterance)
        : await this.resolver.resolve(utterance, knownServices);

      const schema = await this.loadSchema(context.identity.name, utterance);
      context.change = await this.locator.locate(utterance, schema);

      const outcome = await this.validateAndApply(context.identity.name, context.change, schema, context.dryRun);
      console.log(
        `[patch-pipeline] ${outcome.persisted ? "applied" : "validated"} change for service=${context.identity.name}`
      );
      return buildResult(context, outcome);
    } catch (error) {
      if (!(error instanceof PatchPipelineError)) throw error;
      console.warn(`[patch-pipeline] ${error.stage} failed with ${error.kind}`);
      return buildResult(context, { error });
    }
  }

  /**
   * Re-runs only validate→apply→persist for a change resolved earlier, e.g.
   * after a WriteError. Applying the same change twice gives the same
   * document.
   */
  async applyChange(
    serviceName: string,
    change: ProposedChange,
    options: { dryRun?: boolean } = {}
  ): Promise<PatchResult> {
    const context: RunContext = { change, dryRun: options.dryRun ?? false };

    try {
      const knownServices = await this.deps.schemaStore.listServices();
      context.identity = this.explicitIdentity(serviceName, knownServices, serviceName);
      const schema = await this.loadSchema(serviceName, serviceName);
      const outcome = await this.validateAndApply(serviceName, change, schema, context.dryRun);
      return buildResult(context, outcome);
    } catch (error) {
      if (!(error instanceof PatchPipelineError)) throw error;
      console.warn(`[patch-pipeline] apply retry failed with ${error.kind}`);
      return buildResult(context, { error });
    }
  }

  private explicitIdentity(name: string, knownServices: string[], rawText: string): ServiceIdentity {
    if (!knownServices.includes(name)) {
      throw new PatchPipelineError("Unidentified", "identify", `Unknown service: ${name}`, { rawText });
    }
    return { name, confidence: "Explicit" };
  }

  private async loadSchema(serviceName: string, rawText: string): Promise<SchemaDocument> {
    try {
      return await this.deps.schemaStore.getSchema(serviceName);
    } catch (error) {
      if (error instanceof StoreNotFoundError) {
        throw new PatchPipelineError("Unidentified", "identify", error.message, { rawText, cause: error });
      }
      throw error;
    }
  }

  private async validateAndApply(
    serviceName: string,
    change: ProposedChange,
    schema: SchemaDocument,
    dryRun: boolean
  ) {
    return this.lock.runExclusive(serviceName, async () => {
      const validated = validateChange(change.path, change.value, schema);

      let current: ValueDocument;
      try {
        current = await this.deps.valuesStore.getValue(serviceName);
      } catch (error) {
        if (error instanceof StoreNotFoundError) {
          throw new PatchPipelineError("NoSuchField", "apply", error.message, { cause: error });
        }
        throw error;
      }

      return applyPatch(this.deps.valuesStore, serviceName, current, validated.path, validated.value, {
        dryRun,
      });
    });
  }
}
