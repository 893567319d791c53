/**
 * HTTP clients for remote schema and values servers.
 *
 * GET  <base>/            -> ["service", ...]
 * GET  <base>/<service>   -> document (404 when unknown)
 * PUT  <base>/<service>   -> store document (values only)
 */

import { StoreError, StoreNotFoundError, StoreWriteError } from "#patchbot/ai/patch/errors.js";
import { isJsonObject } from "#patchbot/ai/patch/schema-fields.js";
import {
  JsonValueSchema,
  type JsonValue,
  type SchemaDocument,
  type SchemaStore,
  type ValueDocument,
  type ValuesStore,
} from "#patchbot/ai/patch/types.js";

const DEFAULT_TIMEOUT_MS = 10_000;

function serviceUrl(baseUrl: string, serviceName: string): string {
  return `${baseUrl.replace(/\/+$/, "")}/${encodeURIComponent(serviceName)}`;
}

async function getJson(
  url: string,
  serviceName: string,
  what: "schema" | "values",
  timeoutMs: number
): Promise<JsonValue> {
  let response: Response;
  try {
    response = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
  } catch (error) {
    throw new StoreError(`Could not reach ${what} server for service: ${serviceName}`, error);
  }

  if (response.status === 404) throw new StoreNotFoundError(serviceName, what);
  if (!response.ok) {
    throw new StoreError(`${what} server answered ${response.status} for service: ${serviceName}`);
  }

  try {
    return JsonValueSchema.parse(await response.json());
  } catch (error) {
    throw new StoreError(`Invalid JSON from ${what} server for service: ${serviceName}`, error);
  }
}

export class HttpSchemaStore implements SchemaStore {
  constructor(
    private readonly baseUrl: string,
    private readonly timeoutMs: number = DEFAULT_TIMEOUT_MS
  ) {}

  async listServices(): Promise<string[]> {
    const body = await getJson(`${this.baseUrl.replace(/\/+$/, "")}/`, "*", "schema", this.timeoutMs);
    if (!Array.isArray(body)) {
      throw new StoreError("Schema server did not return a list of services");
    }
    return body.filter((name): name is string => typeof name === "string");
  }

  async getSchema(serviceName: string): Promise<SchemaDocument> {
    const body = await getJson(serviceUrl(this.baseUrl, serviceName), serviceName, "schema", this.timeoutMs);
    if (!isJsonObject(body)) {
      throw new StoreError(`Schema for service ${serviceName} is not a JSON object`);
    }
    return body;
  }
}

export class HttpValuesStore implements ValuesStore {
  constructor(
    private readonly baseUrl: string,
    private readonly timeoutMs: number = DEFAULT_TIMEOUT_MS
  ) {}

  async getValue(serviceName: string): Promise<ValueDocument> {
    return getJson(serviceUrl(this.baseUrl, serviceName), serviceName, "values", this.timeoutMs);
  }

  async putValue(serviceName: string, document: ValueDocument): Promise<void> {
    let response: Response;
    try {
      response = await fetch(serviceUrl(this.baseUrl, serviceName), {
        method: "PUT",
        headers: { "content-type": "application/json" },
        body: JSON.stringify(document),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new StoreWriteError(serviceName, error);
    }
    if (!response.ok) {
      throw new StoreWriteError(serviceName, new Error(`values server answered ${response.status}`));
    }
  }
}
