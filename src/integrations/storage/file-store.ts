/**
 * File-backed schema and values stores.
 *
 * Layout: <schemaDir>/<service>.schema.json and <valuesDir>/<service>.value.json.
 * Writes go to a temp file that is renamed over the target.
 */

import fs from "fs/promises";
import path from "path";
import { StoreError, StoreNotFoundError, StoreWriteError } from "#patchbot/ai/patch/errors.js";
import type {
  SchemaDocument,
  SchemaStore,
  ValueDocument,
  ValuesStore,
} from "#patchbot/ai/patch/types.js";
import { isJsonObject } from "#patchbot/ai/patch/schema-fields.js";

const SCHEMA_SUFFIX = ".schema.json";
const VALUE_SUFFIX = ".value.json";
const SERVICE_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

export function isValidServiceName(name: string): boolean {
  return SERVICE_NAME_PATTERN.test(name);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

async function readJsonFile(filePath: string, serviceName: string, what: "schema" | "values") {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf8");
  } catch (error) {
    if (isMissingFile(error)) throw new StoreNotFoundError(serviceName, what);
    throw new StoreError(`Failed to read ${what} for service: ${serviceName}`, error);
  }

  try {
    const parsed: ValueDocument = JSON.parse(content);
    return parsed;
  } catch (error) {
    throw new StoreError(`Invalid JSON in ${what} file for service: ${serviceName}`, error);
  }
}

export class FileSchemaStore implements SchemaStore {
  constructor(private readonly schemaDir: string) {}

  async listServices(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.schemaDir);
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw new StoreError(`Failed to list schema directory ${this.schemaDir}`, error);
    }
    return entries
      .filter((entry) => entry.endsWith(SCHEMA_SUFFIX))
      .map((entry) => entry.slice(0, -SCHEMA_SUFFIX.length))
      .filter(isValidServiceName)
      .sort();
  }

  async getSchema(serviceName: string): Promise<SchemaDocument> {
    if (!isValidServiceName(serviceName)) throw new StoreNotFoundError(serviceName, "schema");
    const schema = await readJsonFile(
      path.join(this.schemaDir, `${serviceName}${SCHEMA_SUFFIX}`),
      serviceName,
      "schema"
    );
    if (!isJsonObject(schema)) {
      throw new StoreError(`Schema for service ${serviceName} is not a JSON object`);
    }
    return schema;
  }
}

export class FileValuesStore implements ValuesStore {
  constructor(private readonly valuesDir: string) {}

  private filePath(serviceName: string): string {
    return path.join(this.valuesDir, `${serviceName}${VALUE_SUFFIX}`);
  }

  async getValue(serviceName: string): Promise<ValueDocument> {
    if (!isValidServiceName(serviceName)) throw new StoreNotFoundError(serviceName, "values");
    return readJsonFile(this.filePath(serviceName), serviceName, "values");
  }

  async putValue(serviceName: string, document: ValueDocument): Promise<void> {
    if (!isValidServiceName(serviceName)) {
      throw new StoreWriteError(serviceName, new Error("Invalid service name"));
    }
    const target = this.filePath(serviceName);
    const temp = `${target}.${process.pid}.${Date.now()}.tmp`;
    try {
      await fs.mkdir(this.valuesDir, { recursive: true });
      await fs.writeFile(temp, JSON.stringify(document, null, 2) + "\n", "utf8");
      await fs.rename(temp, target);
    } catch (error) {
      await fs.rm(temp, { force: true });
      throw new StoreWriteError(serviceName, error);
    }
  }
}
