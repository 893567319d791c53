import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, test } from '@jest/globals';
import { FileSchemaStore, FileValuesStore, isValidServiceName } from '#patchbot/integrations/storage/file-store.js';
import { StoreError, StoreNotFoundError, StoreWriteError } from '#patchbot/ai/patch/errors.js';

describe('file stores', () => {
  let root: string;
  let schemaDir: string;
  let valuesDir: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'patchbot-store-'));
    schemaDir = path.join(root, 'schemas');
    valuesDir = path.join(root, 'values');
    await fs.mkdir(schemaDir);
    await fs.writeFile(path.join(schemaDir, 'chat.schema.json'), '{"type": "object"}');
    await fs.writeFile(path.join(schemaDir, 'arena.schema.json'), '{"type": "object"}');
    await fs.writeFile(path.join(schemaDir, 'notes.txt'), 'ignored');
    await fs.writeFile(path.join(schemaDir, 'broken.schema.json'), '{not json');
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  test('should list services from schema file names in order', async () => {
    expect(await new FileSchemaStore(schemaDir).listServices()).toEqual(['arena', 'broken', 'chat']);
  });

  test('should list nothing for a missing directory', async () => {
    expect(await new FileSchemaStore(path.join(root, 'nowhere')).listServices()).toEqual([]);
  });

  test('should read a schema', async () => {
    expect(await new FileSchemaStore(schemaDir).getSchema('chat')).toEqual({ type: 'object' });
  });

  test('should report an unknown service as not found', async () => {
    await expect(new FileSchemaStore(schemaDir).getSchema('billing')).rejects.toBeInstanceOf(StoreNotFoundError);
  });

  test('should not look outside the directory', async () => {
    await expect(new FileSchemaStore(schemaDir).getSchema('../values')).rejects.toBeInstanceOf(StoreNotFoundError);
  });

  test('should report invalid JSON as a store error', async () => {
    const error = await new FileSchemaStore(schemaDir).getSchema('broken').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(StoreError);
    expect(error).not.toBeInstanceOf(StoreNotFoundError);
  });

  test('should write values and read them back', async () => {
    const store = new FileValuesStore(valuesDir);
    await store.putValue('chat', { limit: 5 });

    expect(await store.getValue('chat')).toEqual({ limit: 5 });
    expect(await fs.readFile(path.join(valuesDir, 'chat.value.json'), 'utf8')).toBe('{\n  "limit": 5\n}\n');
    expect(await fs.readdir(valuesDir)).toEqual(['chat.value.json']);
  });

  test('should report missing values as not found', async () => {
    await expect(new FileValuesStore(valuesDir).getValue('chat')).rejects.toBeInstanceOf(StoreNotFoundError);
  });

  test('should refuse to write under an invalid service name', async () => {
    await expect(new FileValuesStore(valuesDir).putValue('../chat', {})).rejects.toBeInstanceOf(StoreWriteError);
  });
});

describe('isValidServiceName', () => {
  test('should allow letters, digits, dash and underscore only', () => {
    expect(isValidServiceName('match_making-2')).toBe(true);
    expect(isValidServiceName('a/b')).toBe(false);
    expect(isValidServiceName('')).toBe(false);
  });
});
