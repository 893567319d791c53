import { describe, expect, test } from '@jest/globals';
import {
  PathLocator,
  descriptionTokens,
  extractValue,
  parseLocateAnswer,
  scoreFields,
  segmentTokens,
} from '#patchbot/ai/patch/path-locator.js';
import { ModelCallPolicy } from '#patchbot/ai/patch/model-call.js';
import { flattenSchema, type SchemaField } from '#patchbot/ai/patch/schema-fields.js';
import type { SchemaDocument } from '#patchbot/ai/patch/types.js';
import { ScriptedModel } from '../../../../tests/support/fakes.js';

const chatSchema: SchemaDocument = {
  type: 'object',
  properties: {
    messageHistoryLimit: { type: 'integer', minimum: 0 },
    profanityFilter: { type: 'boolean' },
    resources: {
      type: 'object',
      properties: {
        memory: {
          type: 'object',
          properties: {
            limitMiB: { type: 'integer' },
            requestMiB: { type: 'integer' },
          },
        },
        cpu: {
          type: 'object',
          properties: { limitMillicores: { type: 'integer' } },
        },
      },
    },
    envs: { type: 'object', additionalProperties: { type: 'string' } },
    regions: { type: 'array', items: { type: 'string' } },
  },
};

const bracketSchema: SchemaDocument = {
  type: 'object',
  properties: {
    maxParticipants: { type: 'integer', description: 'Bracket size' },
    seeding: { type: 'boolean' },
  },
};

const timeoutSchema: SchemaDocument = {
  type: 'object',
  properties: {
    queueTimeout: { type: 'integer' },
    lobbyTimeout: { type: 'integer' },
  },
};

function field(types: string[], extra: Partial<SchemaField> = {}): SchemaField {
  return { segments: ['x'], pointer: '/x', types, wildcard: false, ...extra };
}

function locatorWith(model: ScriptedModel): PathLocator {
  return new PathLocator(new ModelCallPolicy(model, { timeoutMs: 1000 }));
}

describe('segmentTokens', () => {
  test('should split camelCase and snake_case names', () => {
    expect(segmentTokens('limitMiB')).toEqual(['limit', 'mi']);
    expect(segmentTokens('max_players')).toEqual(['max', 'players']);
    expect(segmentTokens('queueTimeoutSeconds')).toEqual(['queue', 'timeout', 'seconds']);
  });
});

describe('scoreFields', () => {
  test('should rank the field whose name and parents both appear first', () => {
    const matches = scoreFields('set chat memory limit to 512', flattenSchema(chatSchema));
    expect(matches[0]).toMatchObject({ field: { pointer: '/resources/memory/limitMiB' }, score: 3 });
    expect(matches.slice(1).map((m) => m.score)).toEqual([2, 2]);
  });

  test('should match a field through its description', () => {
    const matches = scoreFields('set the bracket size to 32', flattenSchema(bracketSchema));
    expect(matches).toHaveLength(1);
    expect(matches[0]).toMatchObject({ field: { pointer: '/maxParticipants' }, score: 2 });
  });

  test('should weigh name hits above description hits', () => {
    const schema: SchemaDocument = {
      type: 'object',
      properties: {
        bracketSize: { type: 'integer' },
        maxParticipants: { type: 'integer', description: 'Bracket size' },
      },
    };
    const matches = scoreFields('set bracket size to 32', flattenSchema(schema));
    expect(matches.map((m) => [m.field.pointer, m.score])).toEqual([
      ['/bracketSize', 4],
      ['/maxParticipants', 2],
    ]);
  });

  test('should leave out wildcard and array fields', () => {
    const pointers = scoreFields('regions envs', flattenSchema(chatSchema)).map((m) => m.field.pointer);
    expect(pointers).toEqual([]);
  });
});

describe('descriptionTokens', () => {
  test('should keep content words only', () => {
    expect(descriptionTokens('Messages kept per room')).toEqual(['messages', 'kept', 'room']);
    expect(descriptionTokens('The size of the bracket')).toEqual(['size', 'bracket']);
  });
});

describe('extractValue', () => {
  test('should read the number after "to"', () => {
    expect(extractValue('set limit to 512', field(['integer']))).toBe(512);
  });

  test('should refuse relative changes', () => {
    expect(extractValue('increase limit by 10', field(['integer']))).toBeUndefined();
    expect(extractValue('set limit to 50%', field(['integer']))).toBeUndefined();
  });

  test('should refuse a fraction for an integer field', () => {
    expect(extractValue('limit 12.5', field(['integer']))).toBeUndefined();
    expect(extractValue('skill range 12.5', field(['number']))).toBe(12.5);
  });

  test('should read switches as booleans', () => {
    expect(extractValue('enable the profanity filter', field(['boolean']))).toBe(true);
    expect(extractValue('turn the profanity filter off', field(['boolean']))).toBe(false);
    expect(extractValue('toggle the profanity filter', field(['boolean']))).toBeUndefined();
  });

  test('should read quoted or trailing strings', () => {
    expect(extractValue('rename the tournament to "Spring Cup"', field(['string']))).toBe('Spring Cup');
    expect(extractValue('rename the tournament to Spring Cup.', field(['string']))).toBe('Spring Cup');
  });

  test('should pick the single enum option mentioned', () => {
    const format = field(['string'], {
      enum: ['single-elimination', 'double-elimination', 'round-robin'],
    });
    expect(extractValue('use double elimination brackets', format)).toBe('double-elimination');
    expect(extractValue('use a better format', format)).toBeUndefined();
  });
});

describe('parseLocateAnswer', () => {
  const fields = flattenSchema(chatSchema);

  test('should accept a pointer path', () => {
    expect(parseLocateAnswer('{"path": "/resources/memory/limitMiB", "value": 1024}', chatSchema, fields)).toEqual({
      path: ['resources', 'memory', 'limitMiB'],
      value: 1024,
      source: 'Model',
    });
  });

  test('should accept new keys under a wildcard field', () => {
    expect(parseLocateAnswer('{"path": "envs.NEW_KEY", "value": "on"}', chatSchema, fields).path).toEqual([
      'envs',
      'NEW_KEY',
    ]);
  });

  test('should accept a segment array with an index', () => {
    expect(parseLocateAnswer('{"path": ["regions", 0], "value": "eu"}', chatSchema, fields).path).toEqual([
      'regions',
      0,
    ]);
  });

  test('should reject several changes as ambiguous', () => {
    expect(() =>
      parseLocateAnswer('[{"path": "/a", "value": 1}, {"path": "/b", "value": 2}]', chatSchema, fields)
    ).toThrow('Expected exactly one change, model returned 2');
  });

  test('should reject an answer without a value', () => {
    expect(() => parseLocateAnswer('{"path": "/profanityFilter"}', chatSchema, fields)).toThrow(
      'Model answer is not a single {path, value} pair'
    );
  });

  test('should reject a path outside the field list', () => {
    expect(() => parseLocateAnswer('{"path": "/disk", "value": 5}', chatSchema, fields)).toThrow(
      'Model chose a path that is not a known field: /disk'
    );
  });
});

describe('PathLocator', () => {
  test('should locate a clear request without the model', async () => {
    const model = new ScriptedModel();
    const change = await locatorWith(model).locate('set chat memory limit to 512', chatSchema);

    expect(change).toEqual({ path: ['resources', 'memory', 'limitMiB'], value: 512, source: 'Heuristic' });
    expect(model.calls).toBe(0);
  });

  test('should locate a field named only in its description without the model', async () => {
    const model = new ScriptedModel();
    const change = await locatorWith(model).locate('set the bracket size to 32', bracketSchema);

    expect(change).toEqual({ path: ['maxParticipants'], value: 32, source: 'Heuristic' });
    expect(model.calls).toBe(0);
  });

  test('should ask the model when two fields tie', async () => {
    const model = new ScriptedModel(['{"path": "/queueTimeout", "value": 30}']);
    const change = await locatorWith(model).locate('set timeout to 30', timeoutSchema);

    expect(change).toEqual({ path: ['queueTimeout'], value: 30, source: 'Model' });
    expect(model.prompts[0]).toContain('- /queueTimeout (integer)');
  });

  test('should ask the model for relative changes', async () => {
    const model = new ScriptedModel(['{"path": "queueTimeout", "value": 70}']);
    const change = await locatorWith(model).locate('raise the queue timeout by 10', timeoutSchema);

    expect(change).toEqual({ path: ['queueTimeout'], value: 70, source: 'Model' });
  });

  test('should fail on a schema without fields', async () => {
    await expect(locatorWith(new ScriptedModel()).locate('anything', { type: 'object' })).rejects.toMatchObject({
      kind: 'NoSuchField',
      stage: 'locate',
      message: 'Schema declares no fields',
    });
  });
});
