import { describe, expect, test } from '@jest/globals';
import {
  IdentifierResolver,
  KeywordStrategy,
  parseServiceAnswer,
} from '#patchbot/ai/patch/identifier-resolver.js';
import { ModelEndpointError, PatchPipelineError } from '#patchbot/ai/patch/errors.js';
import type { KeywordTable } from '#patchbot/ai/patch/keyword-table.js';
import { ModelCallPolicy } from '#patchbot/ai/patch/model-call.js';
import { ScriptedModel } from '../../../../tests/support/fakes.js';

const table: KeywordTable = {
  services: {
    chat: { keywords: ['chat'], exclude: [] },
    matchmaking: { keywords: ['matchmaking', 'queue'], exclude: ['tournament'] },
    tournament: { keywords: ['tournament', 'bracket'], exclude: [] },
  },
};
const known = ['chat', 'matchmaking', 'tournament'];

function resolverWith(model: ScriptedModel): IdentifierResolver {
  return IdentifierResolver.create(table, new ModelCallPolicy(model, { timeoutMs: 1000 }));
}

describe('IdentifierResolver', () => {
  test('should resolve a single keyword match without the model', async () => {
    const model = new ScriptedModel();
    const identity = await resolverWith(model).resolve('set chat memory limit to 512', known);

    expect(identity).toEqual({ name: 'chat', confidence: 'Keyword' });
    expect(model.calls).toBe(0);
  });

  test('should ask the model when no keyword matches', async () => {
    const model = new ScriptedModel(['{"service": "matchmaking"}']);
    const identity = await resolverWith(model).resolve('set the difficulty to hard', known);

    expect(identity).toEqual({ name: 'matchmaking', confidence: 'Model' });
    expect(model.prompts[0]).toContain('Known services: chat, matchmaking, tournament');
  });

  test('should pass ambiguous keyword matches to the model as a hint', async () => {
    const model = new ScriptedModel(['{"service": "tournament"}']);
    const identity = await resolverWith(model).resolve('chat in the bracket view', known);

    expect(identity.name).toBe('tournament');
    expect(model.prompts[0]).toContain('terms from several services: chat, tournament');
  });

  test('should reject a model answer naming an unknown service', async () => {
    const model = new ScriptedModel(['{"service": "billing"}', '{"service": "billing"}']);

    await expect(resolverWith(model).resolve('set the difficulty to hard', known)).rejects.toMatchObject({
      kind: 'Unidentified',
      stage: 'identify',
      message: 'Model named an unknown service: billing',
    });
    expect(model.calls).toBe(2);
  });

  test('should report an unreachable model as ModelUnavailable', async () => {
    const model = new ScriptedModel([
      new ModelEndpointError('unavailable', 'connection refused'),
      new ModelEndpointError('unavailable', 'connection refused'),
    ]);

    await expect(resolverWith(model).resolve('set the difficulty to hard', known)).rejects.toMatchObject({
      kind: 'ModelUnavailable',
      stage: 'identify',
    });
  });

  test('should fail without calling anything when no services are known', async () => {
    const model = new ScriptedModel();
    await expect(resolverWith(model).resolve('set chat limit', [])).rejects.toMatchObject({
      kind: 'Unidentified',
      message: 'No services are known',
    });
    expect(model.calls).toBe(0);
  });

  test('should fail when every strategy falls through', async () => {
    const resolver = new IdentifierResolver([new KeywordStrategy(table)]);
    const error = await resolver.resolve('make it faster', known).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PatchPipelineError);
    expect(error).toMatchObject({
      kind: 'Unidentified',
      message: 'Could not identify the target service',
      rawText: 'make it faster',
    });
  });
});

describe('parseServiceAnswer', () => {
  test('should match the named service case-insensitively', () => {
    expect(parseServiceAnswer('{"service": "CHAT"}', known)).toBe('chat');
  });

  test('should accept a bare answer naming one known service', () => {
    expect(parseServiceAnswer('The answer is tournament.', known)).toBe('tournament');
  });

  test('should reject a bare answer naming several services', () => {
    expect(() => parseServiceAnswer('chat or tournament', known)).toThrow(
      'Model answer did not name a known service'
    );
  });

  test('should fall back to the text when the JSON is malformed', () => {
    expect(parseServiceAnswer('{service: chat}', known)).toBe('chat');
  });
});
