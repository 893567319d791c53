import { describe, expect, test } from '@jest/globals';
import { ModelCallPolicy } from '#patchbot/ai/patch/model-call.js';
import { extractJson } from '#patchbot/ai/patch/response-extractor.js';
import { ScriptedModel, timeoutError } from '../../../../tests/support/fakes.js';

const request = {
  stage: 'locate' as const,
  agent: 'test-agent',
  prompt: 'normal prompt',
  strictPrompt: 'strict prompt',
  parse: (text: string) => extractJson(text),
};

describe('ModelCallPolicy', () => {
  test('should return the parsed answer of the first attempt', async () => {
    const model = new ScriptedModel(['{"a": 1}']);
    const policy = new ModelCallPolicy(model, { timeoutMs: 5000 });

    expect(await policy.call(request)).toEqual({ a: 1 });
    expect(model.prompts).toEqual(['normal prompt']);
    expect(model.timeouts).toEqual([5000]);
  });

  test('should retry once with the strict prompt after a parse failure', async () => {
    const model = new ScriptedModel(['no json here', '{"a": 2}']);
    const policy = new ModelCallPolicy(model, { timeoutMs: 5000 });

    expect(await policy.call(request)).toEqual({ a: 2 });
    expect(model.prompts).toEqual(['normal prompt', 'strict prompt']);
  });

  test('should report two timeouts as ModelUnavailable', async () => {
    const model = new ScriptedModel([timeoutError(), timeoutError()]);
    const policy = new ModelCallPolicy(model, { timeoutMs: 10 });

    await expect(policy.call(request)).rejects.toMatchObject({
      kind: 'ModelUnavailable',
      stage: 'locate',
      message: 'Model call timed out: model did not answer in time',
    });
    expect(model.calls).toBe(2);
  });

  test('should surface the last parse failure', async () => {
    const model = new ScriptedModel(['nothing', 'still nothing']);
    const policy = new ModelCallPolicy(model, { timeoutMs: 10 });

    await expect(policy.call(request)).rejects.toMatchObject({
      kind: 'NoJsonFound',
      rawText: 'still nothing',
    });
  });

  test('should not retry when retries are disabled', async () => {
    const model = new ScriptedModel(['nothing', '{"a": 1}']);
    const policy = new ModelCallPolicy(model, { timeoutMs: 10, maxRetries: 0 });

    await expect(policy.call(request)).rejects.toMatchObject({ kind: 'NoJsonFound' });
    expect(model.calls).toBe(1);
  });

  test('should cap retries at one', () => {
    const policy = new ModelCallPolicy(new ScriptedModel(), { timeoutMs: 10, maxRetries: 5 });
    expect(policy.maxRetries).toBe(1);
  });

  test('should rethrow unexpected parser errors without retrying', async () => {
    const model = new ScriptedModel(['{"a": 1}', '{"a": 2}']);
    const policy = new ModelCallPolicy(model, { timeoutMs: 10 });

    await expect(
      policy.call({
        ...request,
        parse: () => {
          throw new TypeError('parser bug');
        },
      })
    ).rejects.toThrow('parser bug');
    expect(model.calls).toBe(1);
  });
});
