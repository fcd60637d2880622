import { APICallError } from 'ai';
import { MockLanguageModelV1 } from 'ai/test';
import { describe, expect, it } from 'vitest';

import { createAiSdkOracle } from './ai-sdk-oracle.js';

type GenerateResult = Awaited<ReturnType<MockLanguageModelV1['doGenerate']>>;

const completion = (text: string, finishReason: GenerateResult['finishReason'] = 'stop'): GenerateResult => ({
  rawCall: { rawPrompt: null, rawSettings: {} },
  finishReason,
  usage: { promptTokens: 10, completionTokens: 5 },
  text
});

describe('createAiSdkOracle', () => {
  it('returns the model text', async () => {
    const model = new MockLanguageModelV1({ doGenerate: () => Promise.resolve(completion('{"patterns": []}')) });
    const oracle = createAiSdkOracle({ model });

    await expect(oracle.call('find selectors')).resolves.toEqual({ kind: 'text', text: '{"patterns": []}' });
  });

  it('maps HTTP 429 to a rate-limit reply', async () => {
    const model = new MockLanguageModelV1({
      doGenerate: () =>
        Promise.reject(
          new APICallError({
            message: 'Too many requests',
            url: 'https://api.example.test/v1/chat',
            requestBodyValues: {},
            statusCode: 429
          })
        )
    });
    const oracle = createAiSdkOracle({ model });

    await expect(oracle.call('find selectors')).resolves.toEqual({ kind: 'rateLimited' });
  });

  it('maps a content filter stop to a refusal', async () => {
    const model = new MockLanguageModelV1({ doGenerate: () => Promise.resolve(completion('', 'content-filter')) });
    const oracle = createAiSdkOracle({ model });

    await expect(oracle.call('find selectors')).resolves.toEqual({ kind: 'refused', reason: 'content filter' });
  });

  it('reports its own timeout', async () => {
    const model = new MockLanguageModelV1({
      doGenerate: ({ abortSignal }) =>
        new Promise<GenerateResult>((_resolve, reject) => {
          abortSignal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
        })
    });
    const oracle = createAiSdkOracle({ model, timeoutMs: 5 });

    await expect(oracle.call('find selectors')).resolves.toEqual({ kind: 'timeout' });
  });

  it('rethrows other failures', async () => {
    const model = new MockLanguageModelV1({ doGenerate: () => Promise.reject(new Error('connection reset')) });
    const oracle = createAiSdkOracle({ model });

    await expect(oracle.call('find selectors')).rejects.toThrow('connection reset');
  });
});
