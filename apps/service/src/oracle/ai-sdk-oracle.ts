import { APICallError, generateText, type LanguageModel } from 'ai';

import type { OracleCall, OracleCallOptions, OracleReply } from '@strata/core';

export const DEFAULT_ORACLE_TIMEOUT_MS = 120_000;

export interface AiSdkOracleOptions {
  readonly model: LanguageModel;
  readonly timeoutMs?: number;
  readonly temperature?: number;
  readonly system?: string;
}

const DEFAULT_SYSTEM_PROMPT =
  'You discover CSS selectors for repeated records in HTML. Reply with a single JSON object and nothing else.';

/**
 * Oracle backed by an AI SDK language model. Transport retries are disabled
 * so that the gateway alone owns the retry and backoff policy.
 */
export const createAiSdkOracle = (options: AiSdkOracleOptions): OracleCall => {
  const timeoutMs = options.timeoutMs ?? DEFAULT_ORACLE_TIMEOUT_MS;

  return {
    async call(prompt: string, callOptions: OracleCallOptions = {}): Promise<OracleReply> {
      const controller = new AbortController();
      let timedOut = false;
      const timer = setTimeout(() => {
        timedOut = true;
        controller.abort();
      }, timeoutMs);
      const external = callOptions.signal;
      const forwardAbort = () => controller.abort();
      if (external?.aborted) {
        controller.abort();
      } else {
        external?.addEventListener('abort', forwardAbort, { once: true });
      }

      try {
        const result = await generateText({
          model: options.model,
          system: options.system ?? DEFAULT_SYSTEM_PROMPT,
          prompt,
          temperature: options.temperature ?? 0,
          maxRetries: 0,
          abortSignal: controller.signal
        });
        if (result.finishReason === 'content-filter') {
          return { kind: 'refused', reason: 'content filter' };
        }
        return { kind: 'text', text: result.text };
      } catch (error) {
        if (APICallError.isInstance(error) && error.statusCode === 429) {
          return { kind: 'rateLimited' };
        }
        if (timedOut) {
          return { kind: 'timeout' };
        }
        throw error;
      } finally {
        clearTimeout(timer);
        external?.removeEventListener('abort', forwardAbort);
      }
    }
  };
};
