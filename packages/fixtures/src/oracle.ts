import type { OracleCall, OracleCallOptions, OracleReply } from '@strata/core';

export type ScriptedReply = OracleReply | string | Error;

type ReplySource = readonly ScriptedReply[] | ((prompt: string, callIndex: number) => ScriptedReply);

export interface ScriptedOracle extends OracleCall {
  readonly prompts: readonly string[];
  readonly callCount: () => number;
}

const toReply = (reply: ScriptedReply): Promise<OracleReply> => {
  if (reply instanceof Error) {
    return Promise.reject(reply);
  }
  if (typeof reply === 'string') {
    return Promise.resolve({ kind: 'text', text: reply });
  }
  return Promise.resolve(reply);
};

/**
 * Deterministic oracle for tests. A list is replayed in order and its last
 * entry repeats once exhausted; a function receives each prompt.
 */
export const createScriptedOracle = (source: ReplySource): ScriptedOracle => {
  const prompts: string[] = [];

  return {
    prompts,
    callCount: () => prompts.length,
    call(prompt: string, options?: OracleCallOptions): Promise<OracleReply> {
      if (options?.signal?.aborted) {
        return Promise.resolve({ kind: 'timeout' });
      }

      const callIndex = prompts.length;
      prompts.push(prompt);

      if (typeof source === 'function') {
        return toReply(source(prompt, callIndex));
      }

      if (source.length === 0) {
        return Promise.reject(new Error('Scripted oracle has no replies'));
      }
      return toReply(source[Math.min(callIndex, source.length - 1)]);
    }
  };
};
