import { setTimeout as delay } from 'node:timers/promises';

import type { ZodType, ZodTypeDef } from 'zod';

import { DEFAULT_THROTTLE_BACKOFF_MS, GatewayError, type GatewayFailureClass, type OracleCall, type OracleReply } from '@strata/core';

import { createSilentLogger, type Logger } from '../logger.js';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const defaultSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export type AttemptOutcome = 'ok' | 'malformed' | 'invalid' | 'rateLimited' | 'timeout' | 'refused' | 'error';

export interface GatewayAttempt {
  readonly call: number;
  readonly outcome: AttemptOutcome;
  readonly delayMs?: number;
  readonly detail?: string;
}

export type GatewayResult<T> =
  | { readonly ok: true; readonly payload: T; readonly trace: readonly GatewayAttempt[] }
  | { readonly ok: false; readonly error: GatewayError; readonly trace: readonly GatewayAttempt[] };

export type GatewayStep<T> =
  | { readonly kind: 'ok'; readonly payload: T }
  | { readonly kind: 'retry'; readonly reason: 'malformed' | 'invalid' | 'rateLimited'; readonly delayMs: number; readonly detail: string }
  | {
      readonly kind: 'exhausted';
      readonly reason: GatewayFailureClass;
      readonly outcome: AttemptOutcome;
      readonly delayMs?: number;
      readonly detail: string;
    };

export interface RetryCounters {
  readonly validationFailures: number;
  readonly throttles: number;
}

export interface StepContext<T> {
  readonly schema: ZodType<T, ZodTypeDef, unknown>;
  readonly maxAttempts: number;
  readonly throttleBackoffMs: readonly number[];
}

export interface InvokeOptions {
  readonly maxAttempts?: number;
  readonly signal?: AbortSignal;
}

export interface OracleGateway {
  invoke<T>(
    promptBuilder: () => string,
    schema: ZodType<T, ZodTypeDef, unknown>,
    options?: InvokeOptions
  ): Promise<GatewayResult<T>>;
}

export interface CreateOracleGatewayOptions {
  readonly oracle: OracleCall;
  readonly sleep?: Sleep;
  readonly logger?: Logger;
  readonly throttleBackoffMs?: readonly number[];
}

const FENCE_PATTERN = /^```[a-zA-Z]*\s*\n?([\s\S]*?)\n?```$/;

/** Removes markdown code fences and keeps the outermost JSON object. */
export const extractJsonText = (text: string): string => {
  const trimmed = text.trim();
  const unfenced = FENCE_PATTERN.exec(trimmed)?.[1] ?? trimmed;
  const first = unfenced.indexOf('{');
  const last = unfenced.lastIndexOf('}');
  return first >= 0 && last > first ? unfenced.slice(first, last + 1) : unfenced;
};

const parseReply = <T>(
  text: string,
  schema: ZodType<T, ZodTypeDef, unknown>
): { ok: true; payload: T } | { ok: false; reason: 'malformed' | 'invalid'; detail: string } => {
  let raw: unknown;
  try {
    raw = JSON.parse(extractJsonText(text));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { ok: false, reason: 'malformed', detail: message };
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
    return { ok: false, reason: 'invalid', detail };
  }
  return { ok: true, payload: parsed.data };
};

/**
 * Classifies one oracle reply. Validation failures and throttling draw on
 * separate counters; timeouts and refusals end the call at once.
 */
export const step = <T>(
  reply: OracleReply,
  counters: RetryCounters,
  context: StepContext<T>
): { readonly step: GatewayStep<T>; readonly counters: RetryCounters } => {
  switch (reply.kind) {
    case 'text': {
      const parsed = parseReply(reply.text, context.schema);
      if (parsed.ok) {
        return { step: { kind: 'ok', payload: parsed.payload }, counters };
      }
      const next = { ...counters, validationFailures: counters.validationFailures + 1 };
      if (next.validationFailures >= context.maxAttempts) {
        return {
          step: {
            kind: 'exhausted',
            reason: 'ValidationExhausted',
            outcome: parsed.reason,
            detail: `Oracle reply failed validation after ${next.validationFailures} attempt(s): ${parsed.detail}`
          },
          counters: next
        };
      }
      return { step: { kind: 'retry', reason: parsed.reason, delayMs: 0, detail: parsed.detail }, counters: next };
    }
    case 'rateLimited': {
      const schedule = context.throttleBackoffMs;
      const delayMs = schedule[Math.min(counters.throttles, schedule.length - 1)] ?? 0;
      const next = { ...counters, throttles: counters.throttles + 1 };
      if (next.throttles >= schedule.length) {
        return {
          step: {
            kind: 'exhausted',
            reason: 'ThrottleExhausted',
            outcome: 'rateLimited',
            delayMs,
            detail: `Oracle stayed rate limited after ${next.throttles} attempt(s)`
          },
          counters: next
        };
      }
      return {
        step: { kind: 'retry', reason: 'rateLimited', delayMs, detail: 'Oracle reported rate limiting' },
        counters: next
      };
    }
    case 'timeout':
      return { step: { kind: 'exhausted', reason: 'OracleUnavailable', outcome: 'timeout', detail: 'Oracle call timed out' }, counters };
    case 'refused':
      return {
        step: {
          kind: 'exhausted',
          reason: 'OracleUnavailable',
          outcome: 'refused',
          detail: reply.reason ? `Oracle refused the request: ${reply.reason}` : 'Oracle refused the request'
        },
        counters
      };
  }
};

export const createOracleGateway = (options: CreateOracleGatewayOptions): OracleGateway => {
  const oracle = options.oracle;
  const sleep = options.sleep ?? defaultSleep;
  const logger = options.logger ?? createSilentLogger();
  const throttleBackoffMs = options.throttleBackoffMs ?? DEFAULT_THROTTLE_BACKOFF_MS;

  return {
    async invoke<T>(
      promptBuilder: () => string,
      schema: ZodType<T, ZodTypeDef, unknown>,
      invokeOptions: InvokeOptions = {}
    ): Promise<GatewayResult<T>> {
      const signal = invokeOptions.signal;
      const context: StepContext<T> = {
        schema,
        maxAttempts: invokeOptions.maxAttempts ?? 3,
        throttleBackoffMs
      };
      const trace: GatewayAttempt[] = [];
      const fail = (failureClass: GatewayFailureClass, message: string, cause?: unknown): GatewayResult<T> => ({
        ok: false,
        error: new GatewayError(failureClass, message, trace.length, cause === undefined ? undefined : { cause }),
        trace
      });

      const prompt = promptBuilder();
      let counters: RetryCounters = { validationFailures: 0, throttles: 0 };

      for (;;) {
        if (signal?.aborted) {
          return fail('Cancelled', 'Oracle call cancelled before it was sent');
        }

        const call = trace.length + 1;
        let reply: OracleReply;
        try {
          reply = await oracle.call(prompt, { signal });
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          trace.push({ call, outcome: 'error', detail: message });
          if (signal?.aborted) {
            return fail('Cancelled', 'Oracle call cancelled while in flight', error);
          }
          return fail('OracleUnavailable', `Oracle call failed: ${message}`, error);
        }

        if (signal?.aborted) {
          trace.push({ call, outcome: reply.kind === 'text' ? 'ok' : reply.kind });
          return fail('Cancelled', 'Oracle call cancelled while in flight');
        }

        const next = step(reply, counters, context);
        counters = next.counters;
        const result = next.step;

        if (result.kind === 'ok') {
          trace.push({ call, outcome: 'ok' });
          return { ok: true, payload: result.payload, trace };
        }

        const backoff = async (ms: number | undefined): Promise<GatewayResult<T> | undefined> => {
          if (ms === undefined || ms <= 0) {
            return undefined;
          }
          try {
            await sleep(ms, signal);
          } catch (error) {
            if (signal?.aborted) {
              return fail('Cancelled', 'Oracle call cancelled during backoff', error);
            }
            throw error;
          }
          return undefined;
        };

        if (result.kind === 'exhausted') {
          trace.push({ call, outcome: result.outcome, delayMs: result.delayMs, detail: result.detail });
          return (await backoff(result.delayMs)) ?? fail(result.reason, result.detail);
        }

        trace.push({ call, outcome: result.reason, delayMs: result.delayMs, detail: result.detail });
        logger.warn(
          { attempt: call, reason: result.reason, delayMs: result.delayMs },
          'Retrying oracle call'
        );

        const cancelled = await backoff(result.delayMs);
        if (cancelled) {
          return cancelled;
        }
      }
    }
  };
};
