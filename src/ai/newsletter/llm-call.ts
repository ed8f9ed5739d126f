/**
 * Model Call Helpers
 *
 * Every model call in the pipeline goes through `invokeModel`, which gives
 * each attempt its own timeout, retries transient transport failures and
 * converts whatever is left into an `UpstreamModelError`.
 *
 * `generateStructured` layers the two decoder tiers on top: a schema-enforced
 * call decoded strictly, then a plain call decoded leniently. When both
 * fail the stage gets a `MalformedOutputError` with the raw text.
 */

import { APICallError, Output, type LanguageModel, type ModelMessage } from 'ai';
import type { z } from 'zod';

import { createPrefixedLogger, type Logger } from '../../utils/logger';
import { MalformedOutputError, UpstreamModelError, errorMessage } from './errors';
import { isRetryableError, withRetry, type RetryOptions } from './retry';
import { decodeLenient, decodeStrict, type DecodeResult } from './structured-output';
import {
  addTokenUsage,
  createEmptyTokenUsage,
  createTokenUsageFromResult,
  type PipelineStage,
  type TokenUsage,
} from './types';

// ============================================================================
// Types
// ============================================================================

export type GenerateTextFn = typeof import('ai').generateText;

/**
 * What every stage needs to talk to a model.
 */
export interface ModelCallDeps {
  readonly generateText: GenerateTextFn;
  readonly model: LanguageModel;
  readonly logger?: Logger;
  /** Backoff overrides (tests shorten the delays) */
  readonly retry?: Pick<RetryOptions, 'maxRetries' | 'initialDelayMs' | 'maxDelayMs'>;
}

export interface StructuredCallRequest<T> {
  readonly stage: PipelineStage;
  readonly system: string;
  readonly messages: readonly ModelMessage[];
  readonly schema: z.ZodType<T>;
  readonly temperature: number;
  readonly timeoutMs: number;
}

export type DecoderTier = 'strict' | 'lenient';

export interface StructuredCallResult<T> {
  readonly value: T;
  readonly tier: DecoderTier;
  readonly tokenUsage: TokenUsage;
}

// ============================================================================
// Error Classification
// ============================================================================

/**
 * Transport-level failures: the request never produced a usable response.
 * Anything else thrown around a structured call is an output problem.
 */
export function isTransportFailure(error: unknown): boolean {
  if (APICallError.isInstance(error)) return true;
  if (error instanceof DOMException && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return true;
  }
  return isRetryableError(error);
}

// ============================================================================
// Model Invocation
// ============================================================================

/**
 * Runs one model call with a fresh timeout per attempt and transport retries.
 *
 * @throws UpstreamModelError when the call fails for good
 */
export async function invokeModel<R>(
  stage: PipelineStage,
  context: string,
  call: (abortSignal: AbortSignal) => PromiseLike<R>,
  deps: Pick<ModelCallDeps, 'logger' | 'retry'>,
  timeoutMs: number
): Promise<R> {
  try {
    return await withRetry(() => Promise.resolve(call(AbortSignal.timeout(timeoutMs))), {
      ...deps.retry,
      context,
      logger: deps.logger,
    });
  } catch (error) {
    throw new UpstreamModelError(stage, errorMessage(error), { cause: error });
  }
}

// ============================================================================
// Structured Generation
// ============================================================================

/**
 * Asks the model for schema-conformant output, recovering from free-text
 * replies before giving up.
 *
 * @throws MalformedOutputError when neither decoder tier succeeds
 * @throws UpstreamModelError when the model call itself fails
 */
export async function generateStructured<T>(
  request: StructuredCallRequest<T>,
  deps: ModelCallDeps
): Promise<StructuredCallResult<T>> {
  const log = deps.logger ?? createPrefixedLogger(`[${request.stage}]`);
  const messages = [...request.messages];
  let tokenUsage = createEmptyTokenUsage();

  // Tier 1: schema-enforced call, strict decode
  let strict: DecodeResult<T>;
  try {
    const result = await withRetry(
      () =>
        deps.generateText({
          model: deps.model,
          system: request.system,
          messages,
          temperature: request.temperature,
          output: Output.object({ schema: request.schema }),
          maxRetries: 0,
          abortSignal: AbortSignal.timeout(request.timeoutMs),
        }),
      { ...deps.retry, context: `${request.stage} structured call`, logger: deps.logger }
    );
    tokenUsage = addTokenUsage(tokenUsage, createTokenUsageFromResult(result));
    strict = decodeStrict(request.schema, result.output);
  } catch (error) {
    if (isTransportFailure(error)) {
      throw new UpstreamModelError(request.stage, errorMessage(error), { cause: error });
    }
    strict = { ok: false, error: errorMessage(error) };
  }

  if (strict.ok) {
    return { value: strict.value, tier: 'strict', tokenUsage };
  }

  log.warn(`Structured output rejected (${strict.error}); retrying without schema enforcement`);

  // Tier 2: plain call, lenient decode
  const fallback = await invokeModel(
    request.stage,
    `${request.stage} free-text call`,
    (abortSignal) =>
      deps.generateText({
        model: deps.model,
        system: request.system,
        messages,
        temperature: request.temperature,
        maxRetries: 0,
        abortSignal,
      }),
    deps,
    request.timeoutMs
  );
  tokenUsage = addTokenUsage(tokenUsage, createTokenUsageFromResult(fallback));

  const rawText = typeof fallback.text === 'string' ? fallback.text : '';
  const lenient = decodeLenient(request.schema, rawText);
  if (lenient.ok) {
    log.info('Recovered structured output from free text');
    return { value: lenient.value, tier: 'lenient', tokenUsage };
  }

  log.error(`Structured output unrecoverable: ${lenient.error}`);
  throw new MalformedOutputError(request.stage, rawText, [
    `strict: ${strict.error}`,
    `lenient: ${lenient.error}`,
  ]);
}
