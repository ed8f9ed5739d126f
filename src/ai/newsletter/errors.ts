/**
 * Newsletter Pipeline Errors
 *
 * Every failure the pipeline raises on purpose is a `NewsletterError` with a
 * code, so callers can switch on `error.code` instead of matching messages.
 *
 * @example
 * try {
 *   await generateNewsletter(config, deps);
 * } catch (error) {
 *   if (isNewsletterError(error)) {
 *     switch (error.code) {
 *       case 'MALFORMED_OUTPUT':
 *         // A stage returned output no decoder could recover
 *         break;
 *       case 'UPSTREAM_MODEL':
 *         // Transport or auth failure after retries
 *         break;
 *     }
 *   }
 * }
 */

import type { PipelineStage } from './types';

export type NewsletterErrorCode =
  | 'CONFIG_ERROR'
  | 'INVALID_TASK'
  | 'TOOL_FAILED'
  | 'MALFORMED_OUTPUT'
  | 'UPSTREAM_MODEL';

export class NewsletterError extends Error {
  readonly name: string = 'NewsletterError';

  constructor(
    readonly code: NewsletterErrorCode,
    message: string,
    options?: { readonly cause?: unknown }
  ) {
    super(message, options);
    // Maintains proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

export function isNewsletterError(error: unknown): error is NewsletterError {
  return error instanceof NewsletterError;
}

// ============================================================================
// Configuration
// ============================================================================

export type ConfigurationErrorReason =
  | 'not_found'
  | 'malformed_yaml'
  | 'empty'
  | 'invalid'
  | 'missing_credentials';

/**
 * Configuration file missing, unparsable or failing schema validation, or a
 * required credential absent. Always fatal at startup.
 */
export class ConfigurationError extends NewsletterError {
  readonly name: string = 'ConfigurationError';

  constructor(
    readonly reason: ConfigurationErrorReason,
    message: string,
    readonly issues: readonly string[] = [],
    options?: { readonly cause?: unknown }
  ) {
    super('CONFIG_ERROR', message, options);
  }
}

// ============================================================================
// Tools
// ============================================================================

/**
 * A search tool call failed. Contained inside the tool loop: the agent sees
 * the message as the tool result and may try again.
 */
export class ToolExecutionError extends NewsletterError {
  readonly name: string = 'ToolExecutionError';

  constructor(
    readonly toolName: string,
    message: string,
    readonly status?: number,
    options?: { readonly cause?: unknown }
  ) {
    super('TOOL_FAILED', message, options);
  }
}

// ============================================================================
// Model Output
// ============================================================================

/**
 * Structured output could not be recovered by either decoder tier.
 */
export class MalformedOutputError extends NewsletterError {
  readonly name: string = 'MalformedOutputError';

  constructor(
    readonly stage: PipelineStage,
    readonly rawText: string,
    readonly diagnostics: readonly string[]
  ) {
    super(
      'MALFORMED_OUTPUT',
      `${stage} returned malformed structured output: ${diagnostics.join('; ')}`
    );
  }
}

/**
 * The model call itself failed (transport, auth, timeout) after retries.
 */
export class UpstreamModelError extends NewsletterError {
  readonly name: string = 'UpstreamModelError';

  constructor(
    readonly stage: PipelineStage,
    message: string,
    options?: { readonly cause?: unknown }
  ) {
    super('UPSTREAM_MODEL', `${stage} model call failed: ${message}`, options);
  }
}

/**
 * Extracts a message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
