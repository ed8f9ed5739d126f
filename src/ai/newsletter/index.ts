/**
 * Newsletter Pipeline
 *
 * @example
 * import { generateNewsletter, saveReport } from './ai/newsletter';
 *
 * const result = await generateNewsletter(config, deps);
 * const file = await saveReport(result.report);
 */

export * from './generate-newsletter';
export * from './report-store';
export * from './errors';
export * from './types';
export * from './story-collection';
export * from './tool-loop';
export * from './llm-call';
export * from './structured-output';
export * from './phase-timer';
export * from './agents';
export {
  PLANNER_CONFIG,
  SCOUT_CONFIG,
  EVALUATOR_CONFIG,
  WRITER_CONFIG,
  RETRY_CONFIG,
  REPORT_CONFIG,
  STORY_CONSTRAINTS,
} from './config';
export { withRetry, isRetryableError, type RetryOptions } from './retry';
