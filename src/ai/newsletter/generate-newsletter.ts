/**
 * Newsletter Generator
 *
 * Runs the full pipeline for one configuration:
 *
 *   planner ──▶ scouts (parallel) ──▶ evaluator ⇄ follow-up scouts ──▶ writer
 *
 * Every stage receives the same read-only configuration. Any stage failure
 * aborts the run; there is no partial report.
 */

import type { ModelSettings, NewsletterConfig } from '../../config/schema';
import { createPrefixedLogger, createStructuredLogger, type Logger } from '../../utils/logger';
import type { ModelResolver } from '../provider';
import type { AgentTool } from '../tools/agent-tool';
import { runEvaluator, runPlanner, runScout, runWriter, type ScoutDeps, type ScoutResult } from './agents';
import { NewsletterError } from './errors';
import type { GenerateTextFn, ModelCallDeps } from './llm-call';
import { PhaseTimer, type PhaseDurations } from './phase-timer';
import {
  addTokenUsage,
  createEmptyTokenUsage,
  systemClock,
  type Clock,
  type NewsStory,
  type PipelineStage,
  type ResearchTask,
  type TokenUsage,
} from './types';

// ============================================================================
// Dependencies & Options
// ============================================================================

/**
 * Dependencies for newsletter generation (tests pass mocks).
 */
export interface NewsletterGeneratorDeps {
  readonly generateText: GenerateTextFn;
  /** Maps the configured model id of each stage to a model */
  readonly resolveModel: ModelResolver;
  /** Search tools handed to every scout */
  readonly tools: readonly AgentTool[];
  readonly clock?: Clock;
  readonly logger?: Logger;
  readonly retry?: ModelCallDeps['retry'];
}

const TEMPERATURE_RANGE = { min: 0, max: 2 } as const;

export type TemperatureOverrides = Partial<Record<PipelineStage, number>>;

export type ProgressStatus = 'started' | 'completed';

export type NewsletterProgressCallback = (stage: PipelineStage, status: ProgressStatus) => void;

export interface NewsletterGeneratorOptions {
  readonly temperatures?: TemperatureOverrides;
  /** Tool rounds per scout before forced extraction */
  readonly maxToolIterations?: number;
  readonly maxFollowupCycles?: number;
  readonly onProgress?: NewsletterProgressCallback;
}

// ============================================================================
// Result
// ============================================================================

export interface NewsletterMetadata {
  /** ISO timestamp of completion */
  readonly generatedAt: string;
  readonly durations: PhaseDurations;
  readonly totalDurationMs: number;
  readonly models: ModelSettings;
  readonly taskCount: number;
  readonly evaluationPasses: number;
  readonly followupCycles: number;
  readonly toolCalls: number;
  readonly failedToolCalls: number;
  readonly tokenUsage: TokenUsage;
}

export interface NewsletterResult {
  readonly report: string;
  /** Curated stories the report was written from */
  readonly stories: readonly NewsStory[];
  /** Everything the scouts collected, follow-ups included */
  readonly collectedStories: readonly NewsStory[];
  /** Planner tasks followed by follow-up tasks */
  readonly tasks: readonly ResearchTask[];
  readonly metadata: NewsletterMetadata;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * @throws NewsletterError with 'CONFIG_ERROR' for a temperature outside [0, 2]
 */
function validateTemperatureOverrides(overrides?: TemperatureOverrides): void {
  if (!overrides) return;
  for (const [stage, temperature] of Object.entries(overrides)) {
    if (temperature === undefined) continue;
    if (
      Number.isNaN(temperature) ||
      temperature < TEMPERATURE_RANGE.min ||
      temperature > TEMPERATURE_RANGE.max
    ) {
      throw new NewsletterError(
        'CONFIG_ERROR',
        `Invalid temperature for ${stage}: ${temperature} (must be between ${TEMPERATURE_RANGE.min} and ${TEMPERATURE_RANGE.max})`
      );
    }
  }
}

function sumScoutUsage(results: readonly ScoutResult[]): TokenUsage {
  return results.reduce((total, r) => addTokenUsage(total, r.tokenUsage), createEmptyTokenUsage());
}

// ============================================================================
// Main Function
// ============================================================================

/**
 * Generates one newsletter issue.
 *
 * @example
 * const result = await generateNewsletter(config, {
 *   generateText,
 *   resolveModel: createModelResolver(env),
 *   tools: createSearchTools({ content: config.content, env }),
 * });
 * console.log(result.report);
 *
 * @throws NewsletterError (MalformedOutputError, UpstreamModelError, ...) from any stage
 */
export async function generateNewsletter(
  config: NewsletterConfig,
  deps: NewsletterGeneratorDeps,
  options: NewsletterGeneratorOptions = {}
): Promise<NewsletterResult> {
  validateTemperatureOverrides(options.temperatures);

  const log = deps.logger ?? createPrefixedLogger('[Newsletter]');
  const events = createStructuredLogger('[Newsletter]');
  const clock = deps.clock ?? systemClock;
  const timer = new PhaseTimer(clock);
  const temperatures = options.temperatures ?? {};

  const runStage = async <T>(stage: PipelineStage, fn: () => Promise<T>): Promise<T> => {
    options.onProgress?.(stage, 'started');
    const result = await timer.measure(stage, fn);
    options.onProgress?.(stage, 'completed');
    events.structured('debug', { event: 'stage_complete', stage, durationMs: timer.getDuration(stage) });
    return result;
  };

  const scoutDeps: ScoutDeps = {
    generateText: deps.generateText,
    model: deps.resolveModel(config.models.scout),
    tools: deps.tools,
    clock,
    retry: deps.retry,
    temperature: temperatures.scout,
    maxIterations: options.maxToolIterations,
  };

  log.info(`Generating newsletter for ${config.interests.length} interest(s)`);

  // ===== Planner =====
  const planner = await runStage('planner', () =>
    runPlanner(config, {
      generateText: deps.generateText,
      model: deps.resolveModel(config.models.planner),
      clock,
      retry: deps.retry,
      temperature: temperatures.planner,
    })
  );
  if (planner.tasks.length === 0) {
    log.warn('Planner returned no tasks; the evaluator will start empty');
  }

  // ===== Scouts (fan-out) =====
  const scoutResults = await runStage('scout', () =>
    Promise.all(planner.tasks.map((task) => runScout(task, scoutDeps)))
  );
  const initialStories = scoutResults.flatMap((result) => result.stories);
  log.info(`Scouts returned ${initialStories.length} stories from ${scoutResults.length} task(s)`);

  // ===== Evaluator (fan-in, optional follow-up) =====
  const evaluation = await runStage('evaluator', () =>
    runEvaluator(initialStories, config, {
      generateText: deps.generateText,
      model: deps.resolveModel(config.models.evaluator),
      clock,
      retry: deps.retry,
      temperature: temperatures.evaluator,
      maxFollowupCycles: options.maxFollowupCycles,
      runScoutTask: (task) => runScout(task, scoutDeps),
    })
  );

  // ===== Writer =====
  const writer = await runStage('writer', () =>
    runWriter(evaluation.stories, config, {
      generateText: deps.generateText,
      model: deps.resolveModel(config.models.writer),
      clock,
      retry: deps.retry,
      temperature: temperatures.writer,
    })
  );

  const allScoutResults = [...scoutResults, ...evaluation.followupResults];
  const transcript = allScoutResults.flatMap((result) => result.transcript);
  const tokenUsage = [
    planner.tokenUsage,
    sumScoutUsage(allScoutResults),
    evaluation.tokenUsage,
    writer.tokenUsage,
  ].reduce(addTokenUsage, createEmptyTokenUsage());

  const metadata: NewsletterMetadata = {
    generatedAt: new Date(clock.now()).toISOString(),
    durations: timer.getDurations(),
    totalDurationMs: timer.getTotalDuration(),
    models: config.models,
    taskCount: planner.tasks.length,
    evaluationPasses: evaluation.passes,
    followupCycles: evaluation.followupCycles,
    toolCalls: transcript.length,
    failedToolCalls: transcript.filter((entry) => entry.status === 'error').length,
    tokenUsage,
  };

  events.structured('info', {
    event: 'newsletter_complete',
    message: `${writer.stories.length} stories, ${metadata.toolCalls} tool calls`,
    followupCycles: metadata.followupCycles,
    evaluationPasses: metadata.evaluationPasses,
    durationMs: metadata.totalDurationMs,
    tokens: metadata.tokenUsage,
  });

  return {
    report: writer.report,
    stories: writer.stories,
    collectedStories: evaluation.collectedStories,
    tasks: [...planner.tasks, ...evaluation.followupTasks],
    metadata,
  };
}
