/**
 * Newsletter Pipeline Types
 *
 * Value records passed between stages, the structured-output schemas each
 * stage asks the model for, and small shared helpers (token usage, clock).
 */

import { z } from 'zod';

import { STORY_CONSTRAINTS } from './config';

// ============================================================================
// Stage Constants
// ============================================================================

export const PIPELINE_STAGES = ['planner', 'scout', 'evaluator', 'writer'] as const;

export type PipelineStage = (typeof PIPELINE_STAGES)[number];

// ============================================================================
// Research Task
// ============================================================================

export const ResearchTaskSchema = z.object({
  topic: z.string().min(1).describe('The topic to investigate'),
  additionalInfo: z
    .string()
    .min(1)
    .describe('Short guidance about the reader that should steer the research, not a command'),
});

export type ResearchTask = z.infer<typeof ResearchTaskSchema>;

// ============================================================================
// News Story
// ============================================================================

const StoryScoreSchema = z
  .number()
  .int()
  .min(STORY_CONSTRAINTS.MIN_SCORE)
  .max(STORY_CONSTRAINTS.MAX_SCORE)
  .describe('Relevance to the reader, 1 (low) to 10 (high)');

/** Calendar date (2025-01-31) or full date-time, optionally with offset */
const StoryTimestampSchema = z
  .union([z.iso.date(), z.iso.datetime({ offset: true, local: true })])
  .describe('ISO-8601 publication date, e.g. 2025-01-31 or 2025-01-31T09:30:00Z');

export const NewsStorySchema = z.object({
  title: z.string().min(1),
  summary: z.string(),
  source: z.string().describe('Publication, forum or venue'),
  url: z.string(),
  score: StoryScoreSchema,
  timestamp: StoryTimestampSchema,
  topic: z.string(),
});

export type NewsStory = z.infer<typeof NewsStorySchema>;

/**
 * A story is citable when the reader can follow it back to its origin.
 */
export function isCitable(story: NewsStory): boolean {
  return story.url.trim().length > 0 && story.source.trim().length > 0;
}

// ============================================================================
// Stage Output Schemas
// ============================================================================

export const PlannerOutputSchema = z.object({
  tasks: z.array(ResearchTaskSchema),
});

export type PlannerOutput = z.infer<typeof PlannerOutputSchema>;

/** Scouts may omit the topic; the stage fills it from the task. */
export const ScoutStorySchema = NewsStorySchema.extend({
  topic: z.string().optional(),
});

export const ScoutOutputSchema = z.object({
  stories: z.array(ScoutStorySchema),
  explanation: z.string(),
});

export type ScoutModelOutput = z.infer<typeof ScoutOutputSchema>;

export const EvaluatorOutputSchema = z.object({
  stories: z.array(NewsStorySchema),
  investigatorTasks: z.array(ResearchTaskSchema),
  explanation: z.string(),
});

export type EvaluatorModelOutput = z.infer<typeof EvaluatorOutputSchema>;

export const WriterOutputSchema = z.object({
  report: z.string().trim().min(1),
});

export type WriterModelOutput = z.infer<typeof WriterOutputSchema>;

// ============================================================================
// Token Usage
// ============================================================================

export interface TokenUsage {
  readonly input: number;
  readonly output: number;
}

export function createEmptyTokenUsage(): TokenUsage {
  return { input: 0, output: 0 };
}

export function addTokenUsage(a: TokenUsage, b: TokenUsage): TokenUsage {
  return { input: a.input + b.input, output: a.output + b.output };
}

/**
 * Reads token counts from an AI SDK result; mocks may omit usage entirely.
 */
export function createTokenUsageFromResult(result: {
  readonly usage?: { readonly inputTokens?: number; readonly outputTokens?: number };
}): TokenUsage {
  return {
    input: result.usage?.inputTokens ?? 0,
    output: result.usage?.outputTokens ?? 0,
  };
}

// ============================================================================
// Clock Abstraction (for testability)
// ============================================================================

export interface Clock {
  /** Current time in milliseconds since the epoch */
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

/**
 * Creates a deterministic clock for tests.
 *
 * @example
 * // Auto-advancing time (100ms per call)
 * const clock = createMockClock(1000000, 100);
 * clock.now(); // 1000000
 * clock.now(); // 1000100
 */
export function createMockClock(initialTime: number, autoAdvance?: number): Clock {
  let currentTime = initialTime;
  return {
    now: () => {
      const time = currentTime;
      if (autoAdvance !== undefined) {
        currentTime += autoAdvance;
      }
      return time;
    },
  };
}

/**
 * Formats a clock reading as a calendar date (YYYY-MM-DD, UTC).
 */
export function formatDate(clock: Clock): string {
  return new Date(clock.now()).toISOString().slice(0, 10);
}
