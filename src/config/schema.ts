/**
 * Reader Configuration Schema
 *
 * Shape of `config/interests.yaml`. Every object is strict (unknown keys are
 * rejected) and every section is optional, falling back to the defaults
 * below. Numeric bounds are checked independently of each other.
 */

import { z } from 'zod';

export const TONES = ['professional', 'witty', 'casual', 'academic'] as const;
export const FREQUENCIES = ['daily', 'weekly'] as const;
export const OUTPUT_FORMATS = ['markdown', 'pdf', 'html'] as const;

export const DEFAULT_MODEL_ID = 'openai/gpt-5-mini';

export const AT_LEAST_ONE_SOURCE_MESSAGE = 'At least one content source must be enabled';
export const AT_LEAST_ONE_INTEREST_MESSAGE = 'At least one interest must be specified';

/**
 * Trims interests and drops case-insensitive repeats, keeping the first
 * spelling and the original order. Blank entries are discarded.
 */
export function normalizeInterests(interests: readonly string[]): string[] {
  const seen = new Set<string>();
  const unique: string[] = [];
  for (const interest of interests) {
    const trimmed = interest.trim();
    const key = trimmed.toLowerCase();
    if (trimmed.length === 0 || seen.has(key)) continue;
    seen.add(key);
    unique.push(trimmed);
  }
  return unique;
}

// ============================================================================
// Sections
// ============================================================================

export const NewsletterSettingsSchema = z.strictObject({
  tone: z.enum(TONES).default('witty'),
  include_opinions: z.boolean().default(true),
  frequency: z.enum(FREQUENCIES).default('weekly'),
  max_stories: z.number().int().gt(0).lte(50).default(10),
});

export const RedditSettingsSchema = z.strictObject({
  min_upvotes: z.number().int().gte(0).default(100),
  max_age_hours: z.number().int().gt(0).default(48),
});

export const YouTubeSettingsSchema = z.strictObject({
  min_views: z.number().int().gte(0).default(10_000),
  max_duration_minutes: z.number().int().gt(0).default(60),
});

export const ContentSettingsSchema = z
  .strictObject({
    include_academic: z.boolean().default(true),
    include_reddit: z.boolean().default(true),
    include_youtube: z.boolean().default(true),
    include_news: z.boolean().default(true),
    reddit: RedditSettingsSchema.prefault({}),
    youtube: YouTubeSettingsSchema.prefault({}),
  })
  .refine(
    (content) =>
      content.include_academic ||
      content.include_reddit ||
      content.include_youtube ||
      content.include_news,
    { message: AT_LEAST_ONE_SOURCE_MESSAGE }
  );

export const OutputSettingsSchema = z.strictObject({
  format: z.enum(OUTPUT_FORMATS).default('markdown'),
  include_sources: z.boolean().default(true),
  include_summary_stats: z.boolean().default(true),
});

/** Model ids per stage, as understood by the configured provider */
export const ModelSettingsSchema = z.strictObject({
  planner: z.string().min(1).default(DEFAULT_MODEL_ID),
  scout: z.string().min(1).default(DEFAULT_MODEL_ID),
  evaluator: z.string().min(1).default(DEFAULT_MODEL_ID),
  writer: z.string().min(1).default(DEFAULT_MODEL_ID),
});

// ============================================================================
// Root
// ============================================================================

export const NewsletterConfigSchema = z.strictObject({
  interests: z
    .array(z.string())
    .min(1, AT_LEAST_ONE_INTEREST_MESSAGE)
    .transform(normalizeInterests)
    .refine((interests) => interests.length > 0, { message: AT_LEAST_ONE_INTEREST_MESSAGE }),
  user_profile: z.string().default(''),
  newsletter: NewsletterSettingsSchema.prefault({}),
  content: ContentSettingsSchema.prefault({}),
  output: OutputSettingsSchema.prefault({}),
  models: ModelSettingsSchema.prefault({}),
  max_tasks: z.number().int().gt(0).lte(10).default(1),
});

export type NewsletterConfigInput = z.input<typeof NewsletterConfigSchema>;
export type NewsletterConfig = z.output<typeof NewsletterConfigSchema>;
export type NewsletterSettings = NewsletterConfig['newsletter'];
export type ContentSettings = NewsletterConfig['content'];
export type OutputSettings = NewsletterConfig['output'];
export type ModelSettings = NewsletterConfig['models'];
export type Tone = (typeof TONES)[number];
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];
