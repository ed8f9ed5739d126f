/**
 * Writer Agent
 *
 * Produces the final Markdown report from the curated stories.
 */

import type { NewsletterConfig } from '../../../config/schema';
import { createPrefixedLogger } from '../../../utils/logger';
import { WRITER_CONFIG } from '../config';
import { generateStructured, type ModelCallDeps } from '../llm-call';
import { getWriterSystemPrompt, getWriterUserPrompt } from '../prompts';
import {
  WriterOutputSchema,
  formatDate,
  isCitable,
  systemClock,
  type Clock,
  type NewsStory,
  type TokenUsage,
} from '../types';

export interface WriterDeps extends ModelCallDeps {
  readonly clock?: Clock;
  readonly temperature?: number;
}

export interface WriterResult {
  readonly report: string;
  /** Stories actually handed to the model */
  readonly stories: readonly NewsStory[];
  readonly tokenUsage: TokenUsage;
}

/**
 * Stories without a url or source cannot be cited and are left out.
 */
export function selectCitableStories(
  stories: readonly NewsStory[],
  warn: (message: string) => void
): NewsStory[] {
  const citable = stories.filter(isCitable);
  const dropped = stories.length - citable.length;
  if (dropped > 0) {
    warn(`Dropping ${dropped} story(ies) without url or source`);
  }
  return citable;
}

/**
 * @throws MalformedOutputError or UpstreamModelError; writer failures are fatal
 */
export async function runWriter(
  stories: readonly NewsStory[],
  config: NewsletterConfig,
  deps: WriterDeps
): Promise<WriterResult> {
  const log = deps.logger ?? createPrefixedLogger('[Writer]');
  const citable = selectCitableStories(stories, log.warn);

  log.info(`Writing ${config.newsletter.tone} ${config.output.format} report from ${citable.length} stories`);

  const { value, tokenUsage } = await generateStructured(
    {
      stage: 'writer',
      system: getWriterSystemPrompt({
        date: formatDate(deps.clock ?? systemClock),
        userProfile: config.user_profile,
        tone: config.newsletter.tone,
        includeOpinions: config.newsletter.include_opinions,
        includeSources: config.output.include_sources,
        includeSummaryStats: config.output.include_summary_stats,
        format: config.output.format,
      }),
      messages: [{ role: 'user', content: getWriterUserPrompt(citable) }],
      schema: WriterOutputSchema,
      temperature: deps.temperature ?? WRITER_CONFIG.TEMPERATURE,
      timeoutMs: WRITER_CONFIG.TIMEOUT_MS,
    },
    { ...deps, logger: log }
  );

  return { report: value.report, stories: citable, tokenUsage };
}
