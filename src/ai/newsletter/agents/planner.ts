/**
 * Planner Agent
 *
 * Turns the reader's interests into research tasks, one scout each.
 */

import type { NewsletterConfig } from '../../../config/schema';
import { createPrefixedLogger } from '../../../utils/logger';
import { PLANNER_CONFIG } from '../config';
import { generateStructured, type ModelCallDeps } from '../llm-call';
import { getPlannerSystemPrompt, getPlannerUserPrompt } from '../prompts';
import {
  PlannerOutputSchema,
  formatDate,
  systemClock,
  type Clock,
  type ResearchTask,
  type TokenUsage,
} from '../types';

export interface PlannerDeps extends ModelCallDeps {
  readonly clock?: Clock;
  /** Optional temperature override (default: PLANNER_CONFIG.TEMPERATURE) */
  readonly temperature?: number;
}

export interface PlannerResult {
  readonly tasks: readonly ResearchTask[];
  readonly tokenUsage: TokenUsage;
}

/**
 * Runs the planner. Keeps the first `max_tasks` tasks the model returns.
 *
 * @throws MalformedOutputError or UpstreamModelError; planning failures are fatal
 */
export async function runPlanner(config: NewsletterConfig, deps: PlannerDeps): Promise<PlannerResult> {
  const log = deps.logger ?? createPrefixedLogger('[Planner]');

  const { value, tokenUsage } = await generateStructured(
    {
      stage: 'planner',
      system: getPlannerSystemPrompt(),
      messages: [
        {
          role: 'user',
          content: getPlannerUserPrompt({
            interests: config.interests,
            userProfile: config.user_profile,
            date: formatDate(deps.clock ?? systemClock),
            maxTasks: config.max_tasks,
          }),
        },
      ],
      schema: PlannerOutputSchema,
      temperature: deps.temperature ?? PLANNER_CONFIG.TEMPERATURE,
      timeoutMs: PLANNER_CONFIG.TIMEOUT_MS,
    },
    { ...deps, logger: log }
  );

  if (value.tasks.length > config.max_tasks) {
    log.warn(`Planner returned ${value.tasks.length} tasks; keeping the first ${config.max_tasks}`);
  }
  const tasks = value.tasks.slice(0, config.max_tasks);

  log.info(`Planned ${tasks.length} task(s): ${tasks.map((t) => t.topic).join(' | ')}`);
  return { tasks, tokenUsage };
}
