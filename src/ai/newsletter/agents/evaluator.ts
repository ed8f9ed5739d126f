/**
 * Evaluator Agent
 *
 * Curates the scouts' stories and may commission one round of follow-up
 * research before the writer runs.
 *
 *   EVALUATE ──route──▶ terminate
 *      ▲          │
 *      │          └──▶ DISPATCH_SCOUTS ──▶ CLEAR_CYCLE ──┐
 *      └─────────────────────────────────────────────────┘
 *
 * With the default cap of one follow-up cycle there are at most two
 * evaluation passes. The curated set returned is the last pass's output.
 */

import type { ModelMessage } from 'ai';

import type { NewsletterConfig } from '../../../config/schema';
import { createPrefixedLogger } from '../../../utils/logger';
import { EVALUATOR_CONFIG } from '../config';
import { generateStructured, type ModelCallDeps } from '../llm-call';
import { formatCycleSummary, getEvaluatorSystemPrompt, getEvaluatorUserPrompt } from '../prompts';
import { StoryCollection } from '../story-collection';
import {
  EvaluatorOutputSchema,
  addTokenUsage,
  createEmptyTokenUsage,
  formatDate,
  systemClock,
  type Clock,
  type NewsStory,
  type ResearchTask,
  type TokenUsage,
} from '../types';
import type { ScoutResult } from './scout';

// ============================================================================
// Routing
// ============================================================================

export type EvaluationRoute =
  | { readonly kind: 'terminate' }
  | { readonly kind: 'dispatch'; readonly tasks: readonly ResearchTask[] };

/**
 * Dispatches follow-up scouts only while tasks are pending and the cycle
 * budget is not spent.
 */
export function routeEvaluation(
  investigatorTasks: readonly ResearchTask[],
  followupCycles: number,
  maxFollowupCycles: number = EVALUATOR_CONFIG.MAX_FOLLOWUP_CYCLES
): EvaluationRoute {
  if (investigatorTasks.length > 0 && followupCycles < maxFollowupCycles) {
    return { kind: 'dispatch', tasks: investigatorTasks };
  }
  return { kind: 'terminate' };
}

// ============================================================================
// Types
// ============================================================================

export type RunScoutTask = (task: ResearchTask) => Promise<ScoutResult>;

export interface EvaluatorDeps extends ModelCallDeps {
  /** Runs one follow-up scout; the orchestrator binds tools and model */
  readonly runScoutTask: RunScoutTask;
  readonly clock?: Clock;
  readonly temperature?: number;
  /** Default: EVALUATOR_CONFIG.MAX_FOLLOWUP_CYCLES */
  readonly maxFollowupCycles?: number;
}

export interface EvaluatorResult {
  /** Curated stories from the final pass */
  readonly stories: readonly NewsStory[];
  /** Canonical snapshot of everything collected, follow-ups included */
  readonly collectedStories: readonly NewsStory[];
  readonly explanation: string;
  readonly passes: number;
  readonly followupCycles: number;
  readonly followupTasks: readonly ResearchTask[];
  readonly followupResults: readonly ScoutResult[];
  readonly history: readonly ModelMessage[];
  readonly tokenUsage: TokenUsage;
}

// ============================================================================
// Main Evaluator Function
// ============================================================================

/**
 * @throws MalformedOutputError or UpstreamModelError from an evaluation pass
 */
export async function runEvaluator(
  initialStories: readonly NewsStory[],
  config: NewsletterConfig,
  deps: EvaluatorDeps
): Promise<EvaluatorResult> {
  const log = deps.logger ?? createPrefixedLogger('[Evaluator]');
  const maxFollowupCycles = deps.maxFollowupCycles ?? EVALUATOR_CONFIG.MAX_FOLLOWUP_CYCLES;
  const date = formatDate(deps.clock ?? systemClock);

  const collection = new StoryCollection(initialStories);
  const history: ModelMessage[] = [];
  const followupTasks: ResearchTask[] = [];
  const followupResults: ScoutResult[] = [];
  let followupCycles = 0;
  let passes = 0;
  let tokenUsage = createEmptyTokenUsage();

  for (;;) {
    // EVALUATE
    passes++;
    history.push({ role: 'user', content: getEvaluatorUserPrompt(collection.snapshot(), passes) });

    const evaluation = await generateStructured(
      {
        stage: 'evaluator',
        system: getEvaluatorSystemPrompt({
          date,
          userProfile: config.user_profile,
          interests: config.interests,
          maxStories: config.newsletter.max_stories,
          canCommissionFollowup: followupCycles < maxFollowupCycles,
        }),
        messages: history,
        schema: EvaluatorOutputSchema,
        temperature: deps.temperature ?? EVALUATOR_CONFIG.TEMPERATURE,
        timeoutMs: EVALUATOR_CONFIG.TIMEOUT_MS,
      },
      { ...deps, logger: log }
    );
    tokenUsage = addTokenUsage(tokenUsage, evaluation.tokenUsage);

    const output = evaluation.value;
    history.push({ role: 'assistant', content: JSON.stringify(output) });

    const curated = output.stories.slice(0, config.newsletter.max_stories);
    if (output.investigatorTasks.length > EVALUATOR_CONFIG.MAX_INVESTIGATOR_TASKS) {
      log.warn(
        `Evaluator requested ${output.investigatorTasks.length} follow-ups; ` +
          `keeping the first ${EVALUATOR_CONFIG.MAX_INVESTIGATOR_TASKS}`
      );
    }
    const investigatorTasks = output.investigatorTasks.slice(0, EVALUATOR_CONFIG.MAX_INVESTIGATOR_TASKS);
    log.info(`Pass ${passes}: curated ${curated.length} of ${collection.size} stories`);

    const route = routeEvaluation(investigatorTasks, followupCycles, maxFollowupCycles);
    switch (route.kind) {
      case 'terminate': {
        if (investigatorTasks.length > 0) {
          log.info(`Follow-up budget spent; ignoring ${investigatorTasks.length} task(s)`);
        }
        return {
          stories: curated,
          collectedStories: collection.snapshot(),
          explanation: output.explanation,
          passes,
          followupCycles,
          followupTasks,
          followupResults,
          history,
          tokenUsage,
        };
      }

      case 'dispatch': {
        // DISPATCH_SCOUTS
        log.info(`Dispatching ${route.tasks.length} follow-up scout(s)`);
        const results = await Promise.all(route.tasks.map((task) => deps.runScoutTask(task)));
        const appended = results.flatMap((result) => collection.addBatch(result.stories));
        followupTasks.push(...route.tasks);
        followupResults.push(...results);

        // CLEAR_CYCLE
        followupCycles++;
        history.push({
          role: 'user',
          content: formatCycleSummary({
            followupComplete: true,
            followupCycles,
            appendedCount: appended.length,
            appendedPreview: appended
              .slice(-EVALUATOR_CONFIG.CYCLE_PREVIEW_SIZE)
              .map(({ title, url }) => ({ title, url })),
            completedTasks: route.tasks,
          }),
        });
        log.info(`Follow-up cycle ${followupCycles} added ${appended.length} new stories`);
        break;
      }
    }
  }
}
