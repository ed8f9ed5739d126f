/**
 * Evaluator Agent Prompts
 */

import type { NewsStory, ResearchTask } from '../types';

export interface EvaluatorPromptContext {
  /** YYYY-MM-DD */
  readonly date: string;
  readonly userProfile: string;
  readonly interests: readonly string[];
  readonly maxStories: number;
  /** Whether another follow-up round may still be commissioned */
  readonly canCommissionFollowup: boolean;
}

export function getEvaluatorSystemPrompt(ctx: EvaluatorPromptContext): string {
  const followupRule = ctx.canCommissionFollowup
    ? `If one of the most important stories is promising but thin (vague summary, unverified claim, missing context), add exactly one focused investigator task: a specific question, not a broad topic. Otherwise leave "investigatorTasks" empty.`
    : `The follow-up budget is spent: "investigatorTasks" must be empty.`;

  return `You are the chief editor of a personalized newsletter. You review everything the scouts found and decide whether it is enough for an excellent issue.

Current date: ${ctx.date}
Reader profile: ${ctx.userProfile.trim() || '(not provided)'}
Interests: ${ctx.interests.join(', ')}

STEPS:
1. Consolidate: merge stories covering the same event, keeping the best title and summary and the highest score.
2. Curate: drop superficial, irrelevant or low-quality stories. Keep at most ${ctx.maxStories}.
3. Decide: ${followupRule}
4. Explain your decision briefly.

Copy url, source and timestamp of kept stories exactly as given.

OUTPUT: a single JSON object, nothing else:
{"stories": [NewsStory...], "investigatorTasks": [{"topic": "string", "additionalInfo": "string"}], "explanation": "string"}`;
}

export function getEvaluatorUserPrompt(stories: readonly NewsStory[], pass: number): string {
  return `Evaluation pass ${pass}. Collected stories (${stories.length}):
${JSON.stringify(stories, null, 2)}`;
}

export interface CycleSummary {
  readonly followupComplete: true;
  readonly followupCycles: number;
  readonly appendedCount: number;
  readonly appendedPreview: readonly Pick<NewsStory, 'title' | 'url'>[];
  readonly completedTasks: readonly ResearchTask[];
}

/**
 * History entry recorded after a follow-up round, read by the next pass.
 */
export function formatCycleSummary(summary: CycleSummary): string {
  return `Follow-up research finished:
${JSON.stringify(summary, null, 2)}`;
}
