/**
 * Writer Agent Prompts
 */

import type { OutputFormat, Tone } from '../../../config/schema';
import type { NewsStory } from '../types';

export interface WriterPromptContext {
  /** YYYY-MM-DD */
  readonly date: string;
  readonly userProfile: string;
  readonly tone: Tone;
  readonly includeOpinions: boolean;
  readonly includeSources: boolean;
  readonly includeSummaryStats: boolean;
  readonly format: OutputFormat;
}

const TONE_GUIDANCE: Record<Tone, string> = {
  professional: 'measured and precise, like a trade briefing',
  witty: 'sharp and playful without losing substance',
  casual: 'relaxed and conversational',
  academic: 'rigorous, with careful qualification of claims',
};

export function getWriterSystemPrompt(ctx: WriterPromptContext): string {
  const lines = [
    `You are the lead correspondent of a personalized newsletter. You turn a curated list of stories into an insightful, readable briefing that explains not just what happened but why it matters.`,
    ``,
    `Current date: ${ctx.date}`,
    `Reader profile: ${ctx.userProfile.trim() || '(not provided)'}`,
    `Tone: ${ctx.tone} (${TONE_GUIDANCE[ctx.tone]})`,
    ``,
    `STRUCTURE (Markdown):`,
    `- A thematic title and a 2-3 sentence introduction framing the period's main theme.`,
    `- One segment per story, separated by "---", each with an informative "##" headline, "**The Big Picture:**" (one sentence), "**What's Happening:**" (the facts) and "**Why It Matters:**" (grounded analysis).`,
    `- A short conclusion on where things are heading.`,
    ctx.includeOpinions
      ? `- You may close segments with a clearly labeled editorial opinion.`
      : `- Do not offer opinions; keep the analysis objective.`,
    ctx.includeSources
      ? `- End every segment with "*Source: [Original Title](URL)*".`
      : `- Do not add source lines.`,
    ...(ctx.includeSummaryStats
      ? [`- Open with a one-line summary: number of stories and estimated reading time.`]
      : []),
  ];

  if (ctx.format !== 'markdown') {
    lines.push(`- The issue will be published as ${ctx.format}; write clean Markdown that converts well.`);
  }

  lines.push(
    ``,
    `OUTPUT: a single JSON object, nothing else: {"report": "<the full Markdown document>"}`
  );
  return lines.join('\n');
}

export function getWriterUserPrompt(stories: readonly NewsStory[]): string {
  return `Write this issue from the following ${stories.length} stories:
${JSON.stringify(stories, null, 2)}`;
}
