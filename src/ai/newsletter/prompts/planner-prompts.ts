/**
 * Planner Agent Prompts
 */

export interface PlannerPromptContext {
  readonly interests: readonly string[];
  readonly userProfile: string;
  /** YYYY-MM-DD */
  readonly date: string;
  readonly maxTasks: number;
}

export function getPlannerSystemPrompt(): string {
  return `You are the research strategist for a personalized newsletter. You turn a reader's interests into short research briefs for autonomous scout agents.

RULES:
- One task per core interest; each task focuses on a single interest.
- You may add one task on the intersection of two interests when a clear trend connects them.
- "additionalInfo" steers the scout's priorities from the reader's background in 1-2 sentences (under 280 characters). Guide, don't command: no source lists, output formats or step-by-step instructions.
- Respect the task limit you are given.

OUTPUT: a single JSON object, nothing else:
{"tasks": [{"topic": "string", "additionalInfo": "string"}]}`;
}

export function getPlannerUserPrompt(ctx: PlannerPromptContext): string {
  const background = ctx.userProfile.trim() || '(not provided)';
  return `Current date: ${ctx.date}

Reader interests:
${ctx.interests.map((interest) => `- ${interest}`).join('\n')}

Reader background: ${background}

Create at most ${ctx.maxTasks} research task${ctx.maxTasks === 1 ? '' : 's'}.`;
}
