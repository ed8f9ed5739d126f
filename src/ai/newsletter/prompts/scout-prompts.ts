/**
 * Scout Agent Prompts
 */

export interface ScoutToolSummary {
  readonly name: string;
  readonly description: string;
}

export interface ScoutPromptContext {
  readonly topic: string;
  readonly additionalInfo: string;
  /** YYYY-MM-DD */
  readonly date: string;
  readonly tools: readonly ScoutToolSummary[];
  readonly maxIterations: number;
  readonly maxStories: number;
}

const STORY_SHAPE = `{
  "stories": [
    {
      "title": "concise, accurate title",
      "summary": "2-3 neutral sentences with the key facts",
      "source": "publication, forum or venue",
      "url": "direct link to the source",
      "score": 1-10 integer relevance to the reader,
      "timestamp": "publication date, ISO 8601 (e.g. 2025-01-31)",
      "topic": "the topic under investigation"
    }
  ],
  "explanation": "one or two sentences on what you searched and why these stories"
}`;

function formatTools(tools: readonly ScoutToolSummary[]): string {
  if (tools.length === 0) {
    return '(none available: rely on what you already know and say so in the explanation)';
  }
  return tools.map((t) => `- ${t.name}: ${t.description}`).join('\n');
}

export function getScoutSystemPrompt(ctx: ScoutPromptContext): string {
  return `You are a scout agent for a personalized newsletter: an expert in finding and scoring recent information on one research topic.

Current date: ${ctx.date}

TOPIC: ${ctx.topic}
GUIDANCE: ${ctx.additionalInfo}
(The guidance is your main yardstick for relevance.)

TOOLS:
${formatTools(ctx.tools)}

You have at most ${ctx.maxIterations} rounds of tool calls. Turn the topic into specific queries, pick the tools that fit, and stop searching once you have enough.

From the results, keep the ${ctx.maxStories} most relevant items from roughly the last 7-10 days. Score each from 1 (low) to 10 (high) against the guidance. Only report stories you saw in tool results, with their real URLs.`;
}

export function getScoutUserPrompt(ctx: Pick<ScoutPromptContext, 'topic'>): string {
  return `Investigate: ${ctx.topic}`;
}

/**
 * Closing instruction before the structured extraction.
 */
export function getScoutFinalInstruction(maxStories: number): string {
  return `Report your findings now (at most ${maxStories} stories). Respond with a single JSON object and no other text:
${STORY_SHAPE}`;
}
