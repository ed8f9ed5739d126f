/**
 * Scout Agent
 *
 * Investigates one research task through the tool loop and reports scored
 * stories. Scouts run concurrently; each owns its conversation and tool
 * budget and shares nothing mutable with its siblings.
 */

import type { AgentTool } from '../../tools/agent-tool';
import { createPrefixedLogger } from '../../../utils/logger';
import { SCOUT_CONFIG } from '../config';
import { NewsletterError } from '../errors';
import type { ModelCallDeps } from '../llm-call';
import { getScoutFinalInstruction, getScoutSystemPrompt, getScoutUserPrompt } from '../prompts';
import { runToolLoop, type ToolTranscriptEntry } from '../tool-loop';
import {
  ScoutOutputSchema,
  formatDate,
  systemClock,
  type Clock,
  type NewsStory,
  type ResearchTask,
  type TokenUsage,
} from '../types';

export interface ScoutDeps extends ModelCallDeps {
  readonly tools: readonly AgentTool[];
  readonly clock?: Clock;
  readonly temperature?: number;
  /** Tool rounds before forced extraction (default: SCOUT_CONFIG.MAX_TOOL_ITERATIONS) */
  readonly maxIterations?: number;
  readonly toolTimeoutMs?: number;
}

export interface ScoutResult {
  readonly task: ResearchTask;
  readonly stories: readonly NewsStory[];
  readonly explanation: string;
  readonly transcript: readonly ToolTranscriptEntry[];
  readonly agentCalls: number;
  readonly tokenUsage: TokenUsage;
}

/**
 * @throws NewsletterError `INVALID_TASK` when topic or guidance is blank
 */
export function validateResearchTask(task: ResearchTask): void {
  if (task.topic.trim().length === 0) {
    throw new NewsletterError('INVALID_TASK', 'Research task has an empty topic');
  }
  if (task.additionalInfo.trim().length === 0) {
    throw new NewsletterError('INVALID_TASK', `Research task "${task.topic}" has no guidance`);
  }
}

function truncateTopic(topic: string): string {
  return topic.length > 40 ? `${topic.slice(0, 37)}...` : topic;
}

export async function runScout(task: ResearchTask, deps: ScoutDeps): Promise<ScoutResult> {
  validateResearchTask(task);

  const log = deps.logger ?? createPrefixedLogger(`[Scout:${truncateTopic(task.topic)}]`);
  const maxIterations = deps.maxIterations ?? SCOUT_CONFIG.MAX_TOOL_ITERATIONS;
  const promptContext = {
    topic: task.topic,
    additionalInfo: task.additionalInfo,
    date: formatDate(deps.clock ?? systemClock),
    tools: deps.tools.map(({ name, description }) => ({ name, description })),
    maxIterations,
    maxStories: SCOUT_CONFIG.MAX_STORIES,
  };

  log.info(`Investigating with ${deps.tools.length} tool(s)`);

  const result = await runToolLoop(
    {
      stage: 'scout',
      system: getScoutSystemPrompt(promptContext),
      prompt: getScoutUserPrompt(promptContext),
      finalInstruction: getScoutFinalInstruction(SCOUT_CONFIG.MAX_STORIES),
      tools: deps.tools,
      schema: ScoutOutputSchema,
      temperature: deps.temperature ?? SCOUT_CONFIG.TEMPERATURE,
      timeoutMs: SCOUT_CONFIG.TIMEOUT_MS,
      toolTimeoutMs: deps.toolTimeoutMs ?? SCOUT_CONFIG.TOOL_TIMEOUT_MS,
      maxIterations,
    },
    { ...deps, logger: log }
  );

  const reported = result.output.stories;
  if (reported.length > SCOUT_CONFIG.MAX_STORIES) {
    log.debug(`Scout reported ${reported.length} stories; keeping ${SCOUT_CONFIG.MAX_STORIES}`);
  }
  const stories = reported
    .slice(0, SCOUT_CONFIG.MAX_STORIES)
    .map((story): NewsStory => ({ ...story, topic: task.topic }));

  const failedCalls = result.transcript.filter((entry) => entry.status === 'error').length;
  log.info(
    `Found ${stories.length} stories (${result.transcript.length} tool calls, ${failedCalls} failed, ` +
      `${result.agentCalls} agent steps)`
  );

  return {
    task,
    stories,
    explanation: result.output.explanation,
    transcript: result.transcript,
    agentCalls: result.agentCalls,
    tokenUsage: result.tokenUsage,
  };
}
