/**
 * Tool Loop
 *
 * Bounded reason-act loop shared by every tool-using agent. The agent
 * alternates between model calls (which may request tools) and tool
 * execution until it stops asking for tools or the iteration budget runs
 * out; a final structured extraction then turns the conversation into the
 * stage's output.
 *
 *   AGENT ──tool calls──▶ TOOLS ──▶ COUNT ──under cap──▶ AGENT
 *     │                              │
 *     └──no tool calls──▶ FINAL ◀──cap reached
 *
 * With a cap of N the loop makes at most N agent calls plus one final
 * extraction, so never more than N+1 model calls. Tool failures never
 * escape: they are recorded in the transcript and handed back to the
 * model as error results.
 */

import type { ModelMessage, ToolResultPart } from 'ai';
import type { z } from 'zod';

import { createPrefixedLogger, type Logger } from '../../utils/logger';
import { toToolSet, type AgentTool } from '../tools/agent-tool';
import { SCOUT_CONFIG } from './config';
import { ToolExecutionError, errorMessage } from './errors';
import {
  generateStructured,
  invokeModel,
  type DecoderTier,
  type ModelCallDeps,
} from './llm-call';
import {
  addTokenUsage,
  createEmptyTokenUsage,
  createTokenUsageFromResult,
  type PipelineStage,
  type TokenUsage,
} from './types';

// ============================================================================
// Types
// ============================================================================

export type ToolLoopState = 'agent' | 'tools' | 'count' | 'final';

interface PendingToolCall {
  readonly toolCallId: string;
  readonly toolName: string;
  readonly input: unknown;
  /** Set when the SDK already rejected the call (unknown tool, bad input) */
  readonly rejection?: string;
}

/**
 * One executed (or rejected) tool call.
 */
export type ToolTranscriptEntry = {
  readonly iteration: number;
  readonly toolCallId: string;
  readonly toolName: string;
  readonly input: unknown;
} & (
  | { readonly status: 'ok'; readonly output: string }
  | { readonly status: 'error'; readonly error: string }
);

export interface ToolLoopRequest<T> {
  readonly stage: PipelineStage;
  readonly system: string;
  /** Opening user message */
  readonly prompt: string;
  /** Appended before the final extraction so free-text replies still carry JSON */
  readonly finalInstruction: string;
  readonly tools: readonly AgentTool[];
  readonly schema: z.ZodType<T>;
  readonly temperature: number;
  /** Model call timeout */
  readonly timeoutMs: number;
  readonly toolTimeoutMs?: number;
  readonly maxIterations?: number;
}

export interface ToolLoopResult<T> {
  readonly output: T;
  readonly transcript: readonly ToolTranscriptEntry[];
  /** Agent (reasoning) calls made, excluding the final extraction */
  readonly agentCalls: number;
  /** Completed tool rounds */
  readonly iterations: number;
  readonly tier: DecoderTier;
  readonly tokenUsage: TokenUsage;
}

// ============================================================================
// Tool Execution
// ============================================================================

async function invokeWithTimeout(
  agentTool: AgentTool,
  input: unknown,
  timeoutMs: number
): Promise<string> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new ToolExecutionError(agentTool.name, `Tool timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([agentTool.invoke(input, controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

async function executeToolCall(
  call: PendingToolCall,
  iteration: number,
  tools: ReadonlyMap<string, AgentTool>,
  timeoutMs: number,
  log: Logger
): Promise<ToolTranscriptEntry> {
  const base = {
    iteration,
    toolCallId: call.toolCallId,
    toolName: call.toolName,
    input: call.input,
  };

  if (call.rejection !== undefined) {
    log.warn(`${call.toolName} call rejected: ${call.rejection}`);
    return { ...base, status: 'error', error: call.rejection };
  }

  const agentTool = tools.get(call.toolName);
  if (!agentTool) {
    log.warn(`Model requested unknown tool "${call.toolName}"`);
    return { ...base, status: 'error', error: `Unknown tool: ${call.toolName}` };
  }

  try {
    const output = await invokeWithTimeout(agentTool, call.input, timeoutMs);
    log.debug(`${call.toolName} → ${output.slice(0, SCOUT_CONFIG.TOOL_OUTPUT_LOG_CHARS)}`);
    return { ...base, status: 'ok', output };
  } catch (error) {
    log.warn(`${call.toolName} failed: ${errorMessage(error)}`);
    return { ...base, status: 'error', error: errorMessage(error) };
  }
}

/**
 * Tool call ids the SDK already answered inside the step's response messages.
 */
function answeredToolCallIds(messages: readonly ModelMessage[]): Set<string> {
  const ids = new Set<string>();
  for (const message of messages) {
    if (message.role !== 'tool') continue;
    for (const part of message.content) {
      if (part.type === 'tool-result') ids.add(part.toolCallId);
    }
  }
  return ids;
}

function toToolResultPart(entry: ToolTranscriptEntry): ToolResultPart {
  return {
    type: 'tool-result',
    toolCallId: entry.toolCallId,
    toolName: entry.toolName,
    output:
      entry.status === 'ok'
        ? { type: 'text', value: entry.output }
        : { type: 'error-text', value: entry.error },
  };
}

// ============================================================================
// Loop
// ============================================================================

/**
 * Runs the loop to completion.
 *
 * @throws MalformedOutputError when the final extraction cannot be decoded
 * @throws UpstreamModelError when a model call fails after retries
 */
export async function runToolLoop<T>(
  request: ToolLoopRequest<T>,
  deps: ModelCallDeps
): Promise<ToolLoopResult<T>> {
  const log = deps.logger ?? createPrefixedLogger(`[${request.stage}]`);
  const maxIterations = request.maxIterations ?? SCOUT_CONFIG.MAX_TOOL_ITERATIONS;
  const toolTimeoutMs = request.toolTimeoutMs ?? SCOUT_CONFIG.TOOL_TIMEOUT_MS;
  const toolSet = toToolSet(request.tools);
  const toolsByName = new Map(request.tools.map((t) => [t.name, t]));

  const messages: ModelMessage[] = [{ role: 'user', content: request.prompt }];
  const transcript: ToolTranscriptEntry[] = [];
  let pending: PendingToolCall[] = [];
  let answered = new Set<string>();
  let state: ToolLoopState = 'agent';
  let agentCalls = 0;
  let iterations = 0;
  let tokenUsage = createEmptyTokenUsage();

  while (state !== 'final') {
    switch (state) {
      case 'agent': {
        const result = await invokeModel(
          request.stage,
          `${request.stage} agent step`,
          (abortSignal) =>
            deps.generateText({
              model: deps.model,
              system: request.system,
              messages: [...messages],
              tools: toolSet,
              temperature: request.temperature,
              providerOptions: { openai: { parallelToolCalls: false } },
              maxRetries: 0,
              abortSignal,
            }),
          deps,
          request.timeoutMs
        );
        agentCalls++;
        tokenUsage = addTokenUsage(tokenUsage, createTokenUsageFromResult(result));
        messages.push(...result.response.messages);
        answered = answeredToolCallIds(result.response.messages);

        // Rejected calls still count as requested: the agent sees the error and may retry
        pending = result.toolCalls.map((call): PendingToolCall => {
          const base = { toolCallId: call.toolCallId, toolName: call.toolName, input: call.input };
          if ('invalid' in call && call.invalid === true) {
            return { ...base, rejection: 'error' in call ? errorMessage(call.error) : 'Invalid tool call' };
          }
          return base;
        });

        state = pending.length > 0 ? 'tools' : 'final';
        break;
      }

      case 'tools': {
        const results: ToolTranscriptEntry[] = [];
        for (const call of pending) {
          log.info(`Calling ${call.toolName} (round ${iterations + 1}/${maxIterations})`);
          results.push(await executeToolCall(call, iterations, toolsByName, toolTimeoutMs, log));
        }
        transcript.push(...results);
        const unanswered = results.filter((entry) => !answered.has(entry.toolCallId));
        if (unanswered.length > 0) {
          messages.push({ role: 'tool', content: unanswered.map(toToolResultPart) });
        }
        pending = [];
        state = 'count';
        break;
      }

      case 'count': {
        iterations++;
        if (iterations >= maxIterations) {
          log.debug(`Tool budget of ${maxIterations} rounds reached`);
          state = 'final';
        } else {
          state = 'agent';
        }
        break;
      }
    }
  }

  const extraction = await generateStructured(
    {
      stage: request.stage,
      system: request.system,
      messages: [...messages, { role: 'user', content: request.finalInstruction }],
      schema: request.schema,
      temperature: request.temperature,
      timeoutMs: request.timeoutMs,
    },
    { ...deps, logger: log }
  );

  return {
    output: extraction.value,
    transcript,
    agentCalls,
    iterations,
    tier: extraction.tier,
    tokenUsage: addTokenUsage(tokenUsage, extraction.tokenUsage),
  };
}
