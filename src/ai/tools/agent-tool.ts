/**
 * Agent Tools
 *
 * A tool the scouts can call: a name, a description for the model, a zod
 * input schema and an executor. The model only ever sees the schema side
 * (`toToolSet`); the tool loop runs `invoke` itself so every call can be
 * timed, recorded and contained.
 */

import { tool, type ToolSet } from 'ai';
import type { z } from 'zod';

import { ToolExecutionError } from '../newsletter/errors';
import { formatSchemaIssues } from '../newsletter/structured-output';

export interface AgentToolDefinition<I> {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: z.ZodType<I>;
  execute(input: I, signal: AbortSignal): Promise<unknown>;
}

/**
 * Type-erased tool as held by the loop.
 */
export interface AgentTool {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: z.ZodType<unknown>;
  /**
   * Validates the raw model-supplied input, executes, and serializes the
   * result for the conversation.
   *
   * @throws ToolExecutionError on invalid input or a failed execution
   */
  invoke(rawInput: unknown, signal: AbortSignal): Promise<string>;
}

export function defineAgentTool<I>(definition: AgentToolDefinition<I>): AgentTool {
  return {
    name: definition.name,
    description: definition.description,
    inputSchema: definition.inputSchema,
    async invoke(rawInput, signal) {
      const parsed = definition.inputSchema.safeParse(rawInput);
      if (!parsed.success) {
        throw new ToolExecutionError(
          definition.name,
          `Invalid input: ${formatSchemaIssues(parsed.error)}`
        );
      }
      const output = await definition.execute(parsed.data, signal);
      return typeof output === 'string' ? output : JSON.stringify(output);
    },
  };
}

/**
 * Declares the tools to the model without executors; the loop runs them.
 */
export function toToolSet(tools: readonly AgentTool[]): ToolSet {
  const set: ToolSet = {};
  for (const agentTool of tools) {
    set[agentTool.name] = tool({
      description: agentTool.description,
      inputSchema: agentTool.inputSchema,
    });
  }
  return set;
}
