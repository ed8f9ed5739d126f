import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';

import { runToolLoop, type ToolLoopRequest } from '../../../src/ai/newsletter/tool-loop';
import { ToolExecutionError } from '../../../src/ai/newsletter/errors';
import { defineAgentTool, type AgentTool } from '../../../src/ai/tools/agent-tool';
import {
  FAST_RETRY,
  agentStepReply,
  createMockLogger,
  isAgentStep,
  structuredReply,
  type MockCallArgs,
} from '../../mocks/model';

const FindingsSchema = z.object({ findings: z.array(z.string()) });

function createSearchTool(execute = vi.fn().mockResolvedValue({ hits: ['result one'] })): AgentTool {
  return defineAgentTool({
    name: 'web_search',
    description: 'Search the web.',
    inputSchema: z.object({ query: z.string() }),
    execute,
  });
}

function createRequest(tools: readonly AgentTool[], maxIterations = 3): ToolLoopRequest<{ findings: string[] }> {
  return {
    stage: 'scout',
    system: 'You are a test agent.',
    prompt: 'Investigate: testing',
    finalInstruction: 'Report now as JSON.',
    tools,
    schema: FindingsSchema,
    temperature: 0,
    timeoutMs: 5_000,
    toolTimeoutMs: 1_000,
    maxIterations,
  };
}

/**
 * Agent steps come from `steps` in order (then no more tool calls);
 * the final extraction returns `findings`.
 */
function createGenerateText(
  steps: readonly object[],
  findings: string[] = ['done']
) {
  const queue = [...steps];
  return vi.fn().mockImplementation(async (args: MockCallArgs) => {
    if (isAgentStep(args)) {
      return queue.shift() ?? agentStepReply();
    }
    return structuredReply({ findings });
  });
}

function searchCall(id: string, query = 'latest news') {
  return { toolCallId: id, toolName: 'web_search', input: { query } };
}

describe('runToolLoop', () => {
  it('goes straight to extraction when the agent requests no tools', async () => {
    const execute = vi.fn().mockResolvedValue('unused');
    const generateText = createGenerateText([agentStepReply()], ['nothing to search']);

    const result = await runToolLoop(createRequest([createSearchTool(execute)]), {
      generateText,
      model: 'test-model',
      logger: createMockLogger(),
      retry: FAST_RETRY,
    });

    expect(result.output).toEqual({ findings: ['nothing to search'] });
    expect(result.agentCalls).toBe(1);
    expect(result.iterations).toBe(0);
    expect(result.transcript).toEqual([]);
    expect(execute).not.toHaveBeenCalled();
    expect(generateText).toHaveBeenCalledTimes(2);
  });

  it('stops at the iteration cap when every step requests a tool', async () => {
    let step = 0;
    const generateText = vi.fn().mockImplementation(async (args: MockCallArgs) => {
      if (!isAgentStep(args)) return structuredReply({ findings: ['capped'] });
      step++;
      return agentStepReply([searchCall(`call-${step}`)]);
    });
    const execute = vi.fn().mockResolvedValue({ hits: [] });

    const result = await runToolLoop(createRequest([createSearchTool(execute)], 3), {
      generateText,
      model: 'test-model',
      logger: createMockLogger(),
      retry: FAST_RETRY,
    });

    expect(result.agentCalls).toBe(3);
    expect(result.iterations).toBe(3);
    expect(execute).toHaveBeenCalledTimes(3);
    // 3 agent steps + 1 final extraction
    expect(generateText).toHaveBeenCalledTimes(4);

    const finalArgs: MockCallArgs = generateText.mock.calls[3]?.[0];
    expect(finalArgs.tools).toBeUndefined();
    expect(finalArgs.output).toBeDefined();
    expect(finalArgs.messages?.at(-1)).toEqual({ role: 'user', content: 'Report now as JSON.' });
  });

  it('disables parallel tool calls on agent steps', async () => {
    const generateText = createGenerateText([agentStepReply()]);

    await runToolLoop(createRequest([createSearchTool()]), {
      generateText,
      model: 'test-model',
      logger: createMockLogger(),
      retry: FAST_RETRY,
    });

    const agentArgs: MockCallArgs = generateText.mock.calls[0]?.[0];
    expect(agentArgs.providerOptions).toEqual({ openai: { parallelToolCalls: false } });
    expect(Object.keys(agentArgs.tools ?? {})).toEqual(['web_search']);
  });

  it('records tool output and feeds it back as a tool message', async () => {
    const generateText = createGenerateText([agentStepReply([searchCall('call-1', 'gpu prices')])]);

    const result = await runToolLoop(createRequest([createSearchTool()]), {
      generateText,
      model: 'test-model',
      logger: createMockLogger(),
      retry: FAST_RETRY,
    });

    expect(result.transcript).toEqual([
      {
        iteration: 0,
        toolCallId: 'call-1',
        toolName: 'web_search',
        input: { query: 'gpu prices' },
        status: 'ok',
        output: '{"hits":["result one"]}',
      },
    ]);
    expect(result.agentCalls).toBe(2);
    expect(result.iterations).toBe(1);

    const secondStep: MockCallArgs = generateText.mock.calls[1]?.[0];
    expect(secondStep.messages?.at(-1)).toEqual({
      role: 'tool',
      content: [
        {
          type: 'tool-result',
          toolCallId: 'call-1',
          toolName: 'web_search',
          output: { type: 'text', value: '{"hits":["result one"]}' },
        },
      ],
    });
  });

  it('contains tool failures and still reaches extraction', async () => {
    const execute = vi
      .fn()
      .mockRejectedValue(new ToolExecutionError('web_search', 'Tavily search failed with status 500', 500));
    const generateText = createGenerateText([agentStepReply([searchCall('call-1')])], ['partial']);

    const result = await runToolLoop(createRequest([createSearchTool(execute)]), {
      generateText,
      model: 'test-model',
      logger: createMockLogger(),
      retry: FAST_RETRY,
    });

    expect(result.output).toEqual({ findings: ['partial'] });
    expect(result.transcript).toHaveLength(1);
    expect(result.transcript[0]).toMatchObject({
      status: 'error',
      error: 'Tavily search failed with status 500',
    });

    const secondStep: MockCallArgs = generateText.mock.calls[1]?.[0];
    expect(secondStep.messages?.at(-1)).toMatchObject({
      role: 'tool',
      content: [{ output: { type: 'error-text', value: 'Tavily search failed with status 500' } }],
    });
  });

  it('reports unknown tools as errors without executing anything', async () => {
    const execute = vi.fn();
    const generateText = createGenerateText([
      agentStepReply([{ toolCallId: 'call-1', toolName: 'video_search', input: { query: 'x' } }]),
    ]);

    const result = await runToolLoop(createRequest([createSearchTool(execute)]), {
      generateText,
      model: 'test-model',
      logger: createMockLogger(),
      retry: FAST_RETRY,
    });

    expect(result.transcript[0]).toMatchObject({ status: 'error', error: 'Unknown tool: video_search' });
    expect(execute).not.toHaveBeenCalled();
  });

  it('rejects tool input that fails the tool schema', async () => {
    const execute = vi.fn();
    const generateText = createGenerateText([
      agentStepReply([{ toolCallId: 'call-1', toolName: 'web_search', input: { q: 'wrong key' } }]),
    ]);

    const result = await runToolLoop(createRequest([createSearchTool(execute)]), {
      generateText,
      model: 'test-model',
      logger: createMockLogger(),
      retry: FAST_RETRY,
    });

    expect(result.transcript[0]?.status).toBe('error');
    expect(result.transcript[0]).toMatchObject({ error: expect.stringMatching(/^Invalid input: query: /) });
    expect(execute).not.toHaveBeenCalled();
  });

  it('hands SDK-rejected calls back to the agent so it can retry', async () => {
    const execute = vi.fn().mockResolvedValue({ hits: ['fixed hit'] });
    const generateText = createGenerateText([
      agentStepReply([
        {
          toolCallId: 'call-1',
          toolName: 'web_search',
          input: { q: 'wrong key' },
          invalid: true,
          error: new Error('Invalid input for tool web_search'),
        },
      ]),
      agentStepReply([searchCall('call-2', 'fixed')]),
    ]);

    const result = await runToolLoop(createRequest([createSearchTool(execute)]), {
      generateText,
      model: 'test-model',
      logger: createMockLogger(),
      retry: FAST_RETRY,
    });

    expect(result.agentCalls).toBe(3);
    expect(result.iterations).toBe(2);
    expect(execute).toHaveBeenCalledTimes(1);
    expect(execute.mock.calls[0]?.[0]).toEqual({ query: 'fixed' });
    expect(result.transcript.map((entry) => entry.status)).toEqual(['error', 'ok']);
    expect(result.transcript[0]).toMatchObject({ iteration: 0, error: 'Invalid input for tool web_search' });

    const secondStep: MockCallArgs = generateText.mock.calls[1]?.[0];
    expect(secondStep.messages?.at(-1)).toEqual({
      role: 'tool',
      content: [
        {
          type: 'tool-result',
          toolCallId: 'call-1',
          toolName: 'web_search',
          output: { type: 'error-text', value: 'Invalid input for tool web_search' },
        },
      ],
    });
  });

  it('does not repeat a rejection the SDK already answered', async () => {
    const sdkAnswer = {
      role: 'tool' as const,
      content: [
        {
          type: 'tool-result' as const,
          toolCallId: 'call-1',
          toolName: 'video_search',
          output: { type: 'error-text' as const, value: 'No such tool: video_search' },
        },
      ],
    };
    const rejected = agentStepReply([
      {
        toolCallId: 'call-1',
        toolName: 'video_search',
        input: { query: 'x' },
        invalid: true,
        error: new Error('No such tool: video_search'),
      },
    ]);
    const generateText = createGenerateText([
      { ...rejected, response: { messages: [...rejected.response.messages, sdkAnswer] } },
    ]);

    const result = await runToolLoop(createRequest([createSearchTool()]), {
      generateText,
      model: 'test-model',
      logger: createMockLogger(),
      retry: FAST_RETRY,
    });

    expect(result.agentCalls).toBe(2);
    expect(result.transcript).toMatchObject([{ status: 'error', error: 'No such tool: video_search' }]);

    const secondStep: MockCallArgs = generateText.mock.calls[1]?.[0];
    const toolMessages = (secondStep.messages ?? []).filter((message) => message.role === 'tool');
    expect(toolMessages).toEqual([sdkAnswer]);
  });

  it('times out slow tools', async () => {
    const execute = vi.fn().mockImplementation(() => new Promise(() => undefined));
    const generateText = createGenerateText([agentStepReply([searchCall('call-1')])]);

    const result = await runToolLoop(
      { ...createRequest([createSearchTool(execute)]), toolTimeoutMs: 20 },
      { generateText, model: 'test-model', logger: createMockLogger(), retry: FAST_RETRY }
    );

    expect(result.transcript[0]).toMatchObject({ status: 'error', error: 'Tool timed out after 20ms' });
  });

  it('sums token usage across agent steps and extraction', async () => {
    const generateText = createGenerateText([agentStepReply([searchCall('call-1')])]);

    const result = await runToolLoop(createRequest([createSearchTool()]), {
      generateText,
      model: 'test-model',
      logger: createMockLogger(),
      retry: FAST_RETRY,
    });

    // Two agent steps and one extraction at 10 in / 5 out each
    expect(result.tokenUsage).toEqual({ input: 30, output: 15 });
    expect(result.tier).toBe('strict');
  });
});
