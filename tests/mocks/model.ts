/**
 * Model Call Mocks
 *
 * Fixtures and response builders for tests that inject a mocked
 * `generateText`. Responses carry only the fields the pipeline reads.
 */

import type { ModelMessage } from 'ai';
import { vi } from 'vitest';

import type { NewsStory, ResearchTask } from '../../src/ai/newsletter/types';
import { parseConfig } from '../../src/config/loader';
import type { NewsletterConfig, NewsletterConfigInput } from '../../src/config/schema';
import type { Logger } from '../../src/utils/logger';

/** 2025-01-15T12:00:00Z */
export const TEST_NOW_MS = Date.UTC(2025, 0, 15, 12, 0, 0);

export const FAST_RETRY = { maxRetries: 0, initialDelayMs: 1, maxDelayMs: 1 } as const;

/**
 * The subset of `generateText` options the mocks inspect.
 */
export interface MockCallArgs {
  readonly model?: unknown;
  readonly system?: string;
  readonly messages?: ModelMessage[];
  readonly tools?: Record<string, unknown>;
  readonly output?: unknown;
  readonly temperature?: number;
  readonly maxRetries?: number;
  readonly providerOptions?: unknown;
  readonly abortSignal?: AbortSignal;
}

export interface MockToolCall {
  readonly toolCallId: string;
  readonly toolName: string;
  readonly input: unknown;
  /** The SDK flags calls it could not parse or match to a tool */
  readonly invalid?: boolean;
  readonly error?: unknown;
}

const DEFAULT_USAGE = { inputTokens: 10, outputTokens: 5 };

export function createMockLogger(): Logger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

export function makeStory(overrides: Partial<NewsStory> = {}): NewsStory {
  return {
    title: 'Open model release tops reasoning benchmark',
    summary: 'A new open-weights model was released with strong reasoning results.',
    source: 'Example News',
    url: 'https://news.example.com/open-model-release',
    score: 7,
    timestamp: '2025-01-14',
    topic: 'artificial intelligence',
    ...overrides,
  };
}

export function makeTask(overrides: Partial<ResearchTask> = {}): ResearchTask {
  return {
    topic: 'artificial intelligence',
    additionalInfo: 'Reader builds ML systems and prefers technical depth.',
    ...overrides,
  };
}

export function makeConfig(overrides: Partial<NewsletterConfigInput> = {}): NewsletterConfig {
  return parseConfig({ interests: ['artificial intelligence'], ...overrides });
}

/** Tier-1 reply: the provider already parsed the object */
export function structuredReply(output: unknown, usage = DEFAULT_USAGE) {
  return { output, text: JSON.stringify(output), usage };
}

/** Tier-2 reply: free text only */
export function textReply(text: string, usage = DEFAULT_USAGE) {
  return { output: undefined, text, usage };
}

/** Agent step that requests the given tool calls (none: the agent is done) */
export function agentStepReply(calls: readonly MockToolCall[] = [], usage = DEFAULT_USAGE) {
  const toolCalls = calls.map((call) => ({ type: 'tool-call' as const, ...call }));
  return {
    text: calls.length === 0 ? 'I have what I need.' : '',
    toolCalls,
    response: {
      messages: [
        {
          role: 'assistant' as const,
          content: calls.length === 0 ? 'I have what I need.' : toolCalls,
        },
      ],
    },
    usage,
  };
}

export function isAgentStep(args: MockCallArgs): boolean {
  return args.tools !== undefined;
}

export function isStructuredCall(args: MockCallArgs): boolean {
  return args.output !== undefined;
}
