import { describe, it, expect } from 'vitest';

import {
  ConfigurationError,
  MalformedOutputError,
  NewsletterError,
  ToolExecutionError,
  UpstreamModelError,
  errorMessage,
  isNewsletterError,
} from '../../../src/ai/newsletter/errors';
import {
  NewsStorySchema,
  addTokenUsage,
  createEmptyTokenUsage,
  createMockClock,
  createTokenUsageFromResult,
  formatDate,
  isCitable,
} from '../../../src/ai/newsletter/types';
import { TEST_NOW_MS, makeStory } from '../../mocks/model';

describe('token usage', () => {
  it('adds usage', () => {
    expect(addTokenUsage({ input: 1, output: 2 }, { input: 10, output: 20 })).toEqual({ input: 11, output: 22 });
    expect(createEmptyTokenUsage()).toEqual({ input: 0, output: 0 });
  });

  it('reads usage from a model result, tolerating gaps', () => {
    expect(createTokenUsageFromResult({ usage: { inputTokens: 7, outputTokens: 3 } })).toEqual({ input: 7, output: 3 });
    expect(createTokenUsageFromResult({ usage: { inputTokens: 7 } })).toEqual({ input: 7, output: 0 });
    expect(createTokenUsageFromResult({})).toEqual({ input: 0, output: 0 });
  });
});

describe('clock helpers', () => {
  it('auto-advances a mock clock', () => {
    const clock = createMockClock(1_000_000, 100);

    expect(clock.now()).toBe(1_000_000);
    expect(clock.now()).toBe(1_000_100);
  });

  it('formats the UTC calendar date', () => {
    expect(formatDate(createMockClock(TEST_NOW_MS))).toBe('2025-01-15');
  });
});

describe('NewsStorySchema', () => {
  it('bounds the score to 1..10 integers', () => {
    expect(NewsStorySchema.safeParse(makeStory({ score: 10 })).success).toBe(true);
    expect(NewsStorySchema.safeParse(makeStory({ score: 0 })).success).toBe(false);
    expect(NewsStorySchema.safeParse(makeStory({ score: 11 })).success).toBe(false);
    expect(NewsStorySchema.safeParse(makeStory({ score: 5.5 })).success).toBe(false);
  });

  it('requires a title', () => {
    expect(NewsStorySchema.safeParse(makeStory({ title: '' })).success).toBe(false);
  });

  it('accepts ISO-8601 dates and date-times as the timestamp', () => {
    for (const timestamp of ['2025-01-14', '2025-01-15T10:00:00.000Z', '2025-01-15T10:00:00+02:00', '2025-01-15T10:00:00']) {
      expect(NewsStorySchema.safeParse(makeStory({ timestamp })).success).toBe(true);
    }
  });

  it('rejects free-form timestamps', () => {
    expect(NewsStorySchema.safeParse(makeStory({ timestamp: 'yesterday' })).success).toBe(false);
    expect(NewsStorySchema.safeParse(makeStory({ timestamp: 'Jan 14, 2025' })).success).toBe(false);
    expect(NewsStorySchema.safeParse(makeStory({ timestamp: '' })).success).toBe(false);
  });
});

describe('isCitable', () => {
  it('needs both url and source', () => {
    expect(isCitable(makeStory())).toBe(true);
    expect(isCitable(makeStory({ url: '' }))).toBe(false);
    expect(isCitable(makeStory({ source: ' ' }))).toBe(false);
  });
});

describe('errors', () => {
  it('carries a code on every pipeline error', () => {
    expect(new ConfigurationError('empty', 'Configuration file is empty').code).toBe('CONFIG_ERROR');
    expect(new ToolExecutionError('web_search', 'boom', 500).code).toBe('TOOL_FAILED');
    expect(new MalformedOutputError('writer', 'raw', ['strict: a', 'lenient: b']).code).toBe('MALFORMED_OUTPUT');
    expect(new UpstreamModelError('scout', 'timeout').code).toBe('UPSTREAM_MODEL');
  });

  it('builds descriptive messages', () => {
    expect(new MalformedOutputError('writer', 'raw', ['strict: a', 'lenient: b']).message).toBe(
      'writer returned malformed structured output: strict: a; lenient: b'
    );
    expect(new UpstreamModelError('scout', 'timeout').message).toBe('scout model call failed: timeout');
  });

  it('recognizes pipeline errors', () => {
    expect(isNewsletterError(new ToolExecutionError('web_search', 'boom'))).toBe(true);
    expect(isNewsletterError(new NewsletterError('INVALID_TASK', 'bad'))).toBe(true);
    expect(isNewsletterError(new Error('plain'))).toBe(false);
  });

  it('keeps subclass names', () => {
    expect(new ToolExecutionError('web_search', 'boom').name).toBe('ToolExecutionError');
    expect(new ConfigurationError('invalid', 'bad').name).toBe('ConfigurationError');
  });

  it('extracts messages from unknown values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain string')).toBe('plain string');
  });
});
