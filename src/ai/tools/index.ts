/**
 * Scout Search Tools
 *
 * Builds the tool set scouts receive from the reader's content toggles:
 *
 * | Toggle             | Tool               | Backend |
 * |--------------------|--------------------|---------|
 * | `include_news`     | `web_search`       | Tavily  |
 * | `include_reddit`   | `community_search` | Reddit  |
 * | `include_academic` | `academic_search`  | Exa     |
 *
 * `include_youtube` has no tool. A tool whose API key is missing is left
 * out with a warning.
 */

import { z } from 'zod';

import type { ContentSettings } from '../../config/schema';
import type { RuntimeEnv } from '../../config/env';
import { createPrefixedLogger, type Logger } from '../../utils/logger';
import { SCOUT_CONFIG } from '../newsletter/config';
import { systemClock, type Clock } from '../newsletter/types';
import { defineAgentTool, type AgentTool } from './agent-tool';
import { exaSearch } from './exa';
import { redditSearch } from './reddit';
import { tavilySearch } from './tavily';

export { defineAgentTool, toToolSet, type AgentTool, type AgentToolDefinition } from './agent-tool';

export const WEB_SEARCH_TOOL = 'web_search';
export const COMMUNITY_SEARCH_TOOL = 'community_search';
export const ACADEMIC_SEARCH_TOOL = 'academic_search';

const QuerySchema = z.object({
  query: z.string().min(1).describe('Search query'),
});

const CommunitySearchSchema = z.object({
  query: z.string().min(1).describe('Search query'),
  forum: z.string().default('all').describe("Subreddit name without the r/ prefix, or 'all'"),
  limit: z.number().int().min(1).max(25).default(5).describe('Number of posts to return'),
});

export function createWebSearchTool(apiKey: string, maxResults: number): AgentTool {
  return defineAgentTool({
    name: WEB_SEARCH_TOOL,
    description: 'Search recent news and web articles for the query.',
    inputSchema: QuerySchema,
    execute: async ({ query }, signal) => {
      const response = await tavilySearch(query, { apiKey, topic: 'news', maxResults, signal });
      return { answer: response.answer, results: response.results };
    },
  });
}

export function createCommunitySearchTool(
  reddit: ContentSettings['reddit'],
  clock: Clock
): AgentTool {
  return defineAgentTool({
    name: COMMUNITY_SEARCH_TOOL,
    description:
      'Search community discussions on Reddit. Returns posts with title, url, score, forum and timestamp.',
    inputSchema: CommunitySearchSchema,
    execute: ({ query, forum, limit }, signal) =>
      redditSearch(query, {
        forum,
        limit,
        minUpvotes: reddit.min_upvotes,
        maxAgeHours: reddit.max_age_hours,
        clock,
        signal,
      }),
  });
}

export function createAcademicSearchTool(apiKey: string, maxResults: number): AgentTool {
  return defineAgentTool({
    name: ACADEMIC_SEARCH_TOOL,
    description: 'Search academic papers and preprints. Returns titles, links, authors and summaries.',
    inputSchema: QuerySchema,
    execute: async ({ query }, signal) => {
      const response = await exaSearch(query, {
        apiKey,
        category: 'research paper',
        numResults: maxResults,
        includeSummary: true,
        signal,
      });
      return response.results;
    },
  });
}

export interface SearchToolOptions {
  readonly content: ContentSettings;
  readonly env: Pick<RuntimeEnv, 'tavilyApiKey' | 'exaApiKey'>;
  readonly clock?: Clock;
  readonly logger?: Logger;
  readonly maxResults?: number;
}

export function createSearchTools(options: SearchToolOptions): AgentTool[] {
  const log = options.logger ?? createPrefixedLogger('[Tools]');
  const maxResults = options.maxResults ?? SCOUT_CONFIG.SEARCH_RESULTS;
  const { content, env } = options;
  const tools: AgentTool[] = [];

  if (content.include_news) {
    if (env.tavilyApiKey) {
      tools.push(createWebSearchTool(env.tavilyApiKey, maxResults));
    } else {
      log.warn(`TAVILY_API_KEY not set; ${WEB_SEARCH_TOOL} disabled`);
    }
  }

  if (content.include_reddit) {
    tools.push(createCommunitySearchTool(content.reddit, options.clock ?? systemClock));
  }

  if (content.include_academic) {
    if (env.exaApiKey) {
      tools.push(createAcademicSearchTool(env.exaApiKey, maxResults));
    } else {
      log.warn(`EXA_API_KEY not set; ${ACADEMIC_SEARCH_TOOL} disabled`);
    }
  }

  if (content.include_youtube) {
    log.debug('YouTube is enabled but has no search tool');
  }

  return tools;
}
