/**
 * Tavily Web Search API wrapper.
 *
 * Backs the scouts' `web_search` tool. The `news` topic restricts results to
 * recent reporting and adds a `published_date` per result.
 *
 * Docs: https://docs.tavily.com/documentation/api-reference/endpoint/search
 */

import { ToolExecutionError, errorMessage } from '../newsletter/errors';
import { clampInt, createRequestSignal, isRecord, safeNumber, safeString } from './parse-utils';

export const TAVILY_SEARCH_URL = 'https://api.tavily.com/search';

export type TavilySearchDepth = 'basic' | 'advanced';
export type TavilyTopic = 'general' | 'news';

export interface TavilySearchOptions {
  readonly apiKey: string;
  readonly searchDepth?: TavilySearchDepth;
  readonly topic?: TavilyTopic;
  /** Only with topic 'news': how many days back to search */
  readonly days?: number;
  readonly maxResults?: number;
  readonly includeAnswer?: boolean;
  readonly timeoutMs?: number;
  readonly signal?: AbortSignal;
  /**
   * Domains to exclude from search results.
   * Video pages carry no useful text, so YouTube is a common entry.
   */
  readonly excludeDomains?: readonly string[];
}

export interface TavilySearchResult {
  readonly title: string;
  readonly url: string;
  readonly content?: string;
  readonly score?: number;
  readonly publishedDate?: string;
}

export interface TavilySearchResponse {
  readonly query: string;
  readonly answer: string | null;
  readonly results: readonly TavilySearchResult[];
}

const TOOL_NAME = 'web_search';

function parseTavilyResult(raw: unknown): TavilySearchResult | null {
  if (!isRecord(raw)) return null;
  const title = safeString(raw.title);
  const url = safeString(raw.url);
  if (!title || !url) return null;

  const content = safeString(raw.content);
  const score = safeNumber(raw.score);
  const publishedDate = safeString(raw.published_date);

  return {
    title,
    url,
    ...(content ? { content } : {}),
    ...(score !== undefined ? { score } : {}),
    ...(publishedDate ? { publishedDate } : {}),
  };
}

export function parseTavilyResponse(query: string, raw: unknown): TavilySearchResponse {
  if (!isRecord(raw)) {
    return { query, answer: null, results: [] };
  }

  const resultsRaw = Array.isArray(raw.results) ? raw.results : [];
  const results = resultsRaw
    .map(parseTavilyResult)
    .filter((r): r is TavilySearchResult => r !== null);

  return { query, answer: safeString(raw.answer) ?? null, results };
}

/**
 * Tavily search.
 *
 * @throws ToolExecutionError on a non-2xx response, a network failure or a timeout
 */
export async function tavilySearch(
  query: string,
  options: TavilySearchOptions
): Promise<TavilySearchResponse> {
  const cleanedQuery = query.trim();
  if (cleanedQuery.length === 0) {
    return { query: cleanedQuery, answer: null, results: [] };
  }

  const timeoutMs = clampInt(options.timeoutMs ?? 15_000, 1_000, 60_000);
  const request = createRequestSignal(timeoutMs, options.signal);
  const topic = options.topic ?? 'general';

  try {
    const res = await fetch(TAVILY_SEARCH_URL, {
      method: 'POST',
      headers: {
        'content-type': 'application/json',
        Authorization: `Bearer ${options.apiKey}`,
      },
      body: JSON.stringify({
        query: cleanedQuery,
        topic,
        search_depth: options.searchDepth ?? 'basic',
        max_results: clampInt(options.maxResults ?? 5, 1, 20),
        include_answer: options.includeAnswer ?? true,
        ...(topic === 'news' && options.days !== undefined
          ? { days: clampInt(options.days, 1, 365) }
          : {}),
        ...(options.excludeDomains && options.excludeDomains.length > 0
          ? { exclude_domains: [...options.excludeDomains] }
          : {}),
      }),
      signal: request.signal,
    });

    if (!res.ok) {
      throw new ToolExecutionError(
        TOOL_NAME,
        `Tavily search failed with status ${res.status}`,
        res.status
      );
    }

    const json: unknown = await res.json();
    return parseTavilyResponse(cleanedQuery, json);
  } catch (error) {
    if (error instanceof ToolExecutionError) throw error;
    throw new ToolExecutionError(TOOL_NAME, `Tavily search failed: ${errorMessage(error)}`, undefined, {
      cause: error,
    });
  } finally {
    request.dispose();
  }
}
