/**
 * Reddit Search wrapper.
 *
 * Backs the scouts' `community_search` tool through Reddit's public JSON
 * search endpoint (no credentials). Posts below the upvote threshold or
 * older than the age window are filtered out locally.
 */

import { ToolExecutionError, errorMessage } from '../newsletter/errors';
import { systemClock, type Clock } from '../newsletter/types';
import { clampInt, createRequestSignal, isRecord, safeNumber, safeString } from './parse-utils';

export const REDDIT_BASE_URL = 'https://www.reddit.com';

const USER_AGENT = 'newsletter-agents/0.1 (community search)';
const TOOL_NAME = 'community_search';

/** Upstream page size is larger than the requested limit so filtering has room */
const FETCH_MULTIPLIER = 5;
const MAX_FETCH = 100;

export interface RedditSearchOptions {
  /** Subreddit name without the `r/` prefix, or 'all' */
  readonly forum?: string;
  readonly limit?: number;
  readonly minUpvotes?: number;
  readonly maxAgeHours?: number;
  readonly clock?: Clock;
  readonly timeoutMs?: number;
  readonly signal?: AbortSignal;
}

export interface RedditPost {
  readonly title: string;
  readonly url: string;
  readonly score: number;
  readonly forum: string;
  /** ISO-8601 creation time */
  readonly timestamp: string;
}

function normalizeForum(forum: string | undefined): string {
  const cleaned = (forum ?? 'all').trim().replace(/^\/?r\//i, '');
  return cleaned.length > 0 ? cleaned : 'all';
}

export function buildRedditSearchUrl(query: string, forum: string, fetchLimit: number): string {
  const path = forum === 'all' ? '/search.json' : `/r/${encodeURIComponent(forum)}/search.json`;
  const params = new URLSearchParams({
    q: query,
    sort: 'top',
    t: 'week',
    limit: String(fetchLimit),
    ...(forum === 'all' ? {} : { restrict_sr: 'true' }),
  });
  return `${REDDIT_BASE_URL}${path}?${params.toString()}`;
}

function parseRedditPost(raw: unknown): RedditPost | null {
  if (!isRecord(raw) || !isRecord(raw.data)) return null;
  const post = raw.data;

  const title = safeString(post.title);
  const permalink = safeString(post.permalink);
  const createdUtc = safeNumber(post.created_utc);
  if (!title || !permalink || createdUtc === undefined) return null;

  return {
    title,
    url: `${REDDIT_BASE_URL}${permalink}`,
    score: safeNumber(post.score) ?? 0,
    forum: safeString(post.subreddit) ?? '',
    timestamp: new Date(createdUtc * 1000).toISOString(),
  };
}

export function parseRedditListing(raw: unknown): RedditPost[] {
  if (!isRecord(raw) || !isRecord(raw.data)) return [];
  const children = Array.isArray(raw.data.children) ? raw.data.children : [];
  return children.map(parseRedditPost).filter((p): p is RedditPost => p !== null);
}

/**
 * Searches Reddit and applies the community thresholds.
 *
 * @throws ToolExecutionError on a non-2xx response, a network failure or a timeout
 */
export async function redditSearch(
  query: string,
  options: RedditSearchOptions = {}
): Promise<RedditPost[]> {
  const cleanedQuery = query.trim();
  if (cleanedQuery.length === 0) return [];

  const forum = normalizeForum(options.forum);
  const limit = clampInt(options.limit ?? 5, 1, 25);
  const minUpvotes = options.minUpvotes ?? 0;
  const clock = options.clock ?? systemClock;
  const request = createRequestSignal(
    clampInt(options.timeoutMs ?? 15_000, 1_000, 60_000),
    options.signal
  );

  try {
    const res = await fetch(
      buildRedditSearchUrl(cleanedQuery, forum, Math.min(limit * FETCH_MULTIPLIER, MAX_FETCH)),
      {
        headers: { 'User-Agent': USER_AGENT, Accept: 'application/json' },
        signal: request.signal,
      }
    );

    if (!res.ok) {
      throw new ToolExecutionError(TOOL_NAME, `Reddit search failed with status ${res.status}`, res.status);
    }

    const json: unknown = await res.json();
    const cutoff =
      options.maxAgeHours !== undefined ? clock.now() - options.maxAgeHours * 3_600_000 : undefined;

    return parseRedditListing(json)
      .filter((post) => post.score >= minUpvotes)
      .filter((post) => cutoff === undefined || Date.parse(post.timestamp) >= cutoff)
      .slice(0, limit);
  } catch (error) {
    if (error instanceof ToolExecutionError) throw error;
    throw new ToolExecutionError(TOOL_NAME, `Reddit search failed: ${errorMessage(error)}`, undefined, {
      cause: error,
    });
  } finally {
    request.dispose();
  }
}
