/**
 * Exa API Wrapper
 *
 * Neural search backing the scouts' `academic_search` tool. With the
 * `research paper` category Exa returns papers and preprints, with authors
 * and publication dates when it knows them.
 *
 * @see https://docs.exa.ai/reference/how-exa-search-works
 */

import { ToolExecutionError, errorMessage } from '../newsletter/errors';
import { clampInt, createRequestSignal, isRecord, safeNumber, safeString } from './parse-utils';

// ============================================================================
// Types
// ============================================================================

/**
 * Search type for Exa queries.
 *
 * - 'auto': Intelligently combines multiple search methods
 * - 'neural': Meaning-based rather than keyword matching
 * - 'keyword': Traditional keyword matching
 * - 'fast': Streamlined for speed
 */
export type ExaSearchType = 'auto' | 'neural' | 'keyword' | 'fast';

/** Content category filter for Exa searches */
export type ExaCategory = 'research paper' | 'news' | 'pdf' | 'github' | 'company';

export interface ExaSearchOptions {
  readonly apiKey: string;
  /** Number of results to return. Default: 5 */
  readonly numResults?: number;
  /** Search type. Default: 'auto' */
  readonly type?: ExaSearchType;
  readonly category?: ExaCategory;
  /** Maximum characters of page text per result. Default: 1000 */
  readonly textMaxCharacters?: number;
  /** Ask Exa for a query-aware summary of each result */
  readonly includeSummary?: boolean;
  /** Filter results to those published after this date (ISO string) */
  readonly startPublishedDate?: string;
  readonly timeoutMs?: number;
  readonly signal?: AbortSignal;
}

export interface ExaSearchResult {
  readonly title: string;
  readonly url: string;
  /** Main text content from the page */
  readonly content?: string;
  /** AI-generated summary (if requested) */
  readonly summary?: string;
  readonly score?: number;
  readonly publishedDate?: string;
  readonly author?: string;
}

export interface ExaSearchResponse {
  readonly query: string;
  readonly results: readonly ExaSearchResult[];
}

// ============================================================================
// Configuration
// ============================================================================

export const EXA_API_BASE_URL = 'https://api.exa.ai';

const DEFAULT_TIMEOUT_MS = 20_000;
const MIN_TIMEOUT_MS = 1_000;
const MAX_TIMEOUT_MS = 60_000;

const MIN_RESULTS = 1;
const MAX_RESULTS = 25;
const DEFAULT_RESULTS = 5;

const DEFAULT_TEXT_MAX_CHARS = 1000;

const TOOL_NAME = 'academic_search';

// ============================================================================
// Response Parsing
// ============================================================================

function parseExaResult(raw: unknown): ExaSearchResult | null {
  if (!isRecord(raw)) return null;

  const title = safeString(raw.title);
  const url = safeString(raw.url);
  if (!title || !url) return null;

  const content = safeString(raw.text);
  const summary = safeString(raw.summary);
  const score = safeNumber(raw.score);
  const publishedDate = safeString(raw.publishedDate);
  const author = safeString(raw.author);

  return {
    title,
    url,
    ...(content ? { content } : {}),
    ...(summary ? { summary } : {}),
    ...(score !== undefined ? { score } : {}),
    ...(publishedDate ? { publishedDate } : {}),
    ...(author ? { author } : {}),
  };
}

export function parseExaResponse(query: string, raw: unknown): ExaSearchResponse {
  if (!isRecord(raw)) {
    return { query, results: [] };
  }

  const resultsRaw = Array.isArray(raw.results) ? raw.results : [];
  const results = resultsRaw
    .map(parseExaResult)
    .filter((r): r is ExaSearchResult => r !== null);

  return { query, results };
}

// ============================================================================
// API Functions
// ============================================================================

/**
 * Performs a search using the Exa API.
 *
 * @throws ToolExecutionError on a non-2xx response, a network failure or a timeout
 *
 * @example
 * const papers = await exaSearch('sparse mixture-of-experts routing', {
 *   apiKey,
 *   category: 'research paper',
 *   includeSummary: true,
 * });
 */
export async function exaSearch(
  query: string,
  options: ExaSearchOptions
): Promise<ExaSearchResponse> {
  const cleanedQuery = query.trim();
  if (cleanedQuery.length === 0) {
    return { query: cleanedQuery, results: [] };
  }

  const timeoutMs = clampInt(options.timeoutMs ?? DEFAULT_TIMEOUT_MS, MIN_TIMEOUT_MS, MAX_TIMEOUT_MS);
  const request = createRequestSignal(timeoutMs, options.signal);

  const body = {
    query: cleanedQuery,
    numResults: clampInt(options.numResults ?? DEFAULT_RESULTS, MIN_RESULTS, MAX_RESULTS),
    type: options.type ?? 'auto',
    contents: {
      text: { maxCharacters: options.textMaxCharacters ?? DEFAULT_TEXT_MAX_CHARS },
      ...(options.includeSummary ? { summary: true } : {}),
    },
    ...(options.category ? { category: options.category } : {}),
    ...(options.startPublishedDate ? { startPublishedDate: options.startPublishedDate } : {}),
  };

  try {
    const res = await fetch(`${EXA_API_BASE_URL}/search`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'x-api-key': options.apiKey,
      },
      body: JSON.stringify(body),
      signal: request.signal,
    });

    if (!res.ok) {
      throw new ToolExecutionError(TOOL_NAME, `Exa search failed with status ${res.status}`, res.status);
    }

    const json: unknown = await res.json();
    return parseExaResponse(cleanedQuery, json);
  } catch (error) {
    if (error instanceof ToolExecutionError) throw error;
    throw new ToolExecutionError(TOOL_NAME, `Exa search failed: ${errorMessage(error)}`, undefined, {
      cause: error,
    });
  } finally {
    request.dispose();
  }
}
