/**
 * Runtime Environment
 *
 * Credentials and log settings, read from the process environment once at
 * startup and passed down explicitly. Nothing below the CLI reads
 * `process.env`.
 */

import type { LogFormat } from '../utils/logger';

export const DEFAULT_AI_BASE_URL = 'https://openrouter.ai/api/v1';

export interface RuntimeEnv {
  readonly openRouterApiKey?: string;
  /** OpenAI-compatible endpoint the models are served from */
  readonly aiBaseUrl: string;
  readonly tavilyApiKey?: string;
  readonly exaApiKey?: string;
  readonly logFormat: LogFormat;
}

function readOptional(source: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = source[key]?.trim();
  return value ? value : undefined;
}

export function loadRuntimeEnv(source: NodeJS.ProcessEnv = process.env): RuntimeEnv {
  const openRouterApiKey = readOptional(source, 'OPENROUTER_API_KEY');
  const tavilyApiKey = readOptional(source, 'TAVILY_API_KEY');
  const exaApiKey = readOptional(source, 'EXA_API_KEY');

  return {
    ...(openRouterApiKey ? { openRouterApiKey } : {}),
    aiBaseUrl: readOptional(source, 'AI_BASE_URL') ?? DEFAULT_AI_BASE_URL,
    ...(tavilyApiKey ? { tavilyApiKey } : {}),
    ...(exaApiKey ? { exaApiKey } : {}),
    logFormat: readOptional(source, 'LOG_FORMAT')?.toLowerCase() === 'json' ? 'json' : 'text',
  };
}
