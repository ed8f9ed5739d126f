/**
 * Model Provider
 *
 * Resolves per-stage model ids through an OpenAI-compatible endpoint
 * (OpenRouter by default).
 */

import { createOpenAI } from '@ai-sdk/openai';
import type { LanguageModel } from 'ai';

import type { RuntimeEnv } from '../config/env';
import { ConfigurationError } from './newsletter/errors';

export type ModelResolver = (modelId: string) => LanguageModel;

/**
 * @throws ConfigurationError when no API key is available
 */
export function createModelResolver(env: RuntimeEnv): ModelResolver {
  if (!env.openRouterApiKey) {
    throw new ConfigurationError('missing_credentials', 'OPENROUTER_API_KEY is not set');
  }

  const openrouter = createOpenAI({
    baseURL: env.aiBaseUrl,
    apiKey: env.openRouterApiKey,
  });

  return (modelId) => openrouter.chat(modelId);
}
