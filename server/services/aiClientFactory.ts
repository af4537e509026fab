/**
 * AI Client Factory: planner model configuration.
 *
 * Env vars:
 *   OPENAI_API_KEY     required for the planner; absent means the feature is disabled
 *   OPENAI_BASE_URL    optional OpenAI-compatible endpoint
 *   AI_PLANNER_MODEL   (default: gpt-4o)
 */

import OpenAI from 'openai';
import { getConfig, getOpenAIKey, type AppConfig, type Lookup } from '../config';

// ============================================================================
// TYPES
// ============================================================================

/** The slice of the OpenAI SDK the planner calls */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(params: {
        model: string;
        messages: ({ role: 'system'; content: string } | { role: 'user'; content: string })[];
      }): Promise<{ choices: { message: { content: string | null } }[] }>;
    };
  };
}

export interface AIClient {
  openai: ChatCompletionsClient;
  model: string;
}

export type PlannerStatus = { ready: true } | { ready: false; message: string };

// ============================================================================
// SINGLETON CACHE (one OpenAI instance per key + baseURL)
// ============================================================================

const clientCache = new Map<string, OpenAI>();

function getOrCreateOpenAI(apiKey: string, baseURL?: string): OpenAI {
  const cacheKey = `${apiKey.slice(0, 8)}:${baseURL ?? 'default'}`;
  let client = clientCache.get(cacheKey);
  if (!client) {
    client = new OpenAI({ apiKey, baseURL });
    clientCache.set(cacheKey, client);
  }
  return client;
}

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Get an OpenAI client + model for itinerary planning.
 * Missing credentials come back as an error result, never as a throw.
 */
export function getAIClient(config: AppConfig = getConfig()): Lookup<AIClient> {
  const key = getOpenAIKey(config);
  if (!key.ok) {
    return key;
  }

  try {
    const openai = getOrCreateOpenAI(key.value, config.OPENAI_BASE_URL);
    return { ok: true, value: { openai, model: config.AI_PLANNER_MODEL } };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, error: `Error creating OpenAI client: ${message}` };
  }
}

export function getPlannerStatus(config: AppConfig = getConfig()): PlannerStatus {
  const client = getAIClient(config);
  return client.ok ? { ready: true } : { ready: false, message: client.error };
}

/**
 * Log whether the planner is configured (no key or model names exposed).
 */
export function logAIConfig(config: AppConfig = getConfig()): void {
  const status = getPlannerStatus(config);
  if (!status.ready) {
    console.log('[AIClientFactory] Trip planner AI is not configured');
    return;
  }
  console.log('[AIClientFactory] Trip planner AI configured and ready');
}
