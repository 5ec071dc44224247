/**
 * FILE PURPOSE: OpenAI-compatible client for the annotation service
 *
 * WHY: Annotation calls go through an OpenAI-compatible proxy (LiteLLM by
 *      default) so the model behind it can change without code changes.
 * HOW: SDK-level retries are switched off. The scheduler's retry policy is
 *      the only place a failed call is repeated, so attempt counts and
 *      backoff stay exact.
 *
 * USAGE:
 *   const llm = createLLMClient();
 *   const res = await llm.chat.completions.create({ model: 'gpt-4o-mini', ... });
 */
import OpenAI from 'openai';

export interface LLMClientOptions {
  apiKey?: string;
  baseURL?: string;
  /** Per-request timeout in ms. */
  timeoutMs?: number;
  headers?: Record<string, string>;
}

export function createLLMClient(options: LLMClientOptions = {}): OpenAI {
  const baseURL = options.baseURL || process.env.LITELLM_PROXY_URL || 'http://localhost:4000/v1';
  const apiKey = options.apiKey || process.env.LITELLM_API_KEY || '';

  return new OpenAI({
    baseURL,
    apiKey,
    maxRetries: 0,
    timeout: options.timeoutMs ?? 60_000,
    ...(options.headers ? { defaultHeaders: options.headers } : {}),
  });
}

export type { OpenAI };
