/**
 * FILE PURPOSE: Annotation capability backed by chat completions
 *
 * HOW: One completion per attempt, no retry here (the client is built with
 *      maxRetries: 0 and the scheduler owns the policy). SDK errors become
 *      TransportError: rate limits, timeouts, 5xx and connection failures are
 *      retryable, other 4xx are not. Every call, failed or not, is recorded in
 *      the cost ledger, and the budget is checked before each call.
 */

import OpenAI from 'openai';
import { TransportError } from '@curate/pipeline-core';
import type { AnnotationCapability, CostLedger } from '@curate/pipeline-core';

/** The slice of the OpenAI client the annotator calls. */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(
        body: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming,
        options?: { signal?: AbortSignal },
      ): PromiseLike<OpenAI.Chat.Completions.ChatCompletion>;
    };
  };
}

export interface LlmAnnotatorOptions {
  client: ChatCompletionClient;
  model: string;
  ledger: CostLedger;
  /** Ledger bucket; defaults to 'annotator'. */
  agentName?: string;
  temperature?: number;
}

const RETRYABLE_STATUS = new Set([408, 409, 429]);

/** Rough estimate for input tokens when provider usage metadata is unavailable. */
export function estimateTokens(charCount: number): number {
  return Math.max(1, Math.ceil(charCount / 4));
}

function abortError(cause: unknown): Error {
  const err = new Error('Annotation call aborted', { cause });
  err.name = 'AbortError';
  return err;
}

export function toTransportError(err: unknown): Error {
  if (err instanceof TransportError) return err;
  if (err instanceof OpenAI.APIUserAbortError) return abortError(err);
  if (err instanceof OpenAI.APIConnectionError) {
    return new TransportError(`Annotation service unreachable: ${err.message}`, { cause: err });
  }
  if (err instanceof OpenAI.APIError) {
    const status = err.status;
    const retryable = status === undefined || RETRYABLE_STATUS.has(status) || status >= 500;
    return new TransportError(`Annotation service returned ${status ?? 'an error'}: ${err.message}`, {
      retryable,
      status,
      cause: err,
    });
  }
  const message = err instanceof Error ? err.message : String(err);
  return new TransportError(`Annotation call failed: ${message}`, { cause: err });
}

export function payloadText(payload: string | Uint8Array): string {
  return typeof payload === 'string' ? payload : new TextDecoder().decode(payload);
}

export function createLlmAnnotator(options: LlmAnnotatorOptions): AnnotationCapability {
  const { client, model, ledger } = options;
  const agentName = options.agentName ?? 'annotator';

  return async (request) => {
    ledger.ensureBudget();

    const content = payloadText(request.payload);
    const started = Date.now();
    let completion: OpenAI.Chat.Completions.ChatCompletion;
    try {
      completion = await client.chat.completions.create(
        {
          model,
          temperature: options.temperature ?? 0,
          messages: [
            { role: 'system', content: request.promptContext },
            { role: 'user', content },
          ],
        },
        { signal: request.signal },
      );
    } catch (err) {
      ledger.recordCall(agentName, model, estimateTokens(content.length), 0, Date.now() - started, false);
      throw toTransportError(err);
    }

    const usage = completion.usage;
    const text = completion.choices[0]?.message?.content ?? '';
    ledger.recordCall(
      agentName,
      model,
      usage?.prompt_tokens ?? estimateTokens(content.length),
      usage?.completion_tokens ?? estimateTokens(text.length),
      Date.now() - started,
      text.length > 0,
    );

    if (text.length === 0) {
      throw new TransportError(`Annotation service returned an empty completion for ${request.recordId}`);
    }
    return text;
  };
}
