/**
 * CompletionClient - Asks a Groq (or any OpenAI-compatible) model to fill the
 * marker.
 *
 * Requests carry a timeout and are retried with exponential backoff on
 * timeouts and rate limits. The caller's AbortSignal cancels the in-flight
 * request and any pending retry.
 */

import Groq from 'groq-sdk';
import { CompletionContext } from '../types';
import { AIConfig, DEFAULT_CONFIG } from '../config/Config';
import { Logger, createSilentLogger } from '../logging/Logger';
import { buildCompletionMessages } from './Prompts';

export interface ProviderResponse {
  /** Raw model output, parsed later by parseCompletionXML */
  text: string;
  tokensUsed: number;
  model: string;
  latencyMs: number;
}

/**
 * Anything that can turn a context into model output. The orchestrator only
 * depends on this, so tests substitute a fake.
 */
export interface CompletionProvider {
  complete(context: CompletionContext, signal?: AbortSignal): Promise<ProviderResponse>;
}

export type CompletionClientConfig = Partial<AIConfig> & {
  logger?: Logger;
};

export interface CompletionStats {
  totalTokensUsed: number;
  callCount: number;
  averageTokensPerCall: number;
}

export class CompletionClient implements CompletionProvider {
  private client: Groq;
  private config: AIConfig;
  private logger: Logger;
  private totalTokensUsed: number = 0;
  private callCount: number = 0;

  constructor(config: CompletionClientConfig = {}) {
    const { logger, ...aiConfig } = config;
    this.config = { ...DEFAULT_CONFIG.ai, ...stripUndefined(aiConfig) };
    this.logger = logger ?? createSilentLogger();

    if (!this.config.apiKey) {
      throw new Error('An API key is required for completions (FILLMARK_API_KEY or GROQ_API_KEY)');
    }

    // Retries and timeouts are handled here, not by the SDK
    this.client = new Groq({
      apiKey: this.config.apiKey,
      baseURL: this.config.baseUrl,
      maxRetries: 0,
    });
  }

  async complete(context: CompletionContext, signal?: AbortSignal): Promise<ProviderResponse> {
    const startTime = Date.now();
    const messages = buildCompletionMessages(context);
    let text = '';
    let tokensUsed = 0;

    for (let attempt = 0; attempt <= this.config.maxRetries; attempt++) {
      throwIfAborted(signal);

      const attemptController = new AbortController();
      const onAbort = () => attemptController.abort();
      signal?.addEventListener('abort', onAbort, { once: true });

      try {
        const response = await this.withTimeout(
          this.client.chat.completions.create(
            {
              model: this.config.model,
              messages,
              max_tokens: this.config.maxTokens,
              temperature: this.config.temperature,
            },
            { signal: attemptController.signal }
          ),
          this.config.timeoutMs,
          attemptController
        );

        text = response.choices[0]?.message?.content || '';
        tokensUsed = response.usage?.total_tokens || 0;
        break;
      } catch (error) {
        if (signal?.aborted || !isRetryable(error) || attempt === this.config.maxRetries) {
          throw error;
        }

        // Exponential backoff: 1s, 2s, 4s
        const backoffMs = Math.pow(2, attempt) * 1000;
        this.logger.warn(
          `Completion attempt ${attempt + 1} for ${context.path} failed (${errorMessage(error)}), retrying in ${backoffMs}ms`
        );
        await delay(backoffMs, signal);
      } finally {
        signal?.removeEventListener('abort', onAbort);
      }
    }

    this.totalTokensUsed += tokensUsed;
    this.callCount++;

    return {
      text,
      tokensUsed,
      model: this.config.model,
      latencyMs: Date.now() - startTime,
    };
  }

  getStats(): CompletionStats {
    return {
      totalTokensUsed: this.totalTokensUsed,
      callCount: this.callCount,
      averageTokensPerCall: this.callCount > 0 ? this.totalTokensUsed / this.callCount : 0,
    };
  }

  /**
   * Race a request against a timer; on timeout the request is aborted too.
   */
  private async withTimeout<T>(
    promise: Promise<T>,
    timeoutMs: number,
    controller: AbortController
  ): Promise<T> {
    let timeoutId: NodeJS.Timeout | undefined;

    const timeoutPromise = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => {
        reject(new Error(`Completion request timeout after ${timeoutMs}ms`));
        controller.abort();
      }, timeoutMs);
    });

    try {
      return await Promise.race([promise, timeoutPromise]);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

function isRetryable(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  const message = error.message.toLowerCase();
  const status = 'status' in error ? error.status : undefined;
  return message.includes('timeout') || message.includes('rate limit') || status === 429;
}

function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new Error('Completion request aborted');
  }
}

function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(new Error('Completion request aborted'));
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

function stripUndefined(config: Partial<AIConfig>): Partial<AIConfig> {
  const result: Partial<AIConfig> = {};
  for (const [key, value] of Object.entries(config)) {
    if (value !== undefined) {
      Object.assign(result, { [key]: value });
    }
  }
  return result;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
