/**
 * OpenAI API Helper with Rate Limiting and Retry Logic
 */

import OpenAI from 'openai';
import { Logger, sleep } from '../utils';

export interface RetryOptions {
  maxRetries?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
}

const RETRYABLE_STATUSES = new Set([429, 500, 502, 503, 504]);

function statusOf(error: unknown): number | undefined {
  return error instanceof OpenAI.APIError ? error.status : undefined;
}

export function isRetryableError(error: unknown): boolean {
  const status = statusOf(error);
  if (status !== undefined && RETRYABLE_STATUSES.has(status)) {
    return true;
  }
  return error instanceof Error && error.message.toLowerCase().includes('rate limit');
}

/**
 * Retry wrapper with exponential backoff for OpenAI API calls
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxRetries = 3,
    initialDelayMs = 1000,
    maxDelayMs = 10000,
    backoffMultiplier = 2,
  } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);

      // Don't retry on non-retryable errors
      if (!isRetryableError(error)) {
        Logger.error('Non-retryable OpenAI error', {
          attempt,
          status: statusOf(error),
          error: message,
        });
        throw error;
      }

      if (attempt >= maxRetries) {
        Logger.error('Max retries exceeded', {
          maxRetries,
          lastError: message,
        });
        throw error;
      }

      const delay = Math.min(
        initialDelayMs * Math.pow(backoffMultiplier, attempt),
        maxDelayMs
      );

      // Jitter so parallel callers don't retry in lockstep
      const finalDelay = delay + Math.random() * 0.3 * delay;

      Logger.warn('Rate limit hit, retrying with backoff', {
        attempt: attempt + 1,
        maxRetries,
        delayMs: Math.round(finalDelay),
        status: statusOf(error),
      });

      await sleep(finalDelay);
    }
  }
}

/**
 * Create OpenAI chat completion with retry logic
 */
export async function createChatCompletion(
  client: OpenAI,
  params: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming,
  retryOptions?: RetryOptions
): Promise<OpenAI.Chat.ChatCompletion> {
  return retryWithBackoff(
    () => client.chat.completions.create(params),
    retryOptions
  );
}

/**
 * Create OpenAI TTS with retry logic, resolving to the raw audio bytes
 */
export async function createSpeech(
  client: OpenAI,
  params: OpenAI.Audio.SpeechCreateParams,
  retryOptions?: RetryOptions
): Promise<Buffer> {
  return retryWithBackoff(
    async () => {
      const response = await client.audio.speech.create(params);
      return Buffer.from(await response.arrayBuffer());
    },
    retryOptions
  );
}
