/**
 * Dialogue Model client - a single chat completion per call
 */

import OpenAI from 'openai';
import { Config } from '../config';
import { DialogueModelError, errorMessage } from '../errors';
import { Logger } from '../utils';
import { createChatCompletion } from '../utils/openai-helper';

export interface ChatRequest {
  system: string;
  user: string;
  temperature: number;
  maxTokens: number;
  /** Ask the model for a JSON object response */
  json?: boolean;
}

export interface ChatModel {
  complete(request: ChatRequest): Promise<string>;
}

export class OpenAiChatModel implements ChatModel {
  private client: OpenAI;

  constructor(
    private model: string = Config.OPENAI_MODEL,
    client?: OpenAI
  ) {
    this.client = client ?? new OpenAI({ apiKey: Config.OPENAI_API_KEY });
  }

  async complete(request: ChatRequest): Promise<string> {
    const { system, user, temperature, maxTokens, json = false } = request;

    Logger.info('Calling dialogue model', {
      model: this.model,
      temperature,
      max_tokens: maxTokens,
      prompt_chars: system.length + user.length,
    });

    try {
      const response = await createChatCompletion(
        this.client,
        {
          model: this.model,
          messages: [
            { role: 'system', content: system },
            { role: 'user', content: user },
          ],
          temperature,
          max_tokens: maxTokens,
          ...(json ? { response_format: { type: 'json_object' as const } } : {}),
        },
        {
          maxRetries: 3,
          initialDelayMs: 1000,
          maxDelayMs: 10000,
          backoffMultiplier: 2,
        }
      );

      const choice = response.choices[0];
      Logger.info('Dialogue model responded', {
        finish_reason: choice?.finish_reason,
        completion_tokens: response.usage?.completion_tokens,
      });

      return choice?.message?.content ?? '';
    } catch (error) {
      throw new DialogueModelError(`Dialogue model request failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}
