/**
 * TTS Tool - Text-to-speech using OpenAI
 */

import OpenAI from 'openai';
import { Config } from '../config';
import { AudioRenderError, errorMessage } from '../errors';
import { TtsVoice } from '../types';
import { Logger } from '../utils';
import { createSpeech } from '../utils/openai-helper';
import { AudioTool, PcmClip } from './audio';

export interface TtsOptions {
  voice: TtsVoice;
  text: string;
  speed?: number;
}

export interface SpeechSynthesizer {
  synthesize(options: TtsOptions): Promise<PcmClip>;
}

export class TtsTool implements SpeechSynthesizer {
  private client: OpenAI;

  constructor(
    private model: string = Config.OPENAI_TTS_MODEL,
    client?: OpenAI
  ) {
    this.client = client ?? new OpenAI({ apiKey: Config.OPENAI_API_KEY });
  }

  async synthesize(options: TtsOptions): Promise<PcmClip> {
    const { voice, text, speed = Config.TTS_SPEED } = options;

    Logger.debug('Starting TTS API call', {
      voice,
      textLength: text.length,
      textPreview: text.substring(0, 100),
      speed,
    });

    let buffer: Buffer;
    try {
      buffer = await createSpeech(
        this.client,
        {
          model: this.model,
          voice,
          input: text,
          response_format: 'pcm',
          speed,
        },
        {
          maxRetries: 3,
          initialDelayMs: 2000,
          maxDelayMs: 15000,
          backoffMultiplier: 2,
        }
      );
    } catch (error) {
      throw new AudioRenderError(`Failed to generate speech: ${errorMessage(error)}`, { cause: error });
    }

    if (buffer.length === 0) {
      throw new AudioRenderError('OpenAI TTS returned empty audio buffer');
    }

    return AudioTool.fromPcm16(buffer, AudioTool.TTS_SAMPLE_RATE);
  }
}
