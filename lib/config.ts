/**
 * Configuration management for the newscast system
 */

import { InputError } from './errors';

function intFromEnv(name: string, fallback: number): number {
  const parsed = parseInt(process.env[name] || '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function floatFromEnv(name: string, fallback: number): number {
  const parsed = parseFloat(process.env[name] || '');
  return Number.isNaN(parsed) ? fallback : parsed;
}

export class Config {
  // Credentials
  static NEWSAPI_KEY = process.env.NEWSAPI_KEY || '';
  static OPENAI_API_KEY = process.env.OPENAI_API_KEY || '';

  // News Source
  static NEWSAPI_BASE_URL = process.env.NEWSAPI_BASE_URL || 'https://newsapi.org/v2';
  static MAX_STORIES = intFromEnv('MAX_STORIES', 5);
  static HOURS_BACK = intFromEnv('HOURS_BACK', 24);

  // Dialogue Model
  static OPENAI_MODEL = process.env.OPENAI_MODEL || 'gpt-4o';
  static SCRIPT_TEMPERATURE = floatFromEnv('SCRIPT_TEMPERATURE', 0.9);
  static SCRIPT_MAX_TOKENS = intFromEnv('SCRIPT_MAX_TOKENS', 4000);

  // Voice Synthesizer
  static OPENAI_TTS_MODEL = process.env.OPENAI_TTS_MODEL || 'tts-1-hd';
  static TTS_SPEED = floatFromEnv('TTS_SPEED', 1.0);

  // Logging
  static LOG_LEVEL = process.env.LOG_LEVEL || 'info';

  static requireKeys(names: Array<'NEWSAPI_KEY' | 'OPENAI_API_KEY'>): void {
    const missing = names.filter(name => !Config[name]);
    if (missing.length > 0) {
      throw new InputError(`Missing required API keys: ${missing.join(', ')}`);
    }
  }
}
