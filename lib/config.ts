/**
 * Configuration management for the recap pipeline
 */

import { ConfigurationError } from './errors';
import type { TtsMethod } from './types';

function intFromEnv(name: string, fallback: string): number {
  return parseInt(process.env[name] || fallback, 10);
}

export class Config {
  // OpenAI
  static OPENAI_API_KEY = process.env.OPENAI_API_KEY || '';
  static COMPLETION_MODEL = process.env.COMPLETION_MODEL || 'gpt-3.5-turbo-instruct';

  // Summarization
  static PAGE_SIZE = intFromEnv('PAGE_SIZE', '100');
  static MAP_CONCURRENCY = intFromEnv('MAP_CONCURRENCY', '2');
  static PROMPT_TEMPLATES_PATH = process.env.PROMPT_TEMPLATES_PATH || '';

  // Retry budgets
  static STRUCTURED_RETRIES = intFromEnv('STRUCTURED_RETRIES', '5');
  static STRUCTURED_RETRY_DELAY_MS = intFromEnv('STRUCTURED_RETRY_DELAY_MS', '2000');
  static PLAIN_RETRIES = intFromEnv('PLAIN_RETRIES', '3');
  static PLAIN_RETRY_DELAY_MS = intFromEnv('PLAIN_RETRY_DELAY_MS', '1000');

  // Show
  static HOST_NAME = process.env.HOST_NAME || 'RecapBot';

  // Speech
  static TTS_METHOD = process.env.TTS_METHOD || 'openai';
  static TTS_VOICE = process.env.TTS_VOICE || 'alloy';

  // HTTP
  static API_SECRET = process.env.API_SECRET || '';

  static getTtsMethod(): TtsMethod {
    return parseTtsMethod(Config.TTS_METHOD);
  }
}

export function parseTtsMethod(value: string): TtsMethod {
  if (value === 'openai' || value === 'openai-hd') {
    return value;
  }
  throw new ConfigurationError(`Unknown TTS method "${value}"`);
}
