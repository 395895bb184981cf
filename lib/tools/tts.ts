/**
 * TTS Tool - Text-to-speech for finished dialog transcripts
 */

import OpenAI from 'openai';
import { Config } from '../config';
import { ConfigurationError, isRetryableError } from '../errors';
import type { TtsMethod, TtsVoice } from '../types';
import { Logger, errorMessage, retry, stripControlCharacters } from '../utils';
import { createSpeech } from '../utils/openai-helper';
import { splitSentences } from './segmenter';

export interface TtsOptions {
  voice: TtsVoice;
  text: string;
  model: string;
  format?: 'mp3' | 'opus' | 'aac' | 'flac';
  speed?: number;
}

// Method name -> speech model
export const TTS_BACKENDS: Readonly<Record<TtsMethod, { model: string }>> = {
  openai: { model: 'tts-1' },
  'openai-hd': { model: 'tts-1-hd' },
};

const VOICES: readonly TtsVoice[] = ['alloy', 'echo', 'fable', 'onyx', 'nova', 'shimmer'];

const MAX_INPUT_CHARS = 4000;

export function parseVoice(voice: string): TtsVoice {
  const match = VOICES.find(v => v === voice);
  if (!match) {
    throw new ConfigurationError(`Unknown TTS voice "${voice}"`);
  }
  return match;
}

/**
 * Pack whole sentences into segments no longer than `maxChars`.
 * A single sentence longer than the limit is cut at word boundaries, and a
 * word longer than the limit into pieces of `maxChars`.
 */
export function splitForSpeech(text: string, maxChars = MAX_INPUT_CHARS): string[] {
  const segments: string[] = [];
  let current = '';

  const pushPiece = (piece: string) => {
    if (!current) {
      current = piece;
    } else if (current.length + 1 + piece.length <= maxChars) {
      current += ' ' + piece;
    } else {
      segments.push(current);
      current = piece;
    }
  };

  for (const sentence of splitSentences(stripControlCharacters(text))) {
    if (sentence.length <= maxChars) {
      pushPiece(sentence);
      continue;
    }
    for (const word of sentence.split(' ')) {
      for (let start = 0; start < word.length; start += maxChars) {
        pushPiece(word.slice(start, start + maxChars));
      }
    }
  }

  if (current) {
    segments.push(current);
  }
  return segments;
}

export class TtsTool {
  private client: OpenAI;

  constructor(client?: OpenAI) {
    if (!client && !Config.OPENAI_API_KEY) {
      throw new ConfigurationError('Missing OPENAI_API_KEY');
    }
    this.client = client ?? new OpenAI({ apiKey: Config.OPENAI_API_KEY });
  }

  async synthesize(options: TtsOptions): Promise<Buffer> {
    const { voice, text, model, format = 'mp3', speed = 1 } = options;

    Logger.info('Starting TTS call', {
      voice,
      model,
      textLength: text.length,
    });

    const buffer = await retry(
      () => createSpeech(this.client, {
        model,
        voice,
        input: text,
        response_format: format,
        speed,
      }),
      {
        maxRetries: Config.PLAIN_RETRIES,
        delayMs: Config.PLAIN_RETRY_DELAY_MS,
        backoff: false,
        retryIf: isRetryableError,
        onError: (error, attempt) => {
          Logger.warn(`TTS attempt ${attempt} failed`, { error: errorMessage(error) });
        },
      }
    );

    if (buffer.length === 0) {
      throw new Error('OpenAI TTS returned empty audio buffer');
    }

    return buffer;
  }

  /**
   * Speak a whole dialog transcript with the backend chosen by `method`
   */
  async synthesizeDialog(
    dialog: string,
    method: TtsMethod = Config.getTtsMethod(),
    voice: TtsVoice = parseVoice(Config.TTS_VOICE)
  ): Promise<Buffer> {
    const { model } = TTS_BACKENDS[method];
    const segments = splitForSpeech(dialog);
    const results: Buffer[] = [];

    Logger.info('Synthesizing dialog', { method, model, segments: segments.length });

    const concurrency = 2;
    for (let i = 0; i < segments.length; i += concurrency) {
      const batch = segments.slice(i, i + concurrency);
      const batchResults = await Promise.all(
        batch.map(text => this.synthesize({ voice, text, model }))
      );
      results.push(...batchResults);
    }

    return Buffer.concat(results);
  }
}
