/**
 * OpenAI API helpers that report failures as TransportError
 */

import OpenAI from 'openai';
import { TransportError } from '../errors';
import { Logger, errorMessage } from '../utils';

function toTransportError(operation: string, error: unknown): TransportError {
  const status = error instanceof OpenAI.APIError ? error.status : undefined;
  const isRateLimit = status === 429;

  Logger.warn(`OpenAI ${operation} failed`, {
    status,
    isRateLimit,
    error: errorMessage(error),
  });

  return new TransportError(`OpenAI ${operation} failed: ${errorMessage(error)}`, status);
}

/**
 * Create a legacy text completion and return the generated continuation
 */
export async function createCompletion(
  client: OpenAI,
  params: OpenAI.Completions.CompletionCreateParamsNonStreaming
): Promise<string> {
  let response: OpenAI.Completions.Completion;
  try {
    response = await client.completions.create(params);
  } catch (error) {
    throw toTransportError('completion', error);
  }
  return response.choices[0]?.text ?? '';
}

/**
 * Create speech audio and return it as a buffer
 */
export async function createSpeech(
  client: OpenAI,
  params: OpenAI.Audio.SpeechCreateParams
): Promise<Buffer> {
  try {
    const response = await client.audio.speech.create(params);
    return Buffer.from(await response.arrayBuffer());
  } catch (error) {
    throw toTransportError('speech', error);
  }
}
