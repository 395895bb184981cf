/**
 * Completion Tool - Text completion backends and the plain completion call
 */

import OpenAI from 'openai';
import { Config } from '../config';
import { ConfigurationError } from '../errors';
import type { CompletionRequest } from '../types';
import { Logger } from '../utils';
import { createCompletion } from '../utils/openai-helper';

export const SAMPLING = {
  temperature: 0.7,
  top_p: 1,
  frequency_penalty: 0,
  presence_penalty: 0,
} as const;

/**
 * Anything that can continue a prompt. Returns only the generated text.
 */
export interface CompletionBackend {
  complete(request: CompletionRequest): Promise<string>;
}

export function buildCompletionRequest(
  prompt: string,
  maxTokens: number,
  outputPrefix = '',
  model = Config.COMPLETION_MODEL
): CompletionRequest {
  if (!Number.isInteger(maxTokens) || maxTokens < 1) {
    throw new ConfigurationError(`max_tokens must be a positive integer, got ${maxTokens}`);
  }
  return {
    prompt,
    model,
    max_tokens: maxTokens,
    ...SAMPLING,
    output_prefix: outputPrefix,
  };
}

export class OpenAICompletionBackend implements CompletionBackend {
  private client: OpenAI;

  constructor(client?: OpenAI) {
    if (!client && !Config.OPENAI_API_KEY) {
      throw new ConfigurationError('Missing OPENAI_API_KEY');
    }
    this.client = client ?? new OpenAI({ apiKey: Config.OPENAI_API_KEY });
  }

  async complete(request: CompletionRequest): Promise<string> {
    Logger.debug('Calling OpenAI completion', {
      model: request.model,
      max_tokens: request.max_tokens,
      promptLength: request.prompt.length,
    });

    return createCompletion(this.client, {
      model: request.model,
      // The prefix is part of the prompt, so the model only writes what follows it
      prompt: request.prompt + request.output_prefix,
      max_tokens: request.max_tokens,
      temperature: request.temperature,
      top_p: request.top_p,
      frequency_penalty: request.frequency_penalty,
      presence_penalty: request.presence_penalty,
    });
  }
}

export class PlainCompletionTool {
  constructor(
    private backend: CompletionBackend,
    private model: string = Config.COMPLETION_MODEL
  ) {}

  /**
   * Single completion call; returns the trimmed continuation
   */
  async complete(prompt: string, maxTokens = 256): Promise<string> {
    const request = buildCompletionRequest(prompt, maxTokens, '', this.model);
    const completion = await this.backend.complete(request);
    return completion.trim();
  }
}
