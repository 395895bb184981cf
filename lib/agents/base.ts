/**
 * Base Agent class - Foundation for the pipeline's completion-driven agents
 */

import { Config } from '../config';
import { ConfigurationError, isRetryableError } from '../errors';
import { PlainCompletionTool } from '../tools/completion';
import type { CompletionBackend } from '../tools/completion';
import { StructuredCompletionTool } from '../tools/structured-completion';
import type { StructuredCompletionOptions } from '../tools/structured-completion';
import type { AgentMessage } from '../types';
import { Logger, errorMessage, retry } from '../utils';

export interface AgentConfig {
  name: string;
  model?: string;
  structuredRetries?: number;
  structuredRetryDelayMs?: number;
  plainRetries?: number;
  plainRetryDelayMs?: number;
}

export type AgentOptions = Omit<AgentConfig, 'name'>;

export abstract class BaseAgent<TInput, TOutput> {
  protected config: Required<AgentConfig>;
  protected plain: PlainCompletionTool;
  protected structured: StructuredCompletionTool;

  // Completion calls made during the current execution, retries included
  protected completionCalls: number = 0;

  constructor(backend: CompletionBackend, config: AgentConfig) {
    this.config = {
      model: Config.COMPLETION_MODEL,
      structuredRetries: Config.STRUCTURED_RETRIES,
      structuredRetryDelayMs: Config.STRUCTURED_RETRY_DELAY_MS,
      plainRetries: Config.PLAIN_RETRIES,
      plainRetryDelayMs: Config.PLAIN_RETRY_DELAY_MS,
      ...config,
    };

    for (const name of ['structuredRetries', 'plainRetries'] as const) {
      const value = this.config[name];
      if (!Number.isInteger(value) || value < 1) {
        throw new ConfigurationError(`${name} must be a positive integer, got ${value}`);
      }
    }
    for (const name of ['structuredRetryDelayMs', 'plainRetryDelayMs'] as const) {
      const value = this.config[name];
      if (!Number.isInteger(value) || value < 0) {
        throw new ConfigurationError(`${name} must be a non-negative integer, got ${value}`);
      }
    }

    this.plain = new PlainCompletionTool(backend, this.config.model);
    this.structured = new StructuredCompletionTool(backend, this.config.model);
  }

  /**
   * Run the agent once and record what happened. Failures are logged and rethrown.
   */
  async execute(runId: string, input: TInput): Promise<AgentMessage<TInput, TOutput>> {
    const startTime = Date.now();
    this.completionCalls = 0;

    const message: AgentMessage<TInput, TOutput> = {
      agent: this.config.name,
      run_id: runId,
      timestamp: new Date().toISOString(),
      input,
      errors: [],
      completion_calls: 0,
    };

    try {
      Logger.info(`${this.config.name} starting`, { runId });

      message.output = await this.process(input);
      message.duration_ms = Date.now() - startTime;
      message.completion_calls = this.completionCalls;

      Logger.info(`${this.config.name} completed`, {
        runId,
        completion_calls: this.completionCalls,
        duration_ms: message.duration_ms,
      });

      return message;
    } catch (error) {
      message.errors.push(errorMessage(error));
      message.duration_ms = Date.now() - startTime;

      Logger.error(`${this.config.name} failed`, {
        runId,
        error: errorMessage(error),
        completion_calls: this.completionCalls,
        duration_ms: message.duration_ms,
      });

      throw error;
    }
  }

  protected abstract process(input: TInput): Promise<TOutput>;

  /**
   * Helper: plain completion, retried on its own budget
   */
  protected async complete(prompt: string, maxTokens = 256): Promise<string> {
    return retry(
      () => {
        this.completionCalls++;
        return this.plain.complete(prompt, maxTokens);
      },
      {
        maxRetries: this.config.plainRetries,
        delayMs: this.config.plainRetryDelayMs,
        backoff: false,
        retryIf: isRetryableError,
        onError: (error, attempt) => {
          Logger.warn(`${this.config.name} completion attempt ${attempt} failed`, {
            error: errorMessage(error),
          });
        },
      }
    );
  }

  /**
   * Helper: structured completion. Each retry asks the model again from scratch.
   */
  protected async completeField(options: StructuredCompletionOptions): Promise<string> {
    return retry(
      () => {
        this.completionCalls++;
        return this.structured.complete(options);
      },
      {
        maxRetries: this.config.structuredRetries,
        delayMs: this.config.structuredRetryDelayMs,
        backoff: false,
        retryIf: isRetryableError,
        onError: (error, attempt) => {
          Logger.warn(`${this.config.name} "${options.key}" attempt ${attempt} failed`, {
            error: errorMessage(error),
          });
        },
      }
    );
  }
}
