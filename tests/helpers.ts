/**
 * In-process stand-ins for the completion backend
 */

import type { CompletionBackend } from '../lib/tools/completion';
import type { CompletionRequest } from '../lib/types';

export type FakeResponse = string | Error | ((request: CompletionRequest) => string | Promise<string>);

/**
 * Answers each request with the next queued response, or with `fallback`
 * once the queue is empty.
 */
export class FakeCompletionBackend implements CompletionBackend {
  requests: CompletionRequest[] = [];

  constructor(
    private responses: FakeResponse[] = [],
    private fallback?: FakeResponse
  ) {}

  async complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request);
    const response = this.responses.length > 0 ? this.responses.shift() : this.fallback;

    if (response === undefined) {
      throw new Error(`No fake response queued for request ${this.requests.length}`);
    }
    if (response instanceof Error) {
      throw response;
    }
    if (typeof response === 'function') {
      return response(request);
    }
    return response;
  }
}

export const NO_DELAY = {
  structuredRetryDelayMs: 0,
  plainRetryDelayMs: 0,
};
