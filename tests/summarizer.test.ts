/**
 * Tests for the map-reduce Summarizer Agent
 */

import { describe, it, expect } from 'vitest';
import { SummarizerAgent, formatSummaryList } from '../lib/agents/summarizer';
import { ConfigurationError, TransportError } from '../lib/errors';
import { loadPromptTemplates } from '../lib/prompts';
import type { CompletionRequest } from '../lib/types';
import { FakeCompletionBackend, NO_DELAY } from './helpers';

const templates = loadPromptTemplates({
  summarize_snippet: 'SNIPPET {snippet}',
  summarize_summaries: 'SUMMARIES\n{summaries}',
  remove_sponsors_from_summary: 'CLEAN {summary}',
  rewrite_as_a_podcast_transcript: 'REWRITE {podcast} / {episode_name} / {summary}',
});

function respond(request: CompletionRequest): string {
  const { prompt } = request;
  if (prompt.startsWith('SNIPPET ')) return `  summary of [${prompt.slice('SNIPPET '.length)}]  `;
  if (prompt.startsWith('SUMMARIES')) return 'meta';
  if (prompt.startsWith('CLEAN ')) return `clean ${prompt.slice('CLEAN '.length)}`;
  if (prompt.startsWith('REWRITE ')) return '\nWelcome to the show.\n';
  throw new Error(`Unexpected prompt: ${prompt}`);
}

describe('formatSummaryList', () => {
  it('should bullet each summary on its own line', () => {
    expect(formatSummaryList(['a', 'b'])).toBe(' - a\n - b');
  });
});

describe('SummarizerAgent', () => {
  it('should run map, reduce, clean and style in order', async () => {
    const backend = new FakeCompletionBackend([], respond);
    const agent = new SummarizerAgent(backend, { templates, pageSize: 2, ...NO_DELAY });

    const result = await agent.execute('test-run', {
      transcript: ['One.', 'Two.', 'Three.'],
      podcast: 'Space Hour',
      episode_name: 'Into Orbit',
    });

    expect(result.errors).toEqual([]);
    expect(result.completion_calls).toBe(5);
    expect(result.output).toEqual({
      chunk_count: 2,
      summaries: ['summary of [One. Two.]', 'summary of [Three.]'],
      metasummary: 'meta',
      cleaned_summary: 'clean meta',
      dialog: 'Welcome to the show.',
    });

    const prompts = backend.requests.map(r => r.prompt);
    expect(prompts.slice(2)).toEqual([
      'SUMMARIES\n - summary of [One. Two.]\n - summary of [Three.]',
      'CLEAN meta',
      'REWRITE Space Hour / Into Orbit / clean meta',
    ]);
    expect(backend.requests.every(r => r.max_tokens === 256 && r.output_prefix === '')).toBe(true);
  });

  it('should split raw transcript text into sentences first', async () => {
    const backend = new FakeCompletionBackend([], respond);
    const agent = new SummarizerAgent(backend, { templates, pageSize: 1, ...NO_DELAY });

    const result = await agent.execute('test-run', {
      transcript: 'First point. Second point!',
      podcast: 'Space Hour',
      episode_name: 'Into Orbit',
    });

    expect(result.output?.summaries).toEqual(['summary of [First point.]', 'summary of [Second point!]']);
  });

  it('should keep chunk order when later chunks finish first', async () => {
    const backend = new FakeCompletionBackend([], async request => {
      if (request.prompt === 'SNIPPET A.') {
        await new Promise(resolve => setTimeout(resolve, 20));
      }
      return respond(request);
    });
    const agent = new SummarizerAgent(backend, { templates, pageSize: 1, mapConcurrency: 3, ...NO_DELAY });

    const summaries = await agent.summarizeChunks([
      { index: 0, sentences: ['A.'], text: 'A.' },
      { index: 1, sentences: ['B.'], text: 'B.' },
      { index: 2, sentences: ['C.'], text: 'C.' },
    ]);

    expect(summaries).toEqual(['summary of [A.]', 'summary of [B.]', 'summary of [C.]']);
  });

  it('should retry a failed stage on its own budget', async () => {
    const backend = new FakeCompletionBackend(
      [new TransportError('timeout'), new TransportError('timeout')],
      respond
    );
    const agent = new SummarizerAgent(backend, { templates, pageSize: 5, ...NO_DELAY });

    const result = await agent.execute('test-run', {
      transcript: ['Only.'],
      podcast: 'Space Hour',
      episode_name: 'Into Orbit',
    });

    expect(result.output?.summaries).toEqual(['summary of [Only.]']);
    expect(result.completion_calls).toBe(6);
  });

  it('should abort the pipeline once a stage exhausts its retries', async () => {
    const backend = new FakeCompletionBackend([], request => {
      if (request.prompt.startsWith('CLEAN')) {
        throw new TransportError('service unavailable', 503);
      }
      return respond(request);
    });
    const agent = new SummarizerAgent(backend, { templates, pageSize: 5, plainRetries: 3, ...NO_DELAY });

    await expect(agent.execute('test-run', {
      transcript: ['Only.'],
      podcast: 'Space Hour',
      episode_name: 'Into Orbit',
    })).rejects.toThrow('service unavailable');

    const prompts = backend.requests.map(r => r.prompt);
    expect(prompts.filter(p => p.startsWith('CLEAN'))).toHaveLength(3);
    expect(prompts.some(p => p.startsWith('REWRITE'))).toBe(false);
  });

  it('should reject an invalid page size without calling the model', async () => {
    const backend = new FakeCompletionBackend([], respond);
    const agent = new SummarizerAgent(backend, { templates, ...NO_DELAY });

    await expect(agent.execute('test-run', {
      transcript: ['One.'],
      podcast: 'Space Hour',
      episode_name: 'Into Orbit',
      page_size: 0,
    })).rejects.toBeInstanceOf(ConfigurationError);
    expect(backend.requests).toHaveLength(0);
  });

  it('should reject a transcript with no sentences without calling the model', async () => {
    const backend = new FakeCompletionBackend([], respond);
    const agent = new SummarizerAgent(backend, { templates, ...NO_DELAY });

    await expect(agent.execute('test-run', {
      transcript: '   \n\n ',
      podcast: 'Space Hour',
      episode_name: 'Into Orbit',
    })).rejects.toThrow('Transcript contains no sentences');
    await expect(agent.execute('test-run', {
      transcript: [],
      podcast: 'Space Hour',
      episode_name: 'Into Orbit',
    })).rejects.toBeInstanceOf(ConfigurationError);
    expect(backend.requests).toHaveLength(0);
  });

  it('should reject an invalid map concurrency', () => {
    expect(() => new SummarizerAgent(new FakeCompletionBackend(), { templates, mapConcurrency: 0 }))
      .toThrow(ConfigurationError);
  });
});
