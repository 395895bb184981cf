/**
 * Summarizer Agent - Map-reduce summarization of a long transcript into talk show dialog
 */

import { BaseAgent } from './base';
import type { AgentOptions } from './base';
import { Config } from '../config';
import { ConfigurationError } from '../errors';
import { getPromptTemplates } from '../prompts';
import type { PromptTemplates } from '../prompts';
import type { CompletionBackend } from '../tools/completion';
import { segment, splitSentences } from '../tools/segmenter';
import type { Chunk } from '../types';
import { Logger } from '../utils';

export interface SummarizerInput {
  transcript: string | string[];
  podcast: string;
  episode_name: string;
  page_size?: number;
}

export interface SummarizerOutput {
  chunk_count: number;
  summaries: string[];
  metasummary: string;
  cleaned_summary: string;
  dialog: string;
}

export interface SummarizerOptions extends AgentOptions {
  pageSize?: number;
  mapConcurrency?: number;
  templates?: PromptTemplates;
}

export function formatSummaryList(summaries: readonly string[]): string {
  return summaries.map(summary => ` - ${summary}`).join('\n');
}

export class SummarizerAgent extends BaseAgent<SummarizerInput, SummarizerOutput> {
  private pageSize: number;
  private mapConcurrency: number;
  private templates: PromptTemplates;

  constructor(backend: CompletionBackend, options: SummarizerOptions = {}) {
    const { pageSize, mapConcurrency, templates, ...agentOptions } = options;
    super(backend, { name: 'SummarizerAgent', ...agentOptions });

    this.pageSize = pageSize ?? Config.PAGE_SIZE;
    this.mapConcurrency = mapConcurrency ?? Config.MAP_CONCURRENCY;
    this.templates = templates ?? getPromptTemplates();

    if (!Number.isInteger(this.mapConcurrency) || this.mapConcurrency < 1) {
      throw new ConfigurationError(`Map concurrency must be a positive integer, got ${this.mapConcurrency}`);
    }
  }

  protected async process(input: SummarizerInput): Promise<SummarizerOutput> {
    const sentences = typeof input.transcript === 'string'
      ? splitSentences(input.transcript)
      : input.transcript;
    if (sentences.length === 0) {
      throw new ConfigurationError('Transcript contains no sentences');
    }
    const chunks = segment(sentences, input.page_size ?? this.pageSize);

    Logger.info('Summarizing transcript', {
      sentences: sentences.length,
      chunks: chunks.length,
      page_size: input.page_size ?? this.pageSize,
    });
    Logger.debug('Transcript sentences', { sentences });

    const summaries = await this.summarizeChunks(chunks);
    Logger.debug('Chunk summaries', { summaries });

    const metasummary = await this.summarizeSummaries(summaries);
    Logger.debug('Metasummary', { metasummary });

    const cleanedSummary = await this.removeSponsors(metasummary);
    Logger.debug('Metasummary without sponsors', { summary: cleanedSummary });

    const dialog = await this.rewriteAsTranscript(cleanedSummary, input.podcast, input.episode_name);
    Logger.debug('New podcast dialog', { dialog });

    return {
      chunk_count: chunks.length,
      summaries,
      metasummary,
      cleaned_summary: cleanedSummary,
      dialog,
    };
  }

  /**
   * Map stage. Chunks are independent, so each batch runs concurrently;
   * results keep chunk order.
   */
  async summarizeChunks(chunks: readonly Chunk[]): Promise<string[]> {
    const summaries: string[] = [];

    for (let i = 0; i < chunks.length; i += this.mapConcurrency) {
      const batch = chunks.slice(i, i + this.mapConcurrency);
      const batchResults = await Promise.all(
        batch.map(chunk => this.summarizeSnippet(chunk.text))
      );
      summaries.push(...batchResults);
    }

    return summaries;
  }

  async summarizeSnippet(snippet: string): Promise<string> {
    return this.complete(this.templates.summarize_snippet.format({ snippet }));
  }

  async summarizeSummaries(summaries: readonly string[]): Promise<string> {
    return this.complete(
      this.templates.summarize_summaries.format({ summaries: formatSummaryList(summaries) })
    );
  }

  async removeSponsors(summary: string): Promise<string> {
    return this.complete(this.templates.remove_sponsors_from_summary.format({ summary }));
  }

  async rewriteAsTranscript(summary: string, podcast: string, episodeName: string): Promise<string> {
    return this.complete(
      this.templates.rewrite_as_a_podcast_transcript.format({
        podcast,
        summary,
        episode_name: episodeName,
      })
    );
  }
}
