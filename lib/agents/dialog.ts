/**
 * Dialog Agent - Turns a short episode description into talk show dialog
 */

import { BaseAgent } from './base';
import type { AgentOptions } from './base';
import { Config } from '../config';
import { PromptTemplate } from '../prompts';
import type { CompletionBackend } from '../tools/completion';
import { TaglineSalvage } from '../tools/structured-completion';
import { Logger, cleanText, titleCase } from '../utils';

export interface DialogInput {
  podcast_title: string;
  episode_title: string;
  description: string;
}

export interface DialogOutput {
  summary: string;
  dialog: string;
  opening_line: string;
}

export interface DialogOptions extends AgentOptions {
  hostName?: string;
}

const SUMMARIZE = new PromptTemplate('SUMMARIZE', `Please summarize the following podcast description as a JSON. Only include \
information about the content of the episode. For example, ignore links \
to the podcast's website and social media accounts.

Description: {description}

`);

const REWRITE = new PromptTemplate('REWRITE', `Please write dialog for a talk show where the host, "{host}," discusses and \
summarizes a podcast. There are no guests on this show. Respond with JSON and \
make sure to end with the tagline: "${TaglineSalvage.CLOSING}"

For example, consider the following summary.

Summary: This week on the Backyard Science Hour, Maya Ortiz and Ben Alder test \
whether houseplants really clean indoor air, visit a community weather station, \
and answer a listener question about why bread goes stale.

For that summary, you could write the following:

{{"dialog": "Welcome! Today we are summarizing The Backyard Science Hour. On \
this episode, Maya Ortiz and Ben Alder test whether houseplants really clean \
indoor air, visit a community weather station, and answer a listener question \
about why bread goes stale. ${TaglineSalvage.CLOSING}"}}

In this case, summarize {podcast_title}:

Summary: {summary}

`);

const OPENING_LINE = new PromptTemplate(
  'OPENING_LINE',
  "Welcome back. I'm {host}, an artificial intelligence that summarizes podcasts. Today we are summarizing {podcast_title}: {episode_title}."
);

/**
 * Title-case a podcast title for use inside a sentence, adding "the" unless
 * it already starts with an article.
 */
export function normalizePodcastTitle(title: string): string {
  const trimmed = cleanText(title);
  const withArticle = /^(a|the)\b/i.test(trimmed) ? trimmed : `the ${trimmed}`;
  return titleCase(withArticle);
}

export function buildOpeningLine(podcastTitle: string, episodeTitle: string, host = Config.HOST_NAME): string {
  return OPENING_LINE.format({
    host,
    podcast_title: normalizePodcastTitle(podcastTitle),
    episode_title: titleCase(cleanText(episodeTitle)),
  });
}

export class DialogAgent extends BaseAgent<DialogInput, DialogOutput> {
  private hostName: string;
  private salvage = new TaglineSalvage();

  constructor(backend: CompletionBackend, options: DialogOptions = {}) {
    const { hostName, ...agentOptions } = options;
    super(backend, { name: 'DialogAgent', ...agentOptions });
    this.hostName = hostName ?? Config.HOST_NAME;
  }

  protected async process(input: DialogInput): Promise<DialogOutput> {
    Logger.info('Description', { description: input.description });

    const summary = await this.generateSummary(input.description);
    const openingLine = buildOpeningLine(input.podcast_title, input.episode_title, this.hostName);
    const dialog = await this.generateDialog(summary, input.podcast_title, openingLine);

    return { summary, dialog, opening_line: openingLine };
  }

  async generateSummary(description: string): Promise<string> {
    const summary = await this.completeField({
      prompt: SUMMARIZE.format({ description: cleanText(description) }),
      key: 'summary',
      maxTokens: 512,
    });
    Logger.info('Summary', { summary });
    return summary;
  }

  async generateDialog(summary: string, podcastTitle: string, openingLine: string): Promise<string> {
    const dialog = await this.completeField({
      prompt: REWRITE.format({
        host: this.hostName,
        podcast_title: normalizePodcastTitle(podcastTitle),
        summary: cleanText(summary),
      }),
      key: 'dialog',
      outputPrefix: openingLine,
      salvage: this.salvage,
      maxTokens: 600,
    });
    Logger.info('Dialog', { dialog });
    return dialog;
  }
}
