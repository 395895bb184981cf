/**
 * Prompt templates
 *
 * Templates use `{name}` placeholders; `{{` and `}}` stand for literal braces.
 * The named set is read once per process and frozen.
 */

import { readFileSync } from 'fs';
import bundledTemplates from './data/prompt-templates.json';
import { Config } from './config';
import { ConfigurationError } from './errors';
import { Logger } from './utils';

const TOKEN = /\{\{|\}\}|\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

export class PromptTemplate {
  readonly placeholders: readonly string[];

  constructor(readonly name: string, readonly template: string) {
    const names = new Set<string>();
    for (const match of template.matchAll(TOKEN)) {
      if (match[1]) {
        names.add(match[1]);
      }
    }
    this.placeholders = Object.freeze([...names]);
  }

  format(values: Record<string, string>): string {
    return this.template.replace(TOKEN, (token: string, placeholder: string | undefined) => {
      if (token === '{{') return '{';
      if (token === '}}') return '}';
      const value = placeholder === undefined ? undefined : values[placeholder];
      if (value === undefined) {
        throw new ConfigurationError(`Template "${this.name}" needs a value for {${placeholder}}`);
      }
      return value;
    });
  }
}

export const TEMPLATE_NAMES = [
  'summarize_snippet',
  'summarize_summaries',
  'remove_sponsors_from_summary',
  'rewrite_as_a_podcast_transcript',
] as const;

export type TemplateName = (typeof TEMPLATE_NAMES)[number];

export type PromptTemplates = Readonly<Record<TemplateName, PromptTemplate>>;

const REQUIRED_PLACEHOLDERS: Record<TemplateName, string[]> = {
  summarize_snippet: ['snippet'],
  summarize_summaries: ['summaries'],
  remove_sponsors_from_summary: ['summary'],
  rewrite_as_a_podcast_transcript: ['podcast', 'summary', 'episode_name'],
};

/**
 * Validate a parsed template file and build the frozen lookup table
 */
export function loadPromptTemplates(source: unknown): PromptTemplates {
  if (typeof source !== 'object' || source === null || Array.isArray(source)) {
    throw new ConfigurationError('Prompt template file must contain a JSON object');
  }

  const entries = new Map(Object.entries(source));

  const build = (name: TemplateName): PromptTemplate => {
    const text = entries.get(name);
    if (typeof text !== 'string') {
      throw new ConfigurationError(`Prompt template "${name}" is missing`);
    }

    const template = new PromptTemplate(name, text);
    const missing = REQUIRED_PLACEHOLDERS[name].filter(p => !template.placeholders.includes(p));
    if (missing.length > 0) {
      throw new ConfigurationError(`Prompt template "${name}" lacks {${missing.join('}, {')}}`);
    }
    return template;
  };

  return Object.freeze({
    summarize_snippet: build('summarize_snippet'),
    summarize_summaries: build('summarize_summaries'),
    remove_sponsors_from_summary: build('remove_sponsors_from_summary'),
    rewrite_as_a_podcast_transcript: build('rewrite_as_a_podcast_transcript'),
  });
}

let loaded: PromptTemplates | undefined;

/**
 * The process-wide template table. Reads PROMPT_TEMPLATES_PATH when set,
 * otherwise the bundled templates.
 */
export function getPromptTemplates(): PromptTemplates {
  if (!loaded) {
    const path = Config.PROMPT_TEMPLATES_PATH;
    if (path) {
      Logger.info('Loading prompt templates', { path });
      let parsed: unknown;
      try {
        parsed = JSON.parse(readFileSync(path, 'utf-8'));
      } catch (error) {
        throw new ConfigurationError(`Could not read prompt templates from ${path}: ${String(error)}`);
      }
      loaded = loadPromptTemplates(parsed);
    } else {
      loaded = loadPromptTemplates(bundledTemplates);
    }
  }
  return loaded;
}
