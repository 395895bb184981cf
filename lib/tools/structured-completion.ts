/**
 * Structured Completion Tool - Ask the model for one named field and get exactly that field
 *
 * The completion is forced to open a JSON envelope (`{"<key>": "`), so the
 * model only has to finish the string value and close the object. The
 * envelope is then cut out of whatever else the model wrote, repaired by a
 * salvage strategy if it came back malformed, and parsed.
 */

import { Config } from '../config';
import { SalvageImpossibleError, StructuralError } from '../errors';
import { Logger, errorMessage, truncate } from '../utils';
import { buildCompletionRequest } from './completion';
import type { CompletionBackend } from './completion';

export interface SalvageStrategy {
  name: string;
  /** Returns a repaired candidate, or throws SalvageImpossibleError. */
  repair(candidate: string): string;
}

export interface StructuredCompletionOptions {
  prompt: string;
  key: string;
  maxTokens: number;
  outputPrefix?: string;
  salvage?: SalvageStrategy;
}

export function envelopeOpening(key: string, outputPrefix = ''): string {
  return `{${JSON.stringify(key)}: "${outputPrefix}`;
}

/**
 * Return the single top-level `{...}` span of `candidate`.
 * Braces inside JSON strings belong to the value and are not counted.
 */
export function extractEnvelope(candidate: string): string {
  const spans: string[] = [];
  let depth = 0;
  let start = -1;
  let inString = false;
  let escaped = false;

  for (let i = 0; i < candidate.length; i++) {
    const char = candidate[i];

    if (depth > 0 && inString) {
      if (escaped) {
        escaped = false;
      } else if (char === '\\') {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '{') {
      if (depth === 0) {
        start = i;
      }
      depth++;
    } else if (char === '}' && depth > 0) {
      depth--;
      if (depth === 0) {
        spans.push(candidate.slice(start, i + 1));
      }
    } else if (char === '"' && depth > 0) {
      inString = true;
    }
  }

  if (spans.length !== 1) {
    throw new StructuralError(
      'extraction',
      `Expected exactly one JSON object in completion, found ${spans.length}`,
      candidate
    );
  }

  return spans[0];
}

/**
 * Escape raw line breaks and tabs that appear inside JSON string literals.
 */
export function escapeControlCharactersInStrings(json: string): string {
  let result = '';
  let inString = false;
  let escaped = false;

  for (const char of json) {
    if (!inString) {
      if (char === '"') {
        inString = true;
      }
      result += char;
      continue;
    }

    if (escaped) {
      escaped = false;
      result += char;
    } else if (char === '\\') {
      escaped = true;
      result += char;
    } else if (char === '"') {
      inString = false;
      result += char;
    } else if (char === '\n') {
      result += '\\n';
    } else if (char === '\r') {
      result += '\\r';
    } else if (char === '\t') {
      result += '\\t';
    } else {
      result += char;
    }
  }

  return result;
}

export function parseEnvelope(span: string, key: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(escapeControlCharactersInStrings(span));
  } catch (error) {
    throw new StructuralError('parse', `Invalid JSON: ${errorMessage(error)}`, span);
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new StructuralError('parse', 'Envelope is not a JSON object', span);
  }

  const value: unknown = Object.getOwnPropertyDescriptor(parsed, key)?.value;
  if (typeof value !== 'string') {
    throw new StructuralError('parse', `Envelope has no string field "${key}"`, span);
  }
  if (value.trim() === '') {
    throw new StructuralError('parse', `Envelope field "${key}" is empty`, span);
  }

  return value;
}

/**
 * Repairs a completion that ran past its token budget after the show's
 * closing tagline had already started.
 */
export class TaglineSalvage implements SalvageStrategy {
  name = 'TaglineSalvage';

  static readonly CLOSING = "That's all for today. Join us next time for another exciting summary.";

  constructor(
    private pattern: RegExp = /that'?s all for today[\s\S]*$/i,
    private closing: string = TaglineSalvage.CLOSING
  ) {}

  repair(candidate: string): string {
    const match = this.pattern.exec(candidate);
    if (!match) {
      throw new SalvageImpossibleError(this.name, candidate);
    }
    return candidate.slice(0, match.index) + this.closing + '"}';
  }
}

export class StructuredCompletionTool {
  constructor(
    private backend: CompletionBackend,
    private model: string = Config.COMPLETION_MODEL
  ) {}

  /**
   * One completion call; returns the value of `key` from the forced envelope.
   * Not retried here, callers wrap it in `retry`.
   */
  async complete(options: StructuredCompletionOptions): Promise<string> {
    const { prompt, key, maxTokens, outputPrefix = '', salvage } = options;

    const opening = envelopeOpening(key, outputPrefix);
    const request = buildCompletionRequest(prompt, maxTokens, opening, this.model);
    const candidate = opening + (await this.backend.complete(request));

    let span: string;
    try {
      span = extractEnvelope(candidate);
    } catch (error) {
      if (!salvage || !(error instanceof StructuralError)) {
        throw error;
      }
      Logger.warn('Invalid JSON envelope, attempting salvage', {
        key,
        strategy: salvage.name,
        completion: truncate(candidate, 300),
      });
      span = extractEnvelope(salvage.repair(candidate));
    }

    return parseEnvelope(span, key);
  }
}
