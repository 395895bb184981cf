/**
 * Tests for configuration parsing
 */

import { describe, it, expect, afterEach } from 'vitest';
import { Config, parseTtsMethod } from '../lib/config';
import { ConfigurationError } from '../lib/errors';

describe('parseTtsMethod', () => {
  it('should accept the supported methods', () => {
    expect(parseTtsMethod('openai')).toBe('openai');
    expect(parseTtsMethod('openai-hd')).toBe('openai-hd');
  });

  it('should reject an unknown method', () => {
    expect(() => parseTtsMethod('google')).toThrow('Unknown TTS method "google"');
  });
});

describe('Config.getTtsMethod', () => {
  const original = Config.TTS_METHOD;

  afterEach(() => {
    Config.TTS_METHOD = original;
  });

  it('should read the configured method', () => {
    Config.TTS_METHOD = 'openai-hd';
    expect(Config.getTtsMethod()).toBe('openai-hd');
  });

  it('should fail on an unknown configured method instead of falling back', () => {
    Config.TTS_METHOD = 'google';
    expect(() => Config.getTtsMethod()).toThrow(ConfigurationError);
  });
});
