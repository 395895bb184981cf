/**
 * Run the recap pipeline from the command line
 *
 * Usage:
 *   npm run pipeline -- <feed-url> [episode-index] [--audio out.mp3] [--tts openai|openai-hd]
 *   npm run pipeline -- --transcript episode.txt --podcast "Space Hour" --episode "Rockets" [--audio out.mp3]
 */

import * as fs from 'fs';
import { parseTtsMethod } from '../lib/config';
import { ConfigurationError } from '../lib/errors';
import { Orchestrator } from '../lib/orchestrator';
import type { PipelineSource, TtsMethod } from '../lib/types';
import { Logger, errorMessage } from '../lib/utils';

interface CliOptions {
  source: PipelineSource;
  audioPath?: string;
  ttsMethod?: TtsMethod;
}

function parseArgs(argv: string[]): CliOptions {
  const positional: string[] = [];
  const flags = new Map<string, string>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg.startsWith('--')) {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new ConfigurationError(`Missing value for ${arg}`);
      }
      flags.set(arg.slice(2), value);
      i++;
    } else {
      positional.push(arg);
    }
  }

  const ttsFlag = flags.get('tts');
  const tts = ttsFlag === undefined ? undefined : parseTtsMethod(ttsFlag);

  const transcriptPath = flags.get('transcript');
  let source: PipelineSource;

  if (transcriptPath) {
    const podcastTitle = flags.get('podcast');
    const episodeTitle = flags.get('episode');
    if (!podcastTitle || !episodeTitle) {
      throw new ConfigurationError('--transcript needs --podcast and --episode');
    }
    source = {
      kind: 'transcript',
      podcastTitle,
      episodeTitle,
      transcript: fs.readFileSync(transcriptPath, 'utf-8'),
    };
  } else {
    const [feedUrl, index = '0'] = positional;
    if (!feedUrl) {
      throw new ConfigurationError('A feed URL or --transcript is required');
    }
    const episodeIndex = Number(index);
    if (!Number.isInteger(episodeIndex) || episodeIndex < 0) {
      throw new ConfigurationError(`Invalid episode index "${index}"`);
    }
    source = { kind: 'feed', feedUrl, episodeIndex };
  }

  return { source, audioPath: flags.get('audio'), ttsMethod: tts };
}

async function main() {
  const options = parseArgs(process.argv.slice(2));
  const orchestrator = new Orchestrator();

  const result = await orchestrator.run({
    source: options.source,
    output: options.audioPath ? 'audio' : 'text',
    tts_method: options.ttsMethod,
  });

  if (options.audioPath && result.audio) {
    fs.writeFileSync(options.audioPath, result.audio);
    Logger.info('Audio written', { path: options.audioPath, bytes: result.audio.length });
  }

  console.log(result.dialog);
}

main().catch(error => {
  Logger.error('Pipeline failed', { error: errorMessage(error) });
  process.exit(1);
});
