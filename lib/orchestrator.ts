/**
 * Orchestrator - Coordinates a recap run from episode source to dialog and audio
 */

import { Config } from './config';
import { DialogAgent } from './agents/dialog';
import type { DialogOptions } from './agents/dialog';
import { SummarizerAgent } from './agents/summarizer';
import type { SummarizerOptions } from './agents/summarizer';
import { OpenAICompletionBackend } from './tools/completion';
import type { CompletionBackend } from './tools/completion';
import { FeedTool } from './tools/feed';
import { TtsTool } from './tools/tts';
import type {
  EpisodeDetails,
  PipelineOutputType,
  PipelineResult,
  PipelineSource,
  TtsMethod,
} from './types';
import { Crypto, Logger, errorMessage } from './utils';

export interface OrchestratorInput {
  source: PipelineSource;
  output?: PipelineOutputType;
  tts_method?: TtsMethod;
}

export interface OrchestratorDependencies {
  backend?: CompletionBackend;
  feed?: FeedTool;
  tts?: TtsTool;
  dialog?: DialogOptions;
  summarizer?: SummarizerOptions;
}

export class Orchestrator {
  private dialogAgent: DialogAgent;
  private summarizerAgent: SummarizerAgent;
  private feed: FeedTool;
  private tts?: TtsTool;

  constructor(deps: OrchestratorDependencies = {}) {
    const backend = deps.backend ?? new OpenAICompletionBackend();

    this.dialogAgent = new DialogAgent(backend, deps.dialog);
    this.summarizerAgent = new SummarizerAgent(backend, deps.summarizer);
    this.feed = deps.feed ?? new FeedTool();
    this.tts = deps.tts;
  }

  async run(input: OrchestratorInput): Promise<PipelineResult> {
    const startTime = Date.now();
    const runId = Crypto.uuid();
    const output = input.output ?? 'text';
    const agentTimes: Record<string, number> = {};
    let completionCalls = 0;

    Logger.info('Recap run starting', {
      runId,
      source: input.source.kind,
      output,
    });

    try {
      let episode: EpisodeDetails;
      let dialog: string;

      if (input.source.kind === 'transcript') {
        episode = {
          podcastTitle: input.source.podcastTitle,
          episodeTitle: input.source.episodeTitle,
          description: '',
        };
        const message = await this.summarizerAgent.execute(runId, {
          transcript: input.source.transcript,
          podcast: episode.podcastTitle,
          episode_name: episode.episodeTitle,
        });
        agentTimes[message.agent] = message.duration_ms ?? 0;
        completionCalls += message.completion_calls;
        dialog = this.requireOutput(message.agent, message.output).dialog;
      } else {
        episode = await this.resolveEpisode(input.source, agentTimes);

        const message = await this.dialogAgent.execute(runId, {
          podcast_title: episode.podcastTitle,
          episode_title: episode.episodeTitle,
          description: episode.description,
        });
        agentTimes[message.agent] = message.duration_ms ?? 0;
        completionCalls += message.completion_calls;
        dialog = this.requireOutput(message.agent, message.output).dialog;
      }

      Logger.info('Transcript', { runId, transcript: dialog });

      let audio: Buffer | undefined;
      if (output === 'audio') {
        const method = input.tts_method ?? Config.getTtsMethod();
        const tts = this.tts ?? (this.tts = new TtsTool());
        audio = await this.timed(agentTimes, 'TtsTool', () => tts.synthesizeDialog(dialog, method));
      }

      const metrics = {
        total_time_ms: Date.now() - startTime,
        agent_times: agentTimes,
        completion_calls: completionCalls,
      };

      Logger.info('Recap run completed', { runId, ...metrics });

      return { run_id: runId, episode, dialog, audio, metrics };
    } catch (error) {
      Logger.error('Recap run failed', {
        runId,
        error: errorMessage(error),
        total_time_ms: Date.now() - startTime,
      });
      throw error;
    }
  }

  private async resolveEpisode(
    source: Exclude<PipelineSource, { kind: 'transcript' }>,
    agentTimes: Record<string, number>
  ): Promise<EpisodeDetails> {
    if (source.kind === 'feed') {
      return this.timed(agentTimes, 'FeedTool', () =>
        this.feed.getEpisodeDetails(source.feedUrl, source.episodeIndex)
      );
    }
    return {
      podcastTitle: source.podcastTitle,
      episodeTitle: source.episodeTitle,
      description: source.description,
    };
  }

  private requireOutput<T>(agent: string, output: T | undefined): T {
    if (output === undefined) {
      throw new Error(`${agent} finished without output`);
    }
    return output;
  }

  private async timed<T>(times: Record<string, number>, name: string, fn: () => Promise<T>): Promise<T> {
    const start = Date.now();
    try {
      return await fn();
    } finally {
      times[name] = Date.now() - start;
    }
  }
}
