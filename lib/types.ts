/**
 * Core type definitions for the recap pipeline
 */

export interface CompletionRequest {
  prompt: string;
  model: string;
  max_tokens: number;
  temperature: number;
  top_p: number;
  frequency_penalty: number;
  presence_penalty: number;
  output_prefix: string;
}

export interface Chunk {
  index: number;
  sentences: string[];
  text: string;
}

export interface EpisodeDetails {
  podcastTitle: string;
  episodeTitle: string;
  description: string;
}

export type TtsMethod = 'openai' | 'openai-hd';

export type TtsVoice = 'alloy' | 'echo' | 'fable' | 'onyx' | 'nova' | 'shimmer';

export type PipelineOutputType = 'text' | 'audio';

export type PipelineSource =
  | { kind: 'description'; podcastTitle: string; episodeTitle: string; description: string }
  | { kind: 'transcript'; podcastTitle: string; episodeTitle: string; transcript: string }
  | { kind: 'feed'; feedUrl: string; episodeIndex: number };

export interface AgentMessage<I, O> {
  agent: string;
  run_id: string;
  timestamp: string;
  input: I;
  output?: O;
  errors: string[];
  completion_calls: number;
  duration_ms?: number;
}

export interface PipelineMetrics {
  total_time_ms: number;
  agent_times: Record<string, number>;
  completion_calls: number;
}

export interface PipelineResult {
  run_id: string;
  episode: EpisodeDetails;
  dialog: string;
  audio?: Buffer;
  metrics: PipelineMetrics;
}
