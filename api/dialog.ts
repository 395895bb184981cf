/**
 * Dialog API endpoint - Turns an episode into a talk show transcript
 *
 * POST /api/dialog
 *   { podcast_title, episode_title, description }
 *   { podcast_title, episode_title, transcript }
 *   { feed_url, episode_index? }
 */

import type { VercelRequest, VercelResponse } from '@vercel/node';
import { Config } from '../lib/config';
import { ConfigurationError } from '../lib/errors';
import { Orchestrator } from '../lib/orchestrator';
import type { PipelineSource } from '../lib/types';
import { Logger, errorMessage } from '../lib/utils';

function stringField(body: Record<string, unknown>, name: string): string | undefined {
  const value = body[name];
  return typeof value === 'string' && value.trim() ? value : undefined;
}

export function parseDialogRequest(body: unknown): PipelineSource {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new ConfigurationError('Request body must be a JSON object');
  }
  const fields: Record<string, unknown> = Object.fromEntries(Object.entries(body));

  const feedUrl = stringField(fields, 'feed_url');
  if (feedUrl) {
    const index = fields.episode_index ?? 0;
    if (typeof index !== 'number' || !Number.isInteger(index) || index < 0) {
      throw new ConfigurationError('episode_index must be a non-negative integer');
    }
    return { kind: 'feed', feedUrl, episodeIndex: index };
  }

  const podcastTitle = stringField(fields, 'podcast_title');
  const episodeTitle = stringField(fields, 'episode_title');
  if (!podcastTitle || !episodeTitle) {
    throw new ConfigurationError('podcast_title and episode_title are required');
  }

  const transcript = stringField(fields, 'transcript');
  if (transcript) {
    return { kind: 'transcript', podcastTitle, episodeTitle, transcript };
  }

  const description = stringField(fields, 'description');
  if (description) {
    return { kind: 'description', podcastTitle, episodeTitle, description };
  }

  throw new ConfigurationError('Either description, transcript or feed_url is required');
}

export default async function handler(
  req: VercelRequest,
  res: VercelResponse
) {
  if (req.method !== 'POST') {
    return res.status(405).json({ error: 'Method not allowed' });
  }

  if (Config.API_SECRET && req.headers.authorization !== `Bearer ${Config.API_SECRET}`) {
    return res.status(401).json({ error: 'Unauthorized' });
  }

  let source: PipelineSource;
  try {
    source = parseDialogRequest(req.body);
  } catch (error) {
    return res.status(400).json({ success: false, error: errorMessage(error) });
  }

  Logger.info('API /dialog triggered', { source: source.kind });

  try {
    const orchestrator = new Orchestrator();
    const result = await orchestrator.run({ source, output: 'text' });

    return res.status(200).json({
      success: true,
      run_id: result.run_id,
      episode: result.episode,
      dialog: result.dialog,
      metrics: result.metrics,
    });
  } catch (error) {
    const status = error instanceof ConfigurationError ? 400 : 500;

    Logger.error('API /dialog failed', {
      error: errorMessage(error),
      name: error instanceof Error ? error.name : 'UnknownError',
    });

    return res.status(status).json({
      success: false,
      error: errorMessage(error),
    });
  }
}
