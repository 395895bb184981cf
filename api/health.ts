/**
 * Health Check API endpoint
 */

import type { VercelRequest, VercelResponse } from '@vercel/node';
import { Config } from '../lib/config';
import { getPromptTemplates } from '../lib/prompts';
import { errorMessage } from '../lib/utils';

export default async function handler(
  req: VercelRequest,
  res: VercelResponse
) {
  if (req.method !== 'GET') {
    return res.status(405).json({ error: 'Method not allowed' });
  }

  try {
    const openaiConfigured = Config.OPENAI_API_KEY.length > 0;
    const templates = Object.keys(getPromptTemplates());

    return res.status(200).json({
      status: openaiConfigured ? 'ok' : 'missing_config',
      timestamp: new Date().toISOString(),
      checks: {
        openai: openaiConfigured ? 'configured' : 'NOT_CONFIGURED',
        prompt_templates: templates,
      },
      config: {
        completion_model: Config.COMPLETION_MODEL,
        page_size: Config.PAGE_SIZE,
        tts_method: Config.getTtsMethod(),
      },
    });
  } catch (error) {
    return res.status(503).json({
      status: 'error',
      error: errorMessage(error),
    });
  }
}
