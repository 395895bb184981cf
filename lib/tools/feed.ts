/**
 * Feed Tool - Read podcast and episode details from an RSS feed
 */

import Parser from 'rss-parser';
import { ConfigurationError } from '../errors';
import type { EpisodeDetails } from '../types';
import { Logger, cleanText } from '../utils';

type FeedOutput = Parser.Output<Record<string, unknown>>;

export class FeedTool {
  private parser: Parser;

  constructor() {
    this.parser = new Parser({
      timeout: 15000,
      headers: {
        'User-Agent': 'Mozilla/5.0 (compatible; PodcastRecapBot/1.0)',
      },
    });
  }

  async getEpisodeDetails(url: string, episodeIndex: number): Promise<EpisodeDetails> {
    Logger.debug('Parsing feed', { url, episodeIndex });
    const feed = await this.parser.parseURL(url);
    return FeedTool.pickEpisode(feed, episodeIndex, url);
  }

  async parseEpisodeDetails(xml: string, episodeIndex: number): Promise<EpisodeDetails> {
    const feed = await this.parser.parseString(xml);
    return FeedTool.pickEpisode(feed, episodeIndex, 'inline feed');
  }

  /**
   * Episode 0 is the first item in the feed, normally the newest.
   */
  private static pickEpisode(feed: FeedOutput, episodeIndex: number, source: string): EpisodeDetails {
    const items = feed.items ?? [];

    if (!Number.isInteger(episodeIndex) || episodeIndex < 0 || episodeIndex >= items.length) {
      throw new ConfigurationError(
        `Episode index ${episodeIndex} is out of range for ${source} (${items.length} episodes)`
      );
    }

    const item = items[episodeIndex];
    const details: EpisodeDetails = {
      podcastTitle: cleanText(feed.title ?? ''),
      episodeTitle: cleanText(item.title ?? ''),
      description: (item.contentSnippet || item.content || item.summary || '').trim(),
    };

    Logger.info('Episode details', {
      podcast: details.podcastTitle,
      episode: details.episodeTitle,
      descriptionLength: details.description.length,
    });

    return details;
  }
}
