/**
 * Tests for the Feed Tool
 */

import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../lib/errors';
import { FeedTool } from '../lib/tools/feed';

const FEED = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
  <channel>
    <title>Space Hour</title>
    <link>https://example.com</link>
    <description>Weekly space talk</description>
    <item>
      <title>Into Orbit</title>
      <description>All about rockets.</description>
    </item>
    <item>
      <title>Moon Dust</title>
      <description>Lunar geology.</description>
    </item>
  </channel>
</rss>`;

describe('FeedTool.parseEpisodeDetails', () => {
  const feed = new FeedTool();

  it('should return the podcast and episode details at the index', async () => {
    await expect(feed.parseEpisodeDetails(FEED, 1)).resolves.toEqual({
      podcastTitle: 'Space Hour',
      episodeTitle: 'Moon Dust',
      description: 'Lunar geology.',
    });
  });

  it('should treat index 0 as the first item', async () => {
    const details = await feed.parseEpisodeDetails(FEED, 0);
    expect(details.episodeTitle).toBe('Into Orbit');
  });

  it('should reject an index outside the feed', async () => {
    await expect(feed.parseEpisodeDetails(FEED, 2)).rejects.toBeInstanceOf(ConfigurationError);
    await expect(feed.parseEpisodeDetails(FEED, -1)).rejects.toBeInstanceOf(ConfigurationError);
  });
});
