/**
 * Tests for RSS parsing into raw feed entries
 */

import { describe, it, expect } from 'vitest';
import { FeedTool } from '../lib/tools/feed';
import { FetchError } from '../lib/errors';
import { normalizeEntries } from '../lib/normalizer';

const FEED_URL = 'https://example.com/retro.xml';

const xml = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0" xmlns:itunes="http://www.itunes.com/dtds/podcast-1.0.dtd" xmlns:media="http://search.yahoo.com/mrss/">
  <channel>
    <title>Retro Hour</title>
    <link>https://example.com</link>
    <description>Old games, new stories</description>
    <item>
      <title>Arcade Memories</title>
      <guid>retro-001</guid>
      <pubDate>Mon, 15 May 2023 12:00:00 GMT</pubDate>
      <description>All about arcade cabinets</description>
      <enclosure url="https://cdn.example.com/retro-001.mp3" length="1234" type="audio/mpeg"/>
      <itunes:duration>00:42:10</itunes:duration>
    </item>
    <item>
      <title>Console Wars</title>
      <guid>retro-002</guid>
      <description>Sixteen bits of rivalry</description>
      <media:content url="https://cdn.example.com/retro-002.mp3" type="audio/mpeg"/>
    </item>
    <item>
      <title>Video Only</title>
      <guid>retro-003</guid>
      <enclosure url="https://cdn.example.com/retro-003.mp4" length="99" type="video/mp4"/>
    </item>
  </channel>
</rss>`;

describe('FeedTool.parseFeedXml', () => {
  it('should map channel and items', async () => {
    const feed = await new FeedTool().parseFeedXml(xml, FEED_URL);

    expect(feed.title).toBe('Retro Hour');
    expect(feed.url).toBe(FEED_URL);
    expect(feed.entries).toHaveLength(3);

    const [first] = feed.entries;
    expect(first.guid).toBe('retro-001');
    expect(first.title).toBe('Arcade Memories');
    expect(first.published).toBe('2023-05-15T12:00:00.000Z');
    expect(first.description).toBe('All about arcade cabinets');
    expect(first.enclosures).toEqual([
      { href: 'https://cdn.example.com/retro-001.mp3', type: 'audio/mpeg', length: '1234' },
    ]);
    expect(first.duration).toBe('00:42:10');
  });

  it('should read media:content as an enclosure', async () => {
    const feed = await new FeedTool().parseFeedXml(xml, FEED_URL);
    expect(feed.entries[1].enclosures).toEqual([
      { href: 'https://cdn.example.com/retro-002.mp3', type: 'audio/mpeg', length: undefined },
    ]);
  });

  it('should normalize parsed entries', async () => {
    const feed = await new FeedTool().parseFeedXml(xml, FEED_URL);
    const records = normalizeEntries(feed.entries, { title: feed.title, url: FEED_URL });

    expect(records.map(record => record.id)).toEqual(['retro-001', 'retro-002', 'retro-003']);
    expect(records.map(record => record.mediaUrl)).toEqual([
      'https://cdn.example.com/retro-001.mp3',
      'https://cdn.example.com/retro-002.mp3',
      null,
    ]);
    expect(records[0].summary).toBe('All about arcade cabinets');
    expect(records[0].sourceFeedTitle).toBe('Retro Hour');
  });

  it('should wrap parse failures in FetchError', async () => {
    await expect(new FeedTool().parseFeedXml('this is not xml', FEED_URL)).rejects.toBeInstanceOf(FetchError);
  });
});
