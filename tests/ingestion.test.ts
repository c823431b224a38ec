/**
 * Tests for Ingestion Agent
 */

import { describe, it, expect } from 'vitest';
import { IngestionAgent } from '../lib/agents/ingestion';
import { FetchError } from '../lib/errors';
import type { FeedSource } from '../lib/tools/feed';
import type { FetchedFeed } from '../lib/types';

class FakeFeedSource implements FeedSource {
  calls: string[] = [];

  constructor(private feeds: Record<string, FetchedFeed>) {}

  async fetchFeed(url: string): Promise<FetchedFeed> {
    this.calls.push(url);
    const feed = this.feeds[url];
    if (!feed) {
      throw new FetchError(url, new Error('connection refused'));
    }
    return feed;
  }
}

const now = new Date('2024-03-01T08:00:00.000Z');

describe('IngestionAgent', () => {
  it('should handle empty sources', async () => {
    const agent = new IngestionAgent({ feedSource: new FakeFeedSource({}) });
    const result = await agent.execute('test-run', { sources: [] });

    expect(result.output.episodes).toEqual([]);
    expect(result.output.failed_sources).toEqual([]);
    expect(result.errors).toEqual([]);
  });

  it('should concatenate feeds in configured order', async () => {
    const source = new FakeFeedSource({
      'https://example.com/b.xml': {
        title: 'Feed B',
        url: 'https://example.com/b.xml',
        entries: [{ id: 'b1', title: 'B one' }],
      },
      'https://example.com/a.xml': {
        title: 'Feed A',
        url: 'https://example.com/a.xml',
        entries: [
          { id: 'a1', title: 'A one' },
          { id: 'a2', title: 'A two' },
        ],
      },
    });
    const agent = new IngestionAgent({ feedSource: source, clock: () => now });

    const result = await agent.execute('test-run', {
      sources: ['https://example.com/a.xml', 'https://example.com/b.xml'],
    });

    expect(source.calls).toEqual(['https://example.com/a.xml', 'https://example.com/b.xml']);
    expect(result.output.episodes.map(episode => episode.id)).toEqual(['a1', 'a2', 'b1']);
    expect(result.output.episodes.map(episode => episode.sourceFeedTitle)).toEqual(['Feed A', 'Feed A', 'Feed B']);
    expect(result.output.items_found).toBe(3);
    expect(result.output.episodes[0].publishedAt).toBe('2024-03-01T08:00:00.000Z');
  });

  it('should skip a failing feed and keep the others', async () => {
    const source = new FakeFeedSource({
      'https://example.com/ok.xml': {
        title: 'OK',
        url: 'https://example.com/ok.xml',
        entries: [{ id: 'ok1', title: 'Fine' }],
      },
    });
    const agent = new IngestionAgent({ feedSource: source });

    const result = await agent.execute('test-run', {
      sources: ['https://example.com/down.xml', 'https://example.com/ok.xml'],
    });

    expect(result.output.episodes.map(episode => episode.id)).toEqual(['ok1']);
    expect(result.output.failed_sources).toEqual(['https://example.com/down.xml']);
    expect(result.output.sources_fetched).toBe(1);
    expect(result.output.sources_scanned[0]).toEqual({
      url: 'https://example.com/down.xml',
      items_found: 0,
      status: 'failed',
      error: 'Failed to fetch feed https://example.com/down.xml: connection refused',
    });
  });
});
