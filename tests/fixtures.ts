import type { EpisodeRecord } from '../lib/types';

export function makeEpisode(overrides: Partial<EpisodeRecord> = {}): EpisodeRecord {
  return {
    id: 'ep-1',
    title: 'Episode One',
    publishedAt: '2024-01-15T12:00:00.000Z',
    summary: 'A summary',
    sourceFeedTitle: 'Test Feed',
    mediaUrl: 'https://cdn.example.com/ep-1.mp3',
    duration: null,
    imageUrl: null,
    enclosures: [],
    ...overrides,
  };
}
