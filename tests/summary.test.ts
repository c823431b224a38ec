import { describe, it, expect } from 'vitest';
import { formatSummary } from '../scripts/summary';
import { summarizeDocument } from '../lib/projector';

const document = {
  feeds: [
    {
      title: 'Retro Highlights',
      tracks: [
        { title: 'One', enrichment: { relevance_match: 'x'.repeat(150) } },
        { title: 'Two', enrichment: { relevance_match: 'Short reason' } },
        { title: 'Three' },
        { title: 'Four', enrichment: { relevance_match: 'Not shown' } },
      ],
    },
  ],
};

describe('formatSummary', () => {
  it('should list sample tracks with truncated insights', () => {
    const lines = formatSummary(summarizeDocument(document), {
      heading: 'Sample tracks',
      insightLabel: 'Relevance',
      limit: 3,
      maxInsightLength: 100,
    });

    expect(lines).toEqual([
      '\nCreated feed: Retro Highlights',
      'Total tracks: 4',
      '\nSample tracks:',
      '1. One',
      `   Relevance: ${'x'.repeat(97)}...`,
      '2. Two',
      '   Relevance: Short reason',
      '3. Three',
    ]);
  });

  it('should list every track in full without a limit', () => {
    const lines = formatSummary(summarizeDocument(document), { heading: 'Tracks', insightLabel: 'Insight' });

    expect(lines).toHaveLength(10);
    expect(lines[4]).toBe(`   Insight: ${'x'.repeat(150)}`);
    expect(lines[9]).toBe('   Insight: Not shown');
  });

  it('should print nothing for a document without a feed', () => {
    expect(formatSummary(summarizeDocument({ feeds: [] }), { heading: 'Tracks', insightLabel: 'Insight' })).toEqual([]);
  });
});
