/**
 * Tests for prompt construction
 */

import { describe, it, expect } from 'vitest';
import { buildPrompt, renderOutputExample, userInsightField } from '../lib/prompts';
import { ConfigError } from '../lib/errors';

const textBlob = 'PODCAST FEED CONTENT (0 episodes):\n\n';

describe('buildPrompt', () => {
  it('should list every interest and end with the feed content', () => {
    const prompt = buildPrompt({
      variant: 'curated',
      textBlob,
      interests: ['ai_hobbies', 'retro_gaming'],
    });

    expect(prompt).toContain('- ai_hobbies\n- retro_gaming');
    expect(prompt.endsWith(`FEED CONTENT:\n${textBlob}`)).toBe(true);
  });

  it('should name the required top-level keys', () => {
    const prompt = buildPrompt({ variant: 'curated', textBlob, interests: [] });

    for (const key of ['"feeds"', '"id"', '"title"', '"tracks"']) {
      expect(prompt).toContain(key);
    }
    expect(prompt).toContain('IMPORTANT: Return ONLY valid JSON');
  });

  it('should mark an empty interest list', () => {
    const prompt = buildPrompt({ variant: 'curated', textBlob, interests: [] });
    expect(prompt).toContain('- (no specific interests given)');
  });

  it('should address the user in the personalized variant', () => {
    const prompt = buildPrompt({
      variant: 'personalized',
      textBlob,
      interests: ['robotics'],
      userName: 'Alex',
      userFocus: 'small robots',
    });

    expect(prompt).toContain('This feed is being created specifically for Alex, who is interested in:\n- robotics');
    expect(prompt).toContain('Alex is particularly interested in small robots.');
    expect(prompt).toContain('"alex_relevance"');
    expect(prompt).toContain('"id": "alex-feed"');
  });

  it('should reject the personalized variant without a user name', () => {
    expect(() => buildPrompt({ variant: 'personalized', textBlob, interests: [] })).toThrow(ConfigError);
  });

  it('should state the primary interest in the focused variant', () => {
    const prompt = buildPrompt({
      variant: 'focused',
      textBlob,
      interests: ['3d_printing'],
      primaryInterest: '3d_printing',
      feedId: 'maker-weekly-feed',
      feedTitle: 'Maker Weekly',
    });

    expect(prompt).toContain('This feed is focused primarily on 3d_printing');
    expect(prompt).toContain('"id": "maker-weekly-feed"');
    expect(prompt).toContain('"title": "Maker Weekly"');
    expect(prompt).toContain('"relevance_match"');
  });
});

describe('renderOutputExample', () => {
  it('should use the curated defaults', () => {
    const example = renderOutputExample('curated', { interests: [] });
    expect(example).toContain('"id": "curated-feed"');
    expect(example).toContain('"title": "Curated Podcast Feed"');
    expect(example).toContain('"curator_insight"');
    expect(example).toContain('"enrichment"');
  });

  it('should render the player shape without enrichment', () => {
    const example = renderOutputExample('player', { interests: [], feedId: 'retro-gaming', feedTitle: 'Retro' });
    expect(example).toContain('"audioUrl": "media_url"');
    expect(example).toContain('"albumArt": "image_url"');
    expect(example).not.toContain('"enrichment"');
  });

  it('should require a feed id for the player variant', () => {
    expect(() => renderOutputExample('player', { interests: [] })).toThrow(ConfigError);
  });

  it('should escape quotes in the feed title', () => {
    const example = renderOutputExample('curated', { interests: [], feedTitle: 'The "Best" Feed' });
    expect(example).toContain('"title": "The \\"Best\\" Feed"');
  });
});

describe('userInsightField', () => {
  it('should derive a snake_case field from the user name', () => {
    expect(userInsightField('Mary Jane')).toBe('mary_jane_relevance');
  });
});
