/**
 * Episode normalization - one raw feed entry in, one EpisodeRecord out
 *
 * Every field is resolved first-match-wins over an ordered list of source
 * fields. Nothing is merged across candidates.
 */

import type { EpisodeRecord, RawEnclosure, RawFeedEntry } from './types';
import { Crypto } from './utils';

export const UNKNOWN_TITLE = 'Unknown Title';

export interface FeedContext {
  title?: string;
  url: string;
}

// Only absent or empty values fall back; whitespace is kept as given.
function firstNonEmpty(...candidates: Array<string | undefined | null>): string | undefined {
  for (const candidate of candidates) {
    if (typeof candidate === 'string' && candidate !== '') {
      return candidate;
    }
  }
  return undefined;
}

/**
 * Fallback id for entries with neither id nor guid. Derived from the title
 * alone, so two feeds carrying the same title collide.
 */
export function synthesizeEpisodeId(title: string): string {
  return `ep-${Crypto.sha256(title).substring(0, 12)}`;
}

export function findAudioEnclosure(enclosures: RawEnclosure[] | undefined): string | null {
  for (const enclosure of enclosures ?? []) {
    if ((enclosure.type ?? '').startsWith('audio/')) {
      return enclosure.href ?? null;
    }
  }
  return null;
}

export function normalizeEntry(
  entry: RawFeedEntry,
  feed: FeedContext,
  now: Date = new Date()
): EpisodeRecord {
  const title = firstNonEmpty(entry.title) ?? UNKNOWN_TITLE;

  const record: EpisodeRecord = {
    id: firstNonEmpty(entry.id, entry.guid) ?? synthesizeEpisodeId(title),
    title,
    publishedAt: firstNonEmpty(entry.published) ?? now.toISOString(),
    summary: firstNonEmpty(entry.summary, entry.description) ?? '',
    sourceFeedTitle: firstNonEmpty(feed.title) ?? feed.url,
    mediaUrl: findAudioEnclosure(entry.enclosures),
    duration: firstNonEmpty(entry.duration) ?? null,
    imageUrl: firstNonEmpty(entry.image?.href, entry.imageUrl) ?? null,
    enclosures: (entry.enclosures ?? []).map(enclosure => Object.freeze({ ...enclosure })),
  };

  return Object.freeze(record);
}

export function normalizeEntries(
  entries: RawFeedEntry[],
  feed: FeedContext,
  now: Date = new Date()
): EpisodeRecord[] {
  return entries.map(entry => normalizeEntry(entry, feed, now));
}
