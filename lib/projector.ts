/**
 * Output projection
 *
 * toPlayerDocument builds the player format straight from episode records,
 * with no completion call. acceptEnrichmentDocument passes an extracted
 * completion payload through after the `feeds` check.
 */

import type { EnrichmentDocument, EpisodeRecord, PlayerDocument, PlayerTrack } from './types';
import { MalformedEnrichmentResponse } from './errors';
import { Logger, isRecord } from './utils';

export const UNKNOWN_TRACK_ID = 'unknown-track';

/**
 * Lower-case, spaces to hyphens, then drop anything outside [a-z0-9-].
 */
export function sanitizeId(text: string): string {
  return text
    .toLowerCase()
    .replace(/ /g, '-')
    .replace(/[^a-z0-9-]/g, '');
}

export function resolveAudioUrl(record: EpisodeRecord): string {
  if (record.mediaUrl) {
    return record.mediaUrl;
  }
  for (const enclosure of record.enclosures) {
    if (enclosure.href) {
      return enclosure.href;
    }
  }
  return '';
}

export interface DroppedTrack {
  id: string;
  title: string;
  reason: string;
}

export interface PlayerProjection {
  document: PlayerDocument;
  dropped: DroppedTrack[];
}

export function toPlayerTrack(record: EpisodeRecord): PlayerTrack {
  const track: PlayerTrack = {
    id: sanitizeId(record.title) || UNKNOWN_TRACK_ID,
    title: record.title,
    audioUrl: resolveAudioUrl(record),
    description: record.summary,
  };

  if (record.imageUrl) {
    track.albumArt = record.imageUrl;
  }

  return track;
}

export function toPlayerDocument(records: EpisodeRecord[], feedName: string, feedTitle: string): PlayerProjection {
  const tracks: PlayerTrack[] = [];
  const dropped: DroppedTrack[] = [];

  for (const record of records) {
    const track = toPlayerTrack(record);

    if (!track.audioUrl) {
      Logger.warn('No audio URL found for track, dropping it', { title: track.title, episode_id: record.id });
      dropped.push({ id: record.id, title: track.title, reason: 'no audio URL' });
      continue;
    }

    tracks.push(track);
  }

  return {
    document: {
      feeds: [
        {
          id: sanitizeId(feedName),
          title: feedTitle,
          tracks,
        },
      ],
    },
    dropped,
  };
}

export function hasFeedsKey(value: unknown): value is EnrichmentDocument {
  return isRecord(value) && 'feeds' in value;
}

export function acceptEnrichmentDocument(parsed: unknown): EnrichmentDocument {
  if (!hasFeedsKey(parsed)) {
    throw new MalformedEnrichmentResponse('response JSON has no "feeds" key');
  }
  return parsed;
}

export interface TrackSummary {
  title: string;
  insight: string | null;
}

export interface DocumentSummary {
  feedTitle: string | null;
  trackCount: number;
  trackTitles: string[];
  tracks: TrackSummary[];
}

const INSIGHT_FIELDS = ['relevance_match', 'curator_insight'];

/**
 * The free-text insight of an enriched track: `relevance_match`, then
 * `curator_insight`, then the first `<user>_relevance` field.
 */
export function trackInsight(track: unknown): string | null {
  const enrichment = isRecord(track) ? track.enrichment : undefined;
  if (!isRecord(enrichment)) {
    return null;
  }

  const userFields = Object.keys(enrichment).filter(key => key.endsWith('_relevance'));
  for (const field of [...INSIGHT_FIELDS, ...userFields]) {
    const value = enrichment[field];
    if (typeof value === 'string' && value !== '') {
      return value;
    }
  }
  return null;
}

/**
 * Operator-facing summary of the first feed. Reads any shape without
 * throwing, since enrichment documents are not validated past `feeds`.
 */
export function summarizeDocument(document: unknown): DocumentSummary {
  const feeds = isRecord(document) && Array.isArray(document.feeds) ? document.feeds : [];
  const first: unknown = feeds[0];

  if (!isRecord(first)) {
    return { feedTitle: null, trackCount: 0, trackTitles: [], tracks: [] };
  }

  const rawTracks: unknown[] = Array.isArray(first.tracks) ? first.tracks : [];
  const tracks = rawTracks.map(track => ({
    title: isRecord(track) && typeof track.title === 'string' ? track.title : '(untitled)',
    insight: trackInsight(track),
  }));

  return {
    feedTitle: typeof first.title === 'string' ? first.title : null,
    trackCount: tracks.length,
    trackTitles: tracks.map(track => track.title),
    tracks,
  };
}
