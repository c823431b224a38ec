/**
 * Episode filtering - keyword relevance then a count cap, in that order
 */

import type { EpisodeRecord } from './types';
import { ConfigError } from './errors';

export interface FilterOptions {
  keywords: string[];
  maxEpisodes: number;
}

export interface FilterResult {
  episodes: EpisodeRecord[];
  matched: number;
  capped: number;
}

/**
 * Keep an episode when any keyword appears in its title or summary.
 * An empty keyword list keeps everything.
 */
export function filterByKeywords(episodes: EpisodeRecord[], keywords: string[]): EpisodeRecord[] {
  if (keywords.length === 0) {
    return [...episodes];
  }

  return episodes.filter(episode => {
    const searchable = `${episode.title} ${episode.summary}`.toLowerCase();
    return keywords.some(keyword => searchable.includes(keyword.toLowerCase()));
  });
}

export function capEpisodes(episodes: EpisodeRecord[], maxEpisodes: number): EpisodeRecord[] {
  if (!Number.isInteger(maxEpisodes) || maxEpisodes < 0) {
    throw new ConfigError(`max_episodes must be a non-negative integer, got ${maxEpisodes}`);
  }
  return episodes.slice(0, maxEpisodes);
}

export function applyEpisodeFilters(episodes: EpisodeRecord[], options: FilterOptions): FilterResult {
  const matched = filterByKeywords(episodes, options.keywords);
  const capped = capEpisodes(matched, options.maxEpisodes);

  return {
    episodes: capped,
    matched: matched.length,
    capped: matched.length - capped.length,
  };
}
