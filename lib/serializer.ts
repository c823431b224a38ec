/**
 * Renders episodes into the plain-text document the prompts embed.
 * Field order and the `---` delimiter are part of the prompt contract.
 */

import type { EpisodeRecord } from './types';

export const EPISODE_DELIMITER = '---';

function renderEpisode(episode: EpisodeRecord): string {
  let block = `EPISODE: ${episode.title}\n`;
  block += `DATE: ${episode.publishedAt}\n`;
  block += `SOURCE: ${episode.sourceFeedTitle}\n`;
  block += `MEDIA URL: ${episode.mediaUrl ?? 'None'}\n`;

  if (episode.duration) {
    block += `DURATION: ${episode.duration}\n`;
  }

  block += `SUMMARY: ${episode.summary}\n\n`;
  block += `${EPISODE_DELIMITER}\n\n`;
  return block;
}

export function createTextBlob(episodes: EpisodeRecord[]): string {
  const header = `PODCAST FEED CONTENT (${episodes.length} episodes):\n\n`;
  return header + episodes.map(renderEpisode).join('');
}
