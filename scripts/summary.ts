/**
 * Console summary of a written feed document
 */

import type { DocumentSummary } from '../lib/projector';
import { truncate } from '../lib/utils';

export interface SummaryFormat {
  heading: string;
  insightLabel: string;
  limit?: number;
  maxInsightLength?: number;
}

export function formatSummary(summary: DocumentSummary, format: SummaryFormat): string[] {
  if (summary.feedTitle === null) {
    return [];
  }

  const lines = [`\nCreated feed: ${summary.feedTitle}`, `Total tracks: ${summary.trackCount}`, `\n${format.heading}:`];
  const tracks = format.limit === undefined ? summary.tracks : summary.tracks.slice(0, format.limit);

  tracks.forEach((track, index) => {
    lines.push(`${index + 1}. ${track.title}`);
    if (track.insight !== null) {
      const insight = format.maxInsightLength ? truncate(track.insight, format.maxInsightLength) : track.insight;
      lines.push(`   ${format.insightLabel}: ${insight}`);
    }
  });

  return lines;
}
