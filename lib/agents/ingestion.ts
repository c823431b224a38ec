/**
 * Ingestion Agent - Fetches feeds one at a time and normalizes their entries
 */

import { BaseAgent } from './base';
import type { EpisodeRecord, SourceReport } from '../types';
import { FeedTool, type FeedSource } from '../tools/feed';
import { normalizeEntries } from '../normalizer';
import { Clock, Logger, truncate } from '../utils';
import { describeError } from '../errors';

export interface IngestionInput {
  sources: string[];
}

export interface IngestionOutput {
  episodes: EpisodeRecord[];
  sources_fetched: number;
  items_found: number;
  failed_sources: string[];
  sources_scanned: SourceReport[];
}

export class IngestionAgent extends BaseAgent<IngestionInput, IngestionOutput> {
  private feedSource: FeedSource;
  private clock: () => Date;

  constructor(options: { feedSource?: FeedSource; clock?: () => Date } = {}) {
    super({ name: 'IngestionAgent' });

    this.feedSource = options.feedSource ?? new FeedTool();
    this.clock = options.clock ?? Clock.nowUtc;
  }

  protected async process(input: IngestionInput): Promise<IngestionOutput> {
    const episodes: EpisodeRecord[] = [];
    const sourcesScanned: SourceReport[] = [];
    const failedSources: string[] = [];
    let itemsFound = 0;

    Logger.info('Fetching sources', { count: input.sources.length });

    // Sequential on purpose: one feed at a time, in configured order
    for (const sourceUrl of input.sources) {
      try {
        const feed = await this.feedSource.fetchFeed(sourceUrl);
        const normalized = normalizeEntries(feed.entries, { title: feed.title, url: sourceUrl }, this.clock());

        episodes.push(...normalized);
        itemsFound += normalized.length;

        sourcesScanned.push({
          url: sourceUrl,
          feed_title: feed.title,
          items_found: normalized.length,
          status: 'success',
        });

        Logger.info('Source processed', {
          url: truncate(sourceUrl, 80),
          feed_title: feed.title,
          episodes: normalized.length,
        });
      } catch (error) {
        failedSources.push(sourceUrl);
        sourcesScanned.push({
          url: sourceUrl,
          items_found: 0,
          status: 'failed',
          error: describeError(error),
        });
        Logger.warn('Failed to fetch source', {
          url: truncate(sourceUrl, 80),
          error: describeError(error),
        });
      }
    }

    Logger.info('Ingestion complete', {
      sources_fetched: input.sources.length - failedSources.length,
      sources_failed: failedSources.length,
      episodes: episodes.length,
    });

    return {
      episodes,
      sources_fetched: input.sources.length - failedSources.length,
      items_found: itemsFound,
      failed_sources: failedSources,
      sources_scanned: sourcesScanned,
    };
  }
}
