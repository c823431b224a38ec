/**
 * Feed Tool - Fetch and parse podcast RSS/Atom feeds into raw entries
 */

import Parser from 'rss-parser';
import type { FetchedFeed, RawEnclosure, RawFeedEntry } from '../types';
import { Config } from '../config';
import { FetchError } from '../errors';
import { Logger } from '../utils';

interface MediaContent {
  $?: {
    url?: string;
    type?: string;
    fileSize?: string;
  };
}

interface PodcastItemFields {
  id?: string;
  itunes?: {
    duration?: string;
    image?: string;
    summary?: string;
  };
  mediaContent?: MediaContent[];
}

type ParsedItem = Parser.Item & PodcastItemFields;

export interface FeedSource {
  fetchFeed(url: string): Promise<FetchedFeed>;
}

function collectEnclosures(item: ParsedItem): RawEnclosure[] {
  const enclosures: RawEnclosure[] = [];

  if (item.enclosure?.url) {
    enclosures.push({
      href: item.enclosure.url,
      type: item.enclosure.type,
      ...(item.enclosure.length !== undefined && { length: String(item.enclosure.length) }),
    });
  }

  for (const media of item.mediaContent ?? []) {
    if (media.$?.url) {
      enclosures.push({ href: media.$.url, type: media.$.type, length: media.$.fileSize });
    }
  }

  return enclosures;
}

export function toRawEntry(item: ParsedItem): RawFeedEntry {
  return {
    id: item.id,
    guid: item.guid,
    title: item.title,
    published: item.isoDate || item.pubDate,
    summary: item.summary || item.itunes?.summary,
    description: item.contentSnippet || item.content,
    enclosures: collectEnclosures(item),
    duration: item.itunes?.duration,
    ...(item.itunes?.image && { image: { href: item.itunes.image } }),
  };
}

export class FeedTool implements FeedSource {
  private parser: Parser<Record<string, unknown>, PodcastItemFields>;

  constructor(options: { timeout?: number } = {}) {
    this.parser = new Parser<Record<string, unknown>, PodcastItemFields>({
      timeout: options.timeout ?? Config.FEED_TIMEOUT_MS,
      headers: {
        'User-Agent': 'Mozilla/5.0 (compatible; PodcastCuratorBot/1.0)',
      },
      customFields: {
        item: [['media:content', 'mediaContent', { keepArray: true }]],
      },
    });
  }

  async fetchFeed(url: string): Promise<FetchedFeed> {
    Logger.debug('Fetching feed', { url });

    let feed: Parser.Output<PodcastItemFields>;
    try {
      feed = await this.parser.parseURL(url);
    } catch (error) {
      throw new FetchError(url, error);
    }

    return this.toFetchedFeed(feed, url);
  }

  async parseFeedXml(xml: string, url: string): Promise<FetchedFeed> {
    let feed: Parser.Output<PodcastItemFields>;
    try {
      feed = await this.parser.parseString(xml);
    } catch (error) {
      throw new FetchError(url, error);
    }

    return this.toFetchedFeed(feed, url);
  }

  private toFetchedFeed(feed: Parser.Output<PodcastItemFields>, url: string): FetchedFeed {
    const entries = (feed.items || []).map(item => toRawEntry(item));
    Logger.debug('Parsed feed', { url, title: feed.title, entries: entries.length });

    return {
      title: feed.title,
      url,
      entries,
    };
  }
}
