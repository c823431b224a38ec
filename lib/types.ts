/**
 * Core type definitions for the feed curation pipeline
 */

export interface RawEnclosure {
  href?: string;
  type?: string;
  length?: string;
}

/**
 * One feed entry as the feed source hands it over. Every field is optional;
 * the normalizer decides what to do with the gaps.
 */
export interface RawFeedEntry {
  id?: string;
  guid?: string;
  title?: string;
  published?: string;
  summary?: string;
  description?: string;
  enclosures?: RawEnclosure[];
  duration?: string;
  image?: { href?: string };
  imageUrl?: string;
}

export interface FetchedFeed {
  title?: string;
  url: string;
  entries: RawFeedEntry[];
}

export interface EpisodeRecord {
  id: string;
  title: string;
  publishedAt: string; // ISO-8601 when the source gives one, carried as text
  summary: string;
  sourceFeedTitle: string;
  mediaUrl: string | null;
  duration: string | null;
  imageUrl: string | null;
  enclosures: RawEnclosure[];
}

// Player document: the minimal format a playback client reads directly

export interface PlayerTrack {
  id: string;
  title: string;
  audioUrl: string;
  description: string;
  albumArt?: string;
}

export interface PlayerFeed {
  id: string;
  title: string;
  tracks: PlayerTrack[];
}

export interface PlayerDocument {
  feeds: [PlayerFeed];
}

// Enrichment document: what the completion service is asked to produce

export type ContentDensity = 'LOW' | 'MEDIUM' | 'HIGH';

export interface TechnicalElement {
  concept: string;
  relevance: number; // 0..1
}

export interface TrackEnrichment {
  precision_summary: string;
  technical_elements: TechnicalElement[];
  content_density: ContentDensity;
  confidence_score: number; // 0..1
  [insightField: string]: unknown;
}

export interface EnrichedTrack {
  id: string;
  title: string;
  description: string;
  audioUrl: string;
  date_iso: string;
  runtime_minutes: number;
  enrichment: TrackEnrichment;
}

export interface EnrichedFeed {
  id: string;
  title: string;
  tracks: EnrichedTrack[];
}

/**
 * Only the presence of `feeds` is checked; the shape described by
 * EnrichedFeed is what the prompt asks for, not what is enforced.
 */
export type EnrichmentDocument = Record<string, unknown> & { feeds: unknown };

export type OutputDocument = PlayerDocument | EnrichmentDocument;

// Feed-set configuration

export type PromptVariant = 'curated' | 'focused' | 'personalized' | 'player';

export interface FeedGroup {
  name: string;
  description: string;
  primary_interest: string;
  additional_interests: string[];
  sources: string[];
  filter_keywords: string[];
  max_episodes: number;
  output_file?: string;
  prompt_variant?: PromptVariant;
  user_name?: string;
  user_focus?: string;
}

export interface FeedSet {
  feeds: FeedGroup[];
}

// Pipeline

export type PipelineMode = 'player' | 'enrich';

export type PipelineState =
  | 'Fetching'
  | 'Normalizing'
  | 'Filtering'
  | 'Serializing'
  | 'Prompting'
  | 'Completing'
  | 'Extracting'
  | 'Projecting'
  | 'Done'
  | 'Failed';

export interface SourceReport {
  url: string;
  feed_title?: string;
  items_found: number;
  status: 'success' | 'failed';
  error?: string;
}

export interface AgentMessage<I, O> {
  agent: string;
  run_id: string;
  timestamp: string;
  input: I;
  output?: O;
  errors: string[];
  duration_ms?: number;
}
