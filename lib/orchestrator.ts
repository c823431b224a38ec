/**
 * Orchestrator - Runs feed groups through the curation pipeline
 *
 * Fetching -> Normalizing -> Filtering, then either
 *   Serializing -> Prompting -> Completing -> Extracting -> Done   (enrich)
 *   Projecting -> Done                                             (player)
 */

import { dirname, join } from 'path';
import { Config } from './config';
import { Logger, Crypto } from './utils';
import { ConfigError, EnrichmentError, describeError } from './errors';
import type {
  EpisodeRecord,
  FeedGroup,
  FeedSet,
  OutputDocument,
  PipelineMode,
  PipelineState,
  PromptVariant,
} from './types';
import { applyEpisodeFilters } from './filter';
import { renderOutputExample, type PromptContext } from './prompts';
import { sanitizeId, toPlayerDocument, type DroppedTrack } from './projector';
import type { ExtractionStrategy } from './extractor';
import type { FeedSource } from './tools/feed';
import type { CompletionTool } from './tools/completion';
import { LocalStorageTool, type StorageTool } from './tools/storage';
import { RunTracker } from './tools/run-tracker';
import { IngestionAgent } from './agents/ingestion';
import { EnrichmentAgent } from './agents/enrichment';

/**
 * Replaces Fetch + Normalize for a group, e.g. to replay a raw dump.
 */
export type EpisodeSource = (group: FeedGroup) => Promise<EpisodeRecord[]>;

export interface RunGroupOptions {
  mode: PipelineMode;
  episodeSource?: EpisodeSource;
  promptVariant?: PromptVariant;
  outputPath?: string;
  rawDumpPath?: string;
  fallbackToPlayer?: boolean;
  extractionStrategy?: ExtractionStrategy;
}

export type RunAllOptions = Omit<RunGroupOptions, 'outputPath' | 'rawDumpPath'> & {
  outputDir?: string;
  dumpRaw?: boolean;
};

export interface GroupRunResult {
  runId: string;
  group: string;
  mode: PipelineMode;
  enriched: boolean;
  outputPath: string;
  rawDumpPath?: string;
  document: OutputDocument;
  episodesFetched: number;
  episodesSelected: number;
  droppedTracks: DroppedTrack[];
  failedSources: string[];
  states: PipelineState[];
}

export type GroupOutcome =
  | { group: string; ok: true; result: GroupRunResult }
  | { group: string; ok: false; error: string };

export interface RunAllResult {
  outcomes: GroupOutcome[];
  succeeded: number;
  failed: number;
}

export interface OrchestratorOptions {
  feedSource?: FeedSource;
  completion?: CompletionTool;
  storage?: StorageTool;
  tracker?: RunTracker;
  clock?: () => Date;
}

export function groupInterests(group: FeedGroup): string[] {
  return [group.primary_interest, ...group.additional_interests].filter(interest => interest.trim() !== '');
}

export function promptContextFor(group: FeedGroup, variant: PromptVariant): PromptContext {
  const feedTitle = group.description || group.name;
  const context: PromptContext = {
    interests: groupInterests(group),
    primaryInterest: group.primary_interest || undefined,
    userName: group.user_name,
    userFocus: group.user_focus,
  };

  if (variant === 'focused') {
    return { ...context, feedId: `${sanitizeId(group.name)}-feed`, feedTitle };
  }
  if (variant === 'player') {
    return { ...context, feedId: sanitizeId(group.name), feedTitle };
  }
  return context;
}

export function defaultOutputPath(group: FeedGroup, outputDir: string = Config.OUTPUT_DIR): string {
  return group.output_file ?? join(outputDir, `${sanitizeId(group.name)}.json`);
}

export class Orchestrator {
  private ingestionAgent: IngestionAgent;
  private enrichmentAgent: EnrichmentAgent | null;
  private storage: StorageTool;
  private tracker: RunTracker;

  constructor(options: OrchestratorOptions = {}) {
    this.ingestionAgent = new IngestionAgent({ feedSource: options.feedSource, clock: options.clock });
    this.enrichmentAgent = options.completion ? new EnrichmentAgent(options.completion) : null;
    this.storage = options.storage ?? new LocalStorageTool();
    this.tracker = options.tracker ?? new RunTracker();
  }

  async runGroup(group: FeedGroup, options: RunGroupOptions): Promise<GroupRunResult> {
    const variant = options.promptVariant ?? group.prompt_variant ?? 'focused';
    const outputPath = options.outputPath ?? defaultOutputPath(group);

    // Configuration problems surface here, before any network activity
    if (!Number.isInteger(group.max_episodes) || group.max_episodes < 0) {
      throw new ConfigError(`Feed "${group.name}" has an invalid max_episodes value: ${group.max_episodes}`);
    }
    const promptContext = promptContextFor(group, variant);
    let enrich = options.mode === 'enrich';
    if (enrich) {
      renderOutputExample(variant, promptContext);
      if (!this.enrichmentAgent) {
        if (!options.fallbackToPlayer) {
          throw new ConfigError(`Feed "${group.name}" needs a completion service for enrichment`);
        }
        Logger.warn('No completion service configured, generating the player feed without enrichment', {
          group: group.name,
        });
        enrich = false;
      }
    }

    const runId = Crypto.uuid();
    Logger.info('Processing feed', {
      runId,
      group: group.name,
      description: group.description,
      mode: enrich ? 'enrich' : 'player',
      variant: enrich ? variant : undefined,
      sources: group.sources.length,
    });

    this.tracker.startRun(runId, `Fetching ${group.sources.length} sources`);

    try {
      // 1. FETCH + NORMALIZE
      let episodes: EpisodeRecord[];
      let failedSources: string[] = [];

      if (options.episodeSource) {
        episodes = await options.episodeSource(group);
      } else {
        const ingestion = await this.ingestionAgent.execute(runId, { sources: group.sources });
        episodes = ingestion.output.episodes;
        failedSources = ingestion.output.failed_sources;
      }
      this.tracker.transition(runId, 'Normalizing', `Normalized ${episodes.length} episodes`, {
        failed_sources: failedSources.length,
      });

      let rawDumpPath: string | undefined;
      if (options.rawDumpPath) {
        rawDumpPath = await this.storage.putJson(options.rawDumpPath, episodes);
        Logger.info('Saved raw episodes', { path: rawDumpPath, count: episodes.length });
      }

      // 2. FILTER + CAP
      const filtered = applyEpisodeFilters(episodes, {
        keywords: group.filter_keywords,
        maxEpisodes: group.max_episodes,
      });
      this.tracker.transition(runId, 'Filtering', `Selected ${filtered.episodes.length} episodes`, {
        matched: filtered.matched,
        capped: filtered.capped,
      });
      if (group.filter_keywords.length > 0) {
        Logger.info('Filtered to relevant episodes', { group: group.name, matched: filtered.matched });
      }
      if (filtered.capped > 0) {
        Logger.info('Limiting episodes for processing', { max_episodes: group.max_episodes });
      }

      const base = {
        runId,
        group: group.name,
        mode: options.mode,
        outputPath,
        rawDumpPath,
        episodesFetched: episodes.length,
        episodesSelected: filtered.episodes.length,
        failedSources,
      };

      // 3a. ENRICH
      if (enrich && this.enrichmentAgent) {
        try {
          const enrichment = await this.enrichmentAgent.execute(runId, {
            episodes: filtered.episodes,
            variant,
            context: promptContext,
            strategy: options.extractionStrategy,
            onState: (state, message, details) => this.tracker.transition(runId, state, message, details),
          });

          const writtenPath = await this.storage.putJson(outputPath, enrichment.output.document);
          this.tracker.transition(runId, 'Done', `Saved enriched feed to ${writtenPath}`);
          Logger.info('Successfully created enriched feed', { group: group.name, path: writtenPath });

          return {
            ...base,
            outputPath: writtenPath,
            enriched: true,
            document: enrichment.output.document,
            droppedTracks: [],
            states: this.tracker.states(runId),
          };
        } catch (error) {
          if (!(error instanceof EnrichmentError) || !options.fallbackToPlayer) {
            throw error;
          }
          this.tracker.transition(runId, 'Failed', describeError(error));
          Logger.warn('Enrichment failed, falling back to the player format', {
            group: group.name,
            error: describeError(error),
          });
        }
      }

      // 3b. PROJECT
      this.tracker.transition(runId, 'Projecting', 'Projecting episodes into the player format');
      const projection = toPlayerDocument(filtered.episodes, group.name, group.description || group.name);
      const writtenPath = await this.storage.putJson(outputPath, projection.document);
      this.tracker.transition(runId, 'Done', `Saved player feed to ${writtenPath}`);

      Logger.info('Successfully created player-compatible feed', {
        group: group.name,
        path: writtenPath,
        tracks: projection.document.feeds[0].tracks.length,
        dropped: projection.dropped.length,
      });

      return {
        ...base,
        outputPath: writtenPath,
        enriched: false,
        document: projection.document,
        droppedTracks: projection.dropped,
        states: this.tracker.states(runId),
      };
    } catch (error) {
      const progress = this.tracker.getProgress(runId);
      if (progress && progress.currentState !== 'Failed' && progress.currentState !== 'Done') {
        this.tracker.transition(runId, 'Failed', describeError(error));
      }
      throw error;
    }
  }

  /**
   * Groups run one after another. A failing group is reported and skipped;
   * outputs already written by earlier groups stay in place.
   */
  async runAll(feedSet: FeedSet, options: RunAllOptions): Promise<RunAllResult> {
    const { outputDir, dumpRaw, ...groupOptions } = options;
    const outcomes: GroupOutcome[] = [];

    for (const group of feedSet.feeds) {
      const outputPath = outputDir
        ? join(outputDir, `${sanitizeId(group.name)}.json`)
        : defaultOutputPath(group);

      try {
        const result = await this.runGroup(group, {
          ...groupOptions,
          outputPath,
          rawDumpPath: dumpRaw ? join(dirname(outputPath), `${sanitizeId(group.name)}_raw.json`) : undefined,
        });
        outcomes.push({ group: group.name, ok: true, result });
      } catch (error) {
        Logger.error('Feed processing failed', { group: group.name, error: describeError(error) });
        outcomes.push({ group: group.name, ok: false, error: describeError(error) });
      }
    }

    const succeeded = outcomes.filter(outcome => outcome.ok).length;
    Logger.info('Processed feeds', { succeeded, total: feedSet.feeds.length });

    return { outcomes, succeeded, failed: outcomes.length - succeeded };
  }

  getTracker(): RunTracker {
    return this.tracker;
  }
}
