/**
 * Configuration management for the curation pipeline
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { ConfigError, MissingCredentialError, describeError } from './errors';
import type { EpisodeRecord, FeedGroup, FeedSet } from './types';

export type CompletionProvider = 'anthropic' | 'openai';

export interface CompletionSettings {
  provider: CompletionProvider;
  model: string;
  maxTokens: number;
  apiKey: string;
}

const DEFAULT_MODELS: Record<CompletionProvider, string> = {
  anthropic: 'claude-3-5-sonnet-20241022',
  openai: 'gpt-4o',
};

const CREDENTIAL_VARIABLES: Record<CompletionProvider, string> = {
  anthropic: 'ANTHROPIC_API_KEY',
  openai: 'OPENAI_API_KEY',
};

function parsePositiveInt(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || '', 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

export class Config {
  // Completion service
  static ANTHROPIC_API_KEY = process.env.ANTHROPIC_API_KEY || '';
  static OPENAI_API_KEY = process.env.OPENAI_API_KEY || '';
  static COMPLETION_PROVIDER = process.env.COMPLETION_PROVIDER || 'anthropic';
  static COMPLETION_MODEL = process.env.COMPLETION_MODEL || '';
  static COMPLETION_MAX_TOKENS = parsePositiveInt(process.env.COMPLETION_MAX_TOKENS, 4000);

  // Feeds
  static FEED_TIMEOUT_MS = parsePositiveInt(process.env.FEED_TIMEOUT_MS, 15000);
  static DEFAULT_MAX_EPISODES = parsePositiveInt(process.env.DEFAULT_MAX_EPISODES, 30);

  // Output
  static OUTPUT_DIR = process.env.OUTPUT_DIR || 'player_feeds';

  static credentialVariable(provider: CompletionProvider): string {
    return CREDENTIAL_VARIABLES[provider];
  }

  /**
   * Resolve the settings handed to the completion tool. The credential is
   * read here once; nothing downstream looks at the environment again.
   */
  static completionSettings(overrides: Partial<CompletionSettings> = {}): CompletionSettings {
    const provider = overrides.provider ?? parseProvider(Config.COMPLETION_PROVIDER);
    const envKey = provider === 'anthropic' ? Config.ANTHROPIC_API_KEY : Config.OPENAI_API_KEY;
    const apiKey = overrides.apiKey || envKey;

    if (!apiKey) {
      throw new MissingCredentialError(CREDENTIAL_VARIABLES[provider]);
    }

    return {
      provider,
      model: overrides.model || Config.COMPLETION_MODEL || DEFAULT_MODELS[provider],
      maxTokens: overrides.maxTokens ?? Config.COMPLETION_MAX_TOKENS,
      apiKey,
    };
  }
}

export function parseProvider(value: string): CompletionProvider {
  if (value === 'anthropic' || value === 'openai') {
    return value;
  }
  throw new ConfigError(`Unknown completion provider "${value}"`, ['expected "anthropic" or "openai"']);
}

// Feed-set configuration (feeds_config.json)

export const PromptVariantSchema = z.enum(['curated', 'focused', 'personalized', 'player']);

export const FeedGroupSchema = z.object({
  name: z.string().trim().min(1, 'name is required'),
  description: z.string().default(''),
  primary_interest: z.string().default(''),
  additional_interests: z.array(z.string()).default([]),
  sources: z.array(z.string().url('sources must be URLs')).min(1, 'at least one source is required'),
  filter_keywords: z.array(z.string()).default([]),
  max_episodes: z.number().int().positive().optional(),
  output_file: z.string().min(1).optional(),
  prompt_variant: PromptVariantSchema.optional(),
  user_name: z.string().min(1).optional(),
  user_focus: z.string().optional(),
});

export const FeedSetSchema = z.object({
  feeds: z.array(FeedGroupSchema),
});

export function parseFeedSet(data: unknown, source = 'feed configuration'): FeedSet {
  const result = FeedSetSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError(`Invalid ${source}`, issues);
  }

  const feeds: FeedGroup[] = result.data.feeds.map(group => ({
    ...group,
    max_episodes: group.max_episodes ?? Config.DEFAULT_MAX_EPISODES,
  }));

  for (const group of feeds) {
    if (group.prompt_variant === 'personalized' && !group.user_name) {
      throw new ConfigError(`Invalid ${source}`, [`${group.name}: user_name is required for the personalized prompt`]);
    }
  }

  const names = new Set<string>();
  for (const group of feeds) {
    if (names.has(group.name)) {
      throw new ConfigError(`Invalid ${source}`, [`duplicate feed name "${group.name}"`]);
    }
    names.add(group.name);
  }

  return { feeds };
}

export async function loadFeedSet(path: string): Promise<FeedSet> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Configuration file ${path} not found or unreadable`, [describeError(error)]);
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Configuration file ${path} contains invalid JSON`, [describeError(error)]);
  }

  return parseFeedSet(data, `configuration file ${path}`);
}

// Raw episode dumps written by the enrich mode of process-feeds

const EnclosureSchema = z.object({
  href: z.string().optional(),
  type: z.string().optional(),
  length: z.string().optional(),
});

export const EpisodeRecordSchema = z.object({
  id: z.string(),
  title: z.string(),
  publishedAt: z.string(),
  summary: z.string(),
  sourceFeedTitle: z.string(),
  mediaUrl: z.string().nullable(),
  duration: z.string().nullable(),
  imageUrl: z.string().nullable(),
  enclosures: z.array(EnclosureSchema).default([]),
});

export function parseEpisodeDump(data: unknown, source = 'episode dump'): EpisodeRecord[] {
  const result = z.array(EpisodeRecordSchema).safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.slice(0, 10).map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError(`Invalid ${source}`, issues);
  }
  return result.data;
}
