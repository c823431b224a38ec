/**
 * Enrich a random sample of a raw episode dump, without fetching any feed
 *
 * Usage:
 *   npm run process-subset -- --input player_feeds/retro-gaming_raw.json --size 5 -i retro_gaming 3d_printing
 */

import 'dotenv/config';
import { Config, PromptVariantSchema, parseEpisodeDump } from '../lib/config';
import { ConfigError, describeError } from '../lib/errors';
import { Orchestrator } from '../lib/orchestrator';
import { summarizeDocument } from '../lib/projector';
import { LocalStorageTool } from '../lib/tools/storage';
import { createCompletionTool } from '../lib/tools/completion';
import type { EpisodeRecord } from '../lib/types';
import { getMany, getOne, parseArgs } from './args';
import { formatSummary } from './summary';

function sample<T>(items: T[], size: number): T[] {
  const pool = [...items];
  const count = Math.min(size, pool.length);
  for (let i = 0; i < count; i++) {
    const j = i + Math.floor(Math.random() * (pool.length - i));
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }
  return pool.slice(0, count);
}

async function main() {
  const args = parseArgs(process.argv.slice(2), { i: 'interests', o: 'output' });
  const input = getOne(args, 'input') ?? 'sample_output/raw_episodes.json';
  const output = getOne(args, 'output') ?? 'sample_output/subset_output.json';
  const size = Number(getOne(args, 'size') ?? '5');
  if (!Number.isInteger(size) || size < 1) {
    throw new ConfigError('--size must be a positive integer');
  }
  const variant = PromptVariantSchema.parse(getOne(args, 'variant') ?? 'curated');

  const completion = createCompletionTool(Config.completionSettings({ apiKey: getOne(args, 'api-key') }));

  const storage = new LocalStorageTool();
  const episodes = parseEpisodeDump(await storage.getJson(input), `episode dump ${input}`);
  console.log(`Total episodes available: ${episodes.length}`);

  const selected = sample(episodes, size);
  console.log(`Selected ${selected.length} random episodes for processing.`);
  console.log('\nSelected episodes:');
  selected.forEach((episode, index) => console.log(`${index + 1}. ${episode.title} (${episode.sourceFeedTitle})`));

  const orchestrator = new Orchestrator({ completion, storage });
  const result = await orchestrator.runGroup(
    {
      name: 'subset',
      description: 'Curated Podcast Feed',
      primary_interest: '',
      additional_interests: getMany(args, 'interests'),
      sources: [],
      filter_keywords: [],
      max_episodes: selected.length,
      user_name: getOne(args, 'user'),
    },
    {
      mode: 'enrich',
      promptVariant: variant,
      outputPath: output,
      episodeSource: async (): Promise<EpisodeRecord[]> => selected,
    }
  );

  console.log(`\nSuccessfully processed subset. Output saved to ${result.outputPath}`);

  const lines = formatSummary(summarizeDocument(result.document), { heading: 'Tracks', insightLabel: 'Insight' });
  lines.forEach(line => console.log(line));
}

main().catch(error => {
  console.error(`Error: ${describeError(error)}`);
  process.exit(1);
});
