/**
 * Curate an ad-hoc set of feeds into an enriched JSON feed
 *
 * Usage:
 *   npm run curate -- -f https://example.com/feed.xml https://example.org/rss -i ai_hobbies retro_gaming
 *   npm run curate -- -f <urls...> -o my_feed.json --variant personalized --user Alex
 */

import 'dotenv/config';
import { Config, PromptVariantSchema, parseProvider } from '../lib/config';
import { ConfigError, describeError } from '../lib/errors';
import { Orchestrator } from '../lib/orchestrator';
import { summarizeDocument } from '../lib/projector';
import { createCompletionTool } from '../lib/tools/completion';
import { getMany, getOne, parseArgs } from './args';
import { formatSummary } from './summary';

async function main() {
  const args = parseArgs(process.argv.slice(2), { f: 'feeds', i: 'interests', o: 'output' });

  const feeds = getMany(args, 'feeds');
  if (feeds.length === 0) {
    throw new ConfigError('At least one feed URL is required (-f/--feeds)');
  }

  const variant = PromptVariantSchema.parse(getOne(args, 'variant') ?? 'curated');
  const output = getOne(args, 'output') ?? 'curated_output.json';
  const provider = parseProvider(getOne(args, 'provider') ?? Config.COMPLETION_PROVIDER);

  // Resolved before anything is fetched: a missing key stops the run here
  const completion = createCompletionTool(
    Config.completionSettings({ provider, apiKey: getOne(args, 'api-key') })
  );

  const orchestrator = new Orchestrator({ completion });

  console.log(`Processing ${feeds.length} feeds...`);

  const result = await orchestrator.runGroup(
    {
      name: 'curated',
      description: 'Curated Podcast Feed',
      primary_interest: '',
      additional_interests: getMany(args, 'interests'),
      sources: feeds,
      filter_keywords: [],
      max_episodes: Config.DEFAULT_MAX_EPISODES,
      user_name: getOne(args, 'user'),
    },
    { mode: 'enrich', promptVariant: variant, outputPath: output }
  );

  console.log(`Successfully processed feeds. Output saved to ${result.outputPath}`);

  const lines = formatSummary(summarizeDocument(result.document), { heading: 'Tracks', insightLabel: 'Insight' });
  lines.forEach(line => console.log(line));
}

main().catch(error => {
  console.error(`Error: ${describeError(error)}`);
  process.exit(1);
});
