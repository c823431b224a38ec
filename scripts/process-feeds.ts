/**
 * Process the feed groups of a feed-set configuration
 *
 * Usage:
 *   npm run process-feeds -- --list
 *   npm run process-feeds -- --feed retro-gaming
 *   npm run process-feeds -- --enrich --output-dir player_feeds --fallback
 */

import 'dotenv/config';
import { Config, PromptVariantSchema, loadFeedSet } from '../lib/config';
import { ConfigError, MissingCredentialError, describeError } from '../lib/errors';
import { Orchestrator } from '../lib/orchestrator';
import { summarizeDocument } from '../lib/projector';
import { Logger } from '../lib/utils';
import { createCompletionTool, type CompletionTool } from '../lib/tools/completion';
import type { FeedSet } from '../lib/types';
import { getOne, parseArgs } from './args';
import { formatSummary } from './summary';

function listFeeds(feedSet: FeedSet) {
  console.log('Available feeds:');
  for (const group of feedSet.feeds) {
    console.log(`- ${group.name}: ${group.description}`);
    console.log(`  Primary interest: ${group.primary_interest}`);
    console.log(`  Sources: ${group.sources.length}`);
  }
}

function resolveCompletion(apiKey: string | undefined, fallback: boolean): CompletionTool | undefined {
  try {
    return createCompletionTool(Config.completionSettings({ apiKey }));
  } catch (error) {
    if (error instanceof MissingCredentialError && fallback) {
      Logger.warn('No API key found, feeds will be generated without enrichment', {
        variable: error.variable,
      });
      return undefined;
    }
    throw error;
  }
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const configPath = getOne(args, 'config') ?? 'feeds_config.json';
  const feedSet = await loadFeedSet(configPath);

  if (args.flags.has('list')) {
    listFeeds(feedSet);
    return;
  }

  const enrich = args.flags.has('enrich');
  const fallback = args.flags.has('fallback');
  const variantArg = getOne(args, 'variant');
  const promptVariant = variantArg === undefined ? undefined : PromptVariantSchema.parse(variantArg);

  const feedName = getOne(args, 'feed');
  const selected = feedName ? feedSet.feeds.filter(group => group.name === feedName) : feedSet.feeds;
  if (selected.length === 0) {
    throw new ConfigError(`Feed "${feedName}" not found in ${configPath}`);
  }

  const completion = enrich ? resolveCompletion(getOne(args, 'api-key'), fallback) : undefined;
  const orchestrator = new Orchestrator({ completion });

  const result = await orchestrator.runAll(
    { feeds: selected },
    {
      mode: enrich ? 'enrich' : 'player',
      outputDir: getOne(args, 'output-dir') ?? Config.OUTPUT_DIR,
      dumpRaw: enrich,
      fallbackToPlayer: fallback,
      promptVariant,
    }
  );

  for (const outcome of result.outcomes) {
    if (outcome.ok) {
      const { result: run } = outcome;
      console.log(`${outcome.group}: ${run.episodesSelected} episodes -> ${run.outputPath}${run.enriched ? ' (enriched)' : ''}`);
      const lines = formatSummary(summarizeDocument(run.document), {
        heading: 'Sample tracks',
        insightLabel: 'Relevance',
        limit: 3,
        maxInsightLength: 100,
      });
      lines.forEach(line => console.log(line));
      console.log(`\n${'-'.repeat(50)}\n`);
    } else {
      console.log(`${outcome.group}: FAILED (${outcome.error})`);
    }
  }

  console.log(`\nProcessed ${result.succeeded}/${selected.length} feeds successfully.`);

  if (result.failed > 0) {
    process.exitCode = 1;
  }
}

main().catch(error => {
  console.error(`Error: ${describeError(error)}`);
  process.exit(1);
});
