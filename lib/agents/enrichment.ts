/**
 * Enrichment Agent - Serializes episodes, prompts the completion service and
 * extracts the enrichment document from its reply
 */

import { BaseAgent } from './base';
import type { EnrichmentDocument, EpisodeRecord, PipelineState, PromptVariant } from '../types';
import type { CompletionTool } from '../tools/completion';
import { createTextBlob } from '../serializer';
import { buildPrompt, type PromptContext } from '../prompts';
import { extractEnrichmentDocument, type ExtractionStrategy } from '../extractor';
import { Logger } from '../utils';

export type StateListener = (state: PipelineState, message: string, details?: Record<string, unknown>) => void;

export interface EnrichmentInput {
  episodes: EpisodeRecord[];
  variant: PromptVariant;
  context: PromptContext;
  strategy?: ExtractionStrategy;
  onState?: StateListener;
}

export interface EnrichmentOutput {
  document: EnrichmentDocument;
  prompt_length: number;
  response_length: number;
}

export class EnrichmentAgent extends BaseAgent<EnrichmentInput, EnrichmentOutput> {
  constructor(private completion: CompletionTool) {
    super({ name: 'EnrichmentAgent' });
  }

  protected async process(input: EnrichmentInput): Promise<EnrichmentOutput> {
    const { episodes, variant, context, strategy } = input;
    const onState: StateListener = input.onState ?? (() => undefined);

    onState('Serializing', `Serializing ${episodes.length} episodes`);
    const textBlob = createTextBlob(episodes);

    onState('Prompting', `Building ${variant} prompt`, { blob_length: textBlob.length });
    const prompt = buildPrompt({ variant, textBlob, ...context });

    onState('Completing', `Calling ${this.completion.provider}`, { model: this.completion.model });
    const response = await this.completion.complete(prompt);

    onState('Extracting', 'Extracting JSON from completion', { response_length: response.length });
    const document = extractEnrichmentDocument(response, { strategy });

    Logger.info('Enrichment document extracted', {
      variant,
      prompt_length: prompt.length,
      response_length: response.length,
    });

    return {
      document,
      prompt_length: prompt.length,
      response_length: response.length,
    };
  }
}
