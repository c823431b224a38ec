/**
 * Completion Tool - One synchronous prompt/response round trip with a
 * generative model. No retries: a failed call ends the run.
 */

import Anthropic from '@anthropic-ai/sdk';
import OpenAI from 'openai';
import type { CompletionSettings } from '../config';
import { MalformedEnrichmentResponse, MissingCredentialError, StatusError, TransportError } from '../errors';
import { Logger } from '../utils';

export interface CompletionTool {
  readonly provider: string;
  readonly model: string;
  complete(prompt: string): Promise<string>;
}

interface ApiErrorLike {
  status?: number;
  error?: unknown;
}

type AnthropicFetch = NonNullable<ConstructorParameters<typeof Anthropic>[0]>['fetch'];
type OpenAIFetch = NonNullable<ConstructorParameters<typeof OpenAI>[0]>['fetch'];

function responseBody(error: unknown): string {
  if (error === undefined || error === null) {
    return '';
  }
  return typeof error === 'string' ? error : JSON.stringify(error);
}

/**
 * Both SDKs raise APIError with a numeric status for HTTP failures and a
 * status-less APIConnectionError subclass when the request never completed.
 * `error` holds the parsed response body; the SDK message already repeats
 * the status, so it is not used.
 */
function toEnrichmentError(provider: string, error: unknown, apiError: ApiErrorLike | null) {
  if (apiError && typeof apiError.status === 'number') {
    return new StatusError(provider, apiError.status, responseBody(apiError.error));
  }
  return new TransportError(provider, error);
}

export class AnthropicCompletionTool implements CompletionTool {
  readonly provider = 'Anthropic';
  readonly model: string;
  private client: Anthropic;
  private maxTokens: number;

  constructor(
    settings: Pick<CompletionSettings, 'apiKey' | 'model' | 'maxTokens'>,
    options: { fetch?: AnthropicFetch } = {}
  ) {
    if (!settings.apiKey) {
      throw new MissingCredentialError('ANTHROPIC_API_KEY');
    }

    this.model = settings.model;
    this.maxTokens = settings.maxTokens;
    this.client = new Anthropic({ apiKey: settings.apiKey, maxRetries: 0, fetch: options.fetch });
  }

  async complete(prompt: string): Promise<string> {
    Logger.info('Calling completion service', {
      provider: this.provider,
      model: this.model,
      maxTokens: this.maxTokens,
      promptLength: prompt.length,
    });

    let response: Anthropic.Message;
    try {
      response = await this.client.messages.create({
        model: this.model,
        max_tokens: this.maxTokens,
        messages: [{ role: 'user', content: prompt }],
      });
    } catch (error) {
      throw toEnrichmentError(this.provider, error, error instanceof Anthropic.APIError ? error : null);
    }

    Logger.info('Completion received', {
      provider: this.provider,
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
      stopReason: response.stop_reason,
    });

    const block = response.content[0];
    if (!block || block.type !== 'text') {
      throw new MalformedEnrichmentResponse('first content block is not text');
    }
    return block.text;
  }
}

export class OpenAICompletionTool implements CompletionTool {
  readonly provider = 'OpenAI';
  readonly model: string;
  private client: OpenAI;
  private maxTokens: number;

  constructor(
    settings: Pick<CompletionSettings, 'apiKey' | 'model' | 'maxTokens'>,
    options: { fetch?: OpenAIFetch } = {}
  ) {
    if (!settings.apiKey) {
      throw new MissingCredentialError('OPENAI_API_KEY');
    }

    this.model = settings.model;
    this.maxTokens = settings.maxTokens;
    this.client = new OpenAI({ apiKey: settings.apiKey, maxRetries: 0, fetch: options.fetch });
  }

  async complete(prompt: string): Promise<string> {
    Logger.info('Calling completion service', {
      provider: this.provider,
      model: this.model,
      maxTokens: this.maxTokens,
      promptLength: prompt.length,
    });

    let response: OpenAI.Chat.ChatCompletion;
    try {
      response = await this.client.chat.completions.create({
        model: this.model,
        max_tokens: this.maxTokens,
        messages: [{ role: 'user', content: prompt }],
      });
    } catch (error) {
      throw toEnrichmentError(this.provider, error, error instanceof OpenAI.APIError ? error : null);
    }

    Logger.info('Completion received', {
      provider: this.provider,
      promptTokens: response.usage?.prompt_tokens,
      completionTokens: response.usage?.completion_tokens,
      finishReason: response.choices[0]?.finish_reason,
    });

    const content = response.choices[0]?.message?.content;
    if (typeof content !== 'string') {
      throw new MalformedEnrichmentResponse('completion has no text content');
    }
    return content;
  }
}

export function createCompletionTool(settings: CompletionSettings): CompletionTool {
  return settings.provider === 'openai'
    ? new OpenAICompletionTool(settings)
    : new AnthropicCompletionTool(settings);
}
