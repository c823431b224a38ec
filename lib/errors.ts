/**
 * Error taxonomy for the curation pipeline
 *
 * FetchError is recovered per feed at the ingestion boundary. Everything
 * else propagates to the top of the run and is reported to the operator.
 */

export type CuratorErrorCode =
  | 'FETCH_FAILED'
  | 'CONFIG_INVALID'
  | 'MISSING_CREDENTIAL'
  | 'ENRICHMENT_FAILED'
  | 'TRANSPORT_FAILED'
  | 'STATUS_ERROR'
  | 'MALFORMED_RESPONSE';

export class CuratorError extends Error {
  readonly code: CuratorErrorCode;

  constructor(code: CuratorErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CuratorError';
    this.code = code;
  }
}

export class FetchError extends CuratorError {
  constructor(public readonly url: string, cause: unknown) {
    super('FETCH_FAILED', `Failed to fetch feed ${url}: ${describeError(cause)}`, { cause });
    this.name = 'FetchError';
  }
}

export class ConfigError extends CuratorError {
  constructor(message: string, public readonly issues: string[] = []) {
    super('CONFIG_INVALID', issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
  }
}

export class MissingCredentialError extends CuratorError {
  constructor(public readonly variable: string) {
    super('MISSING_CREDENTIAL', `${variable} is not set. Provide it with --api-key or in the environment.`);
    this.name = 'MissingCredentialError';
  }
}

export class EnrichmentError extends CuratorError {
  constructor(message: string, options?: { cause?: unknown; code?: CuratorErrorCode }) {
    super(options?.code ?? 'ENRICHMENT_FAILED', message, { cause: options?.cause });
    this.name = 'EnrichmentError';
  }
}

export class TransportError extends EnrichmentError {
  constructor(provider: string, cause: unknown) {
    super(`${provider} request failed: ${describeError(cause)}`, { cause, code: 'TRANSPORT_FAILED' });
    this.name = 'TransportError';
  }
}

export class StatusError extends EnrichmentError {
  constructor(
    provider: string,
    public readonly status: number,
    public readonly body: string
  ) {
    super(`${provider} API error: ${status} ${body}`, { code: 'STATUS_ERROR' });
    this.name = 'StatusError';
  }
}

export class MalformedEnrichmentResponse extends EnrichmentError {
  constructor(
    public readonly reason: string,
    public readonly excerpt: string = ''
  ) {
    super(`Failed to parse JSON from completion response: ${reason}`, { code: 'MALFORMED_RESPONSE' });
    this.name = 'MalformedEnrichmentResponse';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
