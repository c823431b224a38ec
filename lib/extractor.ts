/**
 * Pulls a JSON object out of a free-form completion reply.
 *
 * Replies are allowed to wrap the payload in commentary or a fenced code
 * block. The default `scan` strategy walks the text with a brace-depth
 * counter that ignores braces inside string literals; `naive` keeps the
 * older first-`{`-to-last-`}` behaviour for output parity.
 */

import type { EnrichmentDocument } from './types';
import { MalformedEnrichmentResponse } from './errors';
import { acceptEnrichmentDocument, hasFeedsKey } from './projector';
import { isRecord, truncate } from './utils';

export type ExtractionStrategy = 'scan' | 'naive';

export interface ExtractionOptions {
  strategy?: ExtractionStrategy;
}

const EXCERPT_LENGTH = 200;

function excerpt(text: string): string {
  return truncate(text.trim(), EXCERPT_LENGTH);
}

function tryParse(candidate: string): { ok: true; value: unknown } | { ok: false; error: string } {
  try {
    return { ok: true, value: JSON.parse(candidate) };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
}

/**
 * Index of the `}` that closes the object opened at `start`, or -1 when the
 * text ends first.
 */
export function findMatchingBrace(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === '{') {
      depth++;
    } else if (ch === '}') {
      depth--;
      if (depth === 0) {
        return i;
      }
    }
  }

  return -1;
}

function extractNaive(text: string): Record<string, unknown> {
  const start = text.indexOf('{');
  if (start === -1) {
    throw new MalformedEnrichmentResponse('no opening brace found', excerpt(text));
  }

  const end = text.lastIndexOf('}');
  if (end === -1 || end < start) {
    throw new MalformedEnrichmentResponse('no closing brace after the opening brace', excerpt(text));
  }

  const parsed = tryParse(text.slice(start, end + 1));
  if (!parsed.ok) {
    throw new MalformedEnrichmentResponse(`invalid JSON (${parsed.error})`, excerpt(text));
  }
  if (!isRecord(parsed.value)) {
    throw new MalformedEnrichmentResponse('payload is not a JSON object', excerpt(text));
  }
  return parsed.value;
}

interface ScanResult {
  objects: Array<Record<string, unknown>>;
  sawClosedCandidate: boolean;
  lastError: string | null;
}

/**
 * Every top-level JSON object in the text, in order. A candidate that fails
 * to parse is skipped one character at a time so an object nested inside
 * prose braces is still found.
 */
function scanObjects(text: string): ScanResult {
  const result: ScanResult = { objects: [], sawClosedCandidate: false, lastError: null };
  let start = text.indexOf('{');

  while (start !== -1) {
    const end = findMatchingBrace(text, start);
    let next = start + 1;

    if (end !== -1) {
      result.sawClosedCandidate = true;
      const parsed = tryParse(text.slice(start, end + 1));
      if (parsed.ok && isRecord(parsed.value)) {
        result.objects.push(parsed.value);
        next = end + 1;
      } else if (!parsed.ok) {
        result.lastError = parsed.error;
      }
    }

    start = text.indexOf('{', next);
  }

  return result;
}

function scanFailure(text: string, scan: ScanResult): MalformedEnrichmentResponse {
  if (!text.includes('{')) {
    return new MalformedEnrichmentResponse('no opening brace found', excerpt(text));
  }
  if (!scan.sawClosedCandidate) {
    return new MalformedEnrichmentResponse('no closing brace after the opening brace', excerpt(text));
  }
  return new MalformedEnrichmentResponse(`invalid JSON (${scan.lastError ?? 'no parseable object'})`, excerpt(text));
}

export function extractJsonObject(text: string, options: ExtractionOptions = {}): Record<string, unknown> {
  if (options.strategy === 'naive') {
    return extractNaive(text);
  }

  const scan = scanObjects(text);
  if (scan.objects.length === 0) {
    throw scanFailure(text, scan);
  }
  return scan.objects[0];
}

/**
 * Extract the enrichment document. With the scanning strategy the first
 * object carrying `feeds` wins, so a stray object in the preamble does not
 * shadow the payload.
 */
export function extractEnrichmentDocument(text: string, options: ExtractionOptions = {}): EnrichmentDocument {
  if (options.strategy === 'naive') {
    const parsed = extractNaive(text);
    if (!hasFeedsKey(parsed)) {
      throw new MalformedEnrichmentResponse('response JSON has no "feeds" key', excerpt(text));
    }
    return acceptEnrichmentDocument(parsed);
  }

  const scan = scanObjects(text);
  if (scan.objects.length === 0) {
    throw scanFailure(text, scan);
  }

  const document = scan.objects.find(hasFeedsKey);
  if (!document) {
    throw new MalformedEnrichmentResponse('response JSON has no "feeds" key', excerpt(text));
  }
  return acceptEnrichmentDocument(document);
}
