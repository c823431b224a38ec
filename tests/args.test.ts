import { describe, it, expect } from 'vitest';
import { getMany, getOne, parseArgs } from '../scripts/args';
import { ConfigError } from '../lib/errors';

describe('parseArgs', () => {
  it('should collect multiple values until the next option', () => {
    const args = parseArgs(['-f', 'https://a.example/rss', 'https://b.example/rss', '--output', 'out.json'], {
      f: 'feeds',
    });
    expect(getMany(args, 'feeds')).toEqual(['https://a.example/rss', 'https://b.example/rss']);
    expect(getOne(args, 'output')).toBe('out.json');
  });

  it('should record bare flags', () => {
    const args = parseArgs(['--enrich', '--fallback']);
    expect(args.flags.has('enrich')).toBe(true);
    expect(args.flags.has('fallback')).toBe(true);
    expect(getOne(args, 'enrich')).toBeUndefined();
  });

  it('should accept inline values', () => {
    const args = parseArgs(['--config=feeds.json', '--query=a=b']);
    expect(getOne(args, 'config')).toBe('feeds.json');
    expect(getOne(args, 'query')).toBe('a=b');
  });

  it('should reject a stray positional argument', () => {
    expect(() => parseArgs(['oops'])).toThrow(ConfigError);
  });

  it('should reject several values for a single-valued option', () => {
    const args = parseArgs(['--output', 'a.json', 'b.json']);
    expect(() => getOne(args, 'output')).toThrow('--output takes a single value');
  });
});
