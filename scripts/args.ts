/**
 * Minimal argv parsing for the scripts: `--flag`, `--flag value` and
 * `--flag v1 v2 ...` (values run until the next `--option`). Short aliases
 * map onto their long names.
 */

import { ConfigError } from '../lib/errors';

export interface ParsedArgs {
  flags: Set<string>;
  values: Map<string, string[]>;
}

export function parseArgs(argv: string[], aliases: Record<string, string> = {}): ParsedArgs {
  const flags = new Set<string>();
  const values = new Map<string, string[]>();
  let current: string | null = null;

  for (const arg of argv) {
    if (arg.startsWith('-') && arg.length > 1 && !/^-\d/.test(arg)) {
      const raw = arg.replace(/^--?/, '');
      const [name, inline] = raw.split(/=(.*)/s, 2);
      current = aliases[name] ?? name;
      flags.add(current);
      if (!values.has(current)) {
        values.set(current, []);
      }
      if (inline !== undefined) {
        values.get(current)?.push(inline);
        current = null;
      }
      continue;
    }

    if (current === null) {
      throw new ConfigError(`Unexpected argument "${arg}"`);
    }
    values.get(current)?.push(arg);
  }

  return { flags, values };
}

export function getOne(args: ParsedArgs, name: string): string | undefined {
  const list = args.values.get(name);
  if (!list || list.length === 0) {
    return undefined;
  }
  if (list.length > 1) {
    throw new ConfigError(`--${name} takes a single value`);
  }
  return list[0];
}

export function getMany(args: ParsedArgs, name: string): string[] {
  return args.values.get(name) ?? [];
}
