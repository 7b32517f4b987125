/**
 * Shared CLI utilities.
 */

import { InvalidArgumentError } from '../utils/errors.js';
import type { ParsedArgs } from './types.js';

/**
 * Split `args`. Names in `valueOptions` (e.g. `--limit`) consume the next
 * argument; any other `--name` is a flag.
 */
export function parseArgs(args: readonly string[], valueOptions: readonly string[] = []): ParsedArgs {
  const parsed: ParsedArgs = { positional: [], options: new Map(), flags: new Set() };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg.startsWith('--')) {
      parsed.positional.push(arg);
    } else if (valueOptions.includes(arg)) {
      const value = args[i + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new InvalidArgumentError(`${arg} requires a value`, 'INVALID_ARGUMENT');
      }
      parsed.options.set(arg, value);
      i++;
    } else {
      parsed.flags.add(arg);
    }
  }

  return parsed;
}

/**
 * Read a non-negative integer option, if given.
 */
export function integerOption(parsed: ParsedArgs, name: string): number | undefined {
  const raw = parsed.options.get(name);
  if (raw === undefined) return undefined;
  if (!/^\d+$/.test(raw)) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer, got "${raw}"`, 'INVALID_ARGUMENT');
  }
  return parseInt(raw, 10);
}

/**
 * Print a usage error and exit with code 2.
 */
export function exitWithUsage(message: string, usage: string): void {
  console.error(`Error: ${message}`);
  console.log(`Usage: ${usage}`);
  process.exit(2);
}
