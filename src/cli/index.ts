/**
 * Recipe Finder command-line interface.
 *
 * Usage: recipe-finder <command> [options]
 *
 * Exit codes: 0 success, 1 runtime error, 2 usage error, 3 invalid config.
 */

import { commands } from './commands/index.js';
import { ConfigError, InvalidArgumentError, errorMessage } from '../utils/errors.js';
import { VERSION } from '../utils/version.js';

export { commands };

export function showHelp(): void {
  console.log('Recipe Finder');
  console.log('');
  console.log('Usage: recipe-finder <command> [options]');
  console.log('');
  console.log('Commands:');
  for (const cmd of commands) {
    console.log(`  ${cmd.name.padEnd(16)} ${cmd.description}`);
  }
  console.log('');
  console.log('Options:');
  console.log('  --version        Show version');
  console.log('  --help           Show help');
  console.log('');
  console.log('Run "recipe-finder <command> --help" for command-specific help.');
}

function exitCodeFor(error: unknown): number {
  if (error instanceof ConfigError) return 3;
  if (error instanceof InvalidArgumentError) return 2;
  return 1;
}

export async function main(args: string[]): Promise<void> {
  if (args.length === 0) {
    showHelp();
    return;
  }

  const commandName = args[0];
  if (commandName === '--version' || commandName === '-v') {
    console.log(`recipe-finder ${VERSION}`);
    return;
  }
  if (commandName === '--help' || commandName === '-h') {
    showHelp();
    return;
  }

  const command = commands.find((c) => c.name === commandName);
  if (!command) {
    console.error(`Unknown command: ${commandName}`);
    console.log('Run "recipe-finder --help" for available commands.');
    process.exit(2);
    return;
  }

  const rest = args.slice(1);
  if (rest.includes('--help') || rest.includes('-h')) {
    console.log(`${command.description}\n\nUsage: ${command.usage}`);
    return;
  }

  try {
    await command.handler(rest);
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    process.exit(exitCodeFor(error));
  }
}
