/**
 * Shared types for CLI commands.
 */

export interface Command {
  name: string;
  description: string;
  usage: string;
  handler: (args: string[]) => Promise<void>;
}

/**
 * Arguments split into positionals, valued options and boolean flags.
 */
export interface ParsedArgs {
  positional: string[];
  options: Map<string, string>;
  flags: Set<string>;
}
