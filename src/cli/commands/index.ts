import type { Command } from '../types.js';
import { ingestCommand } from './ingest.js';
import { favoritesCommand, recipeCommand, searchCommand, shoppingListCommand } from './search.js';
import { mcpCommand, serveCommand } from './serve.js';
import { configCommand } from './config.js';

export const commands: Command[] = [
  ingestCommand,
  searchCommand,
  recipeCommand,
  favoritesCommand,
  shoppingListCommand,
  serveCommand,
  mcpCommand,
  configCommand,
];
