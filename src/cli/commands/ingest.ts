import type { Command } from '../types.js';
import { exitWithUsage, integerOption, parseArgs } from '../utils.js';

const USAGE = 'recipe-finder ingest <file> [--batch-size <n>] [--replace]';

export const ingestCommand: Command = {
  name: 'ingest',
  description: 'Embed and index recipes from a JSON file',
  usage: USAGE,
  handler: async (args) => {
    const parsed = parseArgs(args, ['--batch-size']);
    const [file] = parsed.positional;
    if (!file) {
      exitWithUsage('Recipe file required', USAGE);
      return;
    }

    const { loadRecipesFile } = await import('../../ingest/recipe-loader.js');
    const { ingestRecipes } = await import('../../ingest/ingest-recipes.js');
    const { openRuntime } = await import('../runtime.js');

    const recipes = await loadRecipesFile(file);
    const runtime = openRuntime();
    if (parsed.flags.has('--replace')) {
      await runtime.store.clear();
    }

    const result = await ingestRecipes(recipes, {
      encoder: runtime.encoder,
      store: runtime.store,
      batchSize: integerOption(parsed, '--batch-size'),
      progressCallback: ({ done, total }) => {
        console.log(`  embedded ${done}/${total}`);
      },
    });
    console.log(
      `Ingested ${result.ingested} recipes in ${result.batches} batches (${(result.durationMs / 1000).toFixed(1)}s).`,
    );
  },
};
