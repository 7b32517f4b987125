/**
 * Tests for the search, recipe, favorites and shopping-list commands.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3-multiple-ciphers';

vi.mock('../../../src/cli/runtime.js', () => ({
  openRuntime: vi.fn(),
}));

import {
  favoritesCommand,
  recipeCommand,
  searchCommand,
  shoppingListCommand,
} from '../../../src/cli/commands/search.js';
import { openRuntime } from '../../../src/cli/runtime.js';
import { formatRecipe } from '../../../src/mcp/tools.js';
import type { Runtime } from '../../../src/runtime.js';
import { createTestDb, setupTestDb, teardownTestDb } from '../../storage/test-utils.js';
import { EMBEDDINGS, RECIPES } from '../../recipes/fixtures.js';
import { recipeToItem } from '../../../src/recipes/recipe-mapping.js';
import { createFakeRuntime } from '../fake-runtime.js';

const mockOpenRuntime = vi.mocked(openRuntime);

let db: Database.Database;
let runtime: Runtime;

function printed(): unknown[] {
  return vi.mocked(console.log).mock.calls.map((call) => call[0]);
}

beforeEach(async () => {
  vi.clearAllMocks();
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
  vi.spyOn(process, 'exit').mockImplementation(() => undefined as never);

  db = createTestDb();
  setupTestDb(db);
  runtime = createFakeRuntime();
  await runtime.store.upsertBatch(RECIPES.map((r) => recipeToItem(r, EMBEDDINGS[r.id])));
  mockOpenRuntime.mockReturnValue(runtime);
});

afterEach(() => {
  teardownTestDb(db);
});

describe('searchCommand', () => {
  it('requires a query', async () => {
    await searchCommand.handler([]);

    expect(console.error).toHaveBeenCalledWith('Error: Query required');
    expect(process.exit).toHaveBeenCalledWith(2);
    expect(mockOpenRuntime).not.toHaveBeenCalled();
  });

  it('rejects --limit with --multi-stage', async () => {
    await searchCommand.handler(['italian', '--multi-stage', '--limit', '3']);

    expect(console.error).toHaveBeenCalledWith('Error: --limit cannot be combined with --multi-stage');
    expect(process.exit).toHaveBeenCalledWith(2);
    expect(mockOpenRuntime).not.toHaveBeenCalled();
  });

  it('joins positionals into the query and applies filters', async () => {
    await searchCommand.handler(['pasta', 'dinner', '--cuisine', 'Thai']);

    expect(runtime.encoder.embed).toHaveBeenCalledWith('pasta dinner');
    expect(printed()).toEqual([
      'Found 1 recipes (1 of 2 candidates passed filters):\n\n1. Green Curry [curry] (Thai, medium, 45 min) score 0.89',
    ]);
  });

  it('runs a multi-stage search', async () => {
    await searchCommand.handler(['italian', '--multi-stage', '--cuisine', 'Italian']);

    const [text] = printed();
    expect(String(text).split('\n')[0]).toBe(
      'Found 2 recipes (2 of 3 candidates passed filters):',
    );
  });

  it('prints JSON with --json', async () => {
    await searchCommand.handler(['dinner', '--limit', '1', '--json']);

    const [text] = printed();
    expect(typeof text).toBe('string');
    expect(JSON.parse(String(text))).toMatchObject({ matches: [{ recipe: { id: 'pasta' } }], candidates: 2 });
  });

  it('rejects a non-numeric option', async () => {
    await expect(searchCommand.handler(['dinner', '--max-prep', 'soon'])).rejects.toThrow(
      '--max-prep must be a non-negative integer, got "soon"',
    );
  });
});

describe('recipeCommand', () => {
  it('prints a recipe', async () => {
    await recipeCommand.handler(['salad']);

    expect(printed()).toEqual([formatRecipe(RECIPES[3])]);
  });

  it('requires an id', async () => {
    await recipeCommand.handler([]);

    expect(console.error).toHaveBeenCalledWith('Error: Recipe id required');
    expect(process.exit).toHaveBeenCalledWith(2);
  });

  it('fails for an unknown id', async () => {
    await expect(recipeCommand.handler(['tacos'])).rejects.toThrow('Recipe not found: tacos');
  });
});

describe('favoritesCommand', () => {
  it('searches by comma- or space-separated ingredients', async () => {
    await favoritesCommand.handler(['basil,garlic', 'tomatoes']);

    expect(runtime.encoder.embed).toHaveBeenCalledWith('basil,garlic,tomatoes');
  });

  it('requires an ingredient', async () => {
    await favoritesCommand.handler([',']);

    expect(console.error).toHaveBeenCalledWith('Error: At least one ingredient required');
    expect(process.exit).toHaveBeenCalledWith(2);
  });
});

describe('shoppingListCommand', () => {
  it('prints a scaled list as JSON', async () => {
    await shoppingListCommand.handler(['salad', '--servings', '4', '--json']);

    const [text] = printed();
    expect(JSON.parse(String(text))).toEqual({
      items: [
        { ingredient: 'cucumber', recipes: ['Greek Salad'], inFridge: false },
        { ingredient: 'feta', recipes: ['Greek Salad'], inFridge: false },
        { ingredient: 'tomatoes', recipes: ['Greek Salad'], inFridge: true },
      ],
      recipes: [{ id: 'salad', name: 'Greek Salad', servings: 4, scale: 2 }],
      missing: [],
    });
  });

  it('requires a recipe id', async () => {
    await shoppingListCommand.handler(['--servings', '2']);

    expect(console.error).toHaveBeenCalledWith('Error: At least one recipe id required');
    expect(process.exit).toHaveBeenCalledWith(2);
  });
});
