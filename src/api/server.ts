import express from 'express';
import type { Server } from 'node:http';
import type { HybridSearchPipeline } from '../retrieval/pipeline.js';
import type { RecipeFinder } from '../recipes/recipe-finder.js';
import { createHealthRouter } from './routes/health.js';
import { createSearchRouter } from './routes/search.js';
import { createFavoritesRouter, createPantryRouter, createRecipesRouter } from './routes/recipes.js';
import { errorHandler } from './middleware/error-handler.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('api');

export interface AppDeps {
  pipeline: HybridSearchPipeline;
  finder: RecipeFinder;
  /** Result count when a request names none */
  defaultLimit: number;
}

export function createApp(deps: AppDeps) {
  const app = express();
  app.use(express.json());

  app.use('/api/health', createHealthRouter());
  app.use('/api/search', createSearchRouter(deps.pipeline, deps.defaultLimit));
  app.use('/api/recipes', createRecipesRouter(deps.finder));
  app.use('/api/v1/recipes', createFavoritesRouter(deps.finder));
  app.use('/api', createPantryRouter(deps.finder));

  // Must come after the routes
  app.use('/api', errorHandler);

  return app;
}

/**
 * Listen until SIGINT/SIGTERM. Resolves once the server has closed.
 */
export async function startServer(deps: AppDeps, port: number): Promise<void> {
  const app = createApp(deps);

  return new Promise((resolve, reject) => {
    const server: Server = app.listen(port, () => {
      log.info(`Recipe finder API listening on http://localhost:${port}`);

      const shutdown = () => {
        log.info('Shutting down API server');
        server.close(() => {
          resolve();
        });
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
    });

    server.on('error', (err: NodeJS.ErrnoException) => {
      if (err.code === 'EADDRINUSE') {
        log.error(`Port ${port} is already in use. Try: recipe-finder serve --port ${port + 1}`);
      }
      reject(err);
    });
  });
}
