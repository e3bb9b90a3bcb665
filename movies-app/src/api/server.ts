import Fastify from 'fastify';
import type { QueryEngine } from 'fluent-query';
import { registerErrorHandler } from './middleware/error-handler.js';
import { registerMovieRoutes } from './routes/movies.js';
import { registerStatsRoutes } from './routes/stats.js';
import { registerQueryRoutes } from './routes/queries.js';

export interface ServerOptions {
  logger?: boolean;
}

export function buildServer(engine: QueryEngine, options: ServerOptions = {}) {
  const app = Fastify({ logger: options.logger ?? true });

  registerErrorHandler(app);

  const prefix = '/api/v1';

  app.register(async (instance) => {
    await registerMovieRoutes(instance, engine);
    await registerStatsRoutes(instance, engine);
    await registerQueryRoutes(instance, engine);
  }, { prefix });

  return app;
}
