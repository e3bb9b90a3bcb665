import type { FastifyInstance } from 'fastify';
import type { QueryEngine } from 'fluent-query';
import { byRelease, castOf, movieExists, releasedAfter } from '../../queries.js';

const idParams = {
  type: 'object',
  required: ['id'],
  properties: { id: { type: 'integer', minimum: 1 } },
} as const;

export async function registerMovieRoutes(app: FastifyInstance, engine: QueryEngine): Promise<void> {
  const { registry } = engine;

  // GET /movies?after=2000: titles by release year, optionally after a year
  app.get<{ Querystring: { after?: number } }>(
    '/movies',
    { schema: { querystring: { type: 'object', properties: { after: { type: 'integer' } } } } },
    async (request, reply) => {
      const { after } = request.query;
      const q = after === undefined ? byRelease(registry) : releasedAfter(registry, after);
      return reply.status(200).send(await engine.toList(q));
    },
  );

  // GET /movies/:id/cast: actors of one movie
  app.get<{ Params: { id: number } }>('/movies/:id/cast', { schema: { params: idParams } }, async (request, reply) => {
    const { id } = request.params;
    const [found] = await engine.toList(movieExists(registry, id));
    if (found?.['count'] === 0) {
      return reply.status(404).send({ error: 'MovieNotFound', message: `Movie ${id} not found` });
    }
    return reply.status(200).send(await engine.toList(castOf(registry, id)));
  });
}
