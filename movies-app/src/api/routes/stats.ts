import type { FastifyInstance } from 'fastify';
import type { QueryEngine } from 'fluent-query';
import { actorsPerMovie, oldestActor } from '../../queries.js';

export async function registerStatsRoutes(app: FastifyInstance, engine: QueryEngine): Promise<void> {
  // GET /stats/actors-per-movie
  app.get('/stats/actors-per-movie', async (_request, reply) => {
    const rows = await engine.toList(actorsPerMovie(engine.registry));
    return reply.status(200).send(rows.map((r) => ({ movie: r['key'], actors: r['actors'] })));
  });

  // GET /stats/oldest-actor: 422 when there are no actors
  app.get('/stats/oldest-actor', async (_request, reply) => {
    const [row] = await engine.toList(oldestActor(engine.registry));
    return reply.status(200).send({ birthDate: row?.['oldest'] ?? null });
  });
}
