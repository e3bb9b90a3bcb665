import type { FastifyInstance, FastifyReply } from 'fastify';
import type { QueryEngine } from 'fluent-query';
import { namedQueries, type NamedQuery } from '../../queries.js';

type NameParams = { Params: { name: string } };

function notFound(reply: FastifyReply, name: string) {
  return reply.status(404).send({
    error: 'QueryNotFound',
    message: `No query named '${name}'`,
    available: [...namedQueries.keys()],
  });
}

export async function registerQueryRoutes(app: FastifyInstance, engine: QueryEngine): Promise<void> {
  const lookup = (name: string): NamedQuery | undefined => namedQueries.get(name);

  // GET /queries: list the named queries
  app.get('/queries', async (_request, reply) => {
    return reply.status(200).send({ queries: [...namedQueries.keys()] });
  });

  // GET /queries/:name: run a named query
  app.get<NameParams>('/queries/:name', async (request, reply) => {
    const { name } = request.params;
    const build = lookup(name);
    if (build === undefined) return notFound(reply, name);
    return reply.status(200).send({ name, rows: await engine.toList(build(engine.registry)) });
  });

  // GET /queries/:name/sql: the compiled query without running it
  app.get<NameParams>('/queries/:name/sql', async (request, reply) => {
    const { name } = request.params;
    const build = lookup(name);
    if (build === undefined) return notFound(reply, name);
    const q = build(engine.registry);
    const compiled = engine.compile(q);
    return reply.status(200).send({ name, adapter: engine.adapter.name, text: compiled.text, params: compiled.params });
  });
}
