import type { FastifyInstance } from 'fastify';
import {
  CancelledError,
  EmptyAggregateError,
  PlanValidationError,
  QueryError,
  SourceError,
  TimeoutError,
  UnsupportedOperationError,
} from 'fluent-query';

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((unknownError, _request, reply) => {
    // Ensure we always deal with an Error object
    const error = unknownError instanceof Error ? unknownError : new Error(String(unknownError));

    // Invalid query: the caller can fix it → 400
    if (error instanceof QueryError && error.phase === 'build') {
      const details = error instanceof PlanValidationError ? error.errors.map((e) => e.message) : undefined;
      return reply.status(400).send({ error: error.code, message: error.message, details });
    }

    // min / max / average over no rows → 422
    if (error instanceof EmptyAggregateError) {
      return reply.status(422).send({ error: error.code, message: error.message });
    }

    if (error instanceof UnsupportedOperationError) {
      return reply.status(501).send({ error: error.code, message: error.message });
    }

    if (error instanceof TimeoutError) {
      return reply.status(504).send({ error: error.code, message: error.message, retryable: true });
    }

    if (error instanceof CancelledError) {
      return reply.status(503).send({ error: error.code, message: error.message, retryable: true });
    }

    // Infrastructure errors → 500 without internals
    if (error instanceof SourceError) {
      app.log.error(error);
      return reply.status(500).send({ error: error.code, message: 'Data source failure' });
    }

    // Fastify built-in errors have a numeric `statusCode`; pass it through
    if ('statusCode' in error && typeof error.statusCode === 'number') {
      return reply.status(error.statusCode).send({ error: error.name, message: error.message });
    }

    app.log.error(error);
    return reply.status(500).send({ error: 'InternalError', message: 'Internal server error' });
  });
}
