import type { FastifyInstance } from 'fastify';
import {
  AuthenticationError,
  AuthorizationError,
  DecodingError,
  FormSearchError,
  RefNotFoundError,
} from '../../../../src/index.js';
import { DocumentNotFoundError } from '../../errors.js';

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((unknownError, _request, reply) => {
    // Ensure we always deal with an Error object
    const error = unknownError instanceof Error ? unknownError : new Error(String(unknownError));

    if (error instanceof DocumentNotFoundError) {
      return reply.status(404).send({ error: error.name, message: error.message });
    }

    // The configured ref no longer exists upstream
    if (error instanceof RefNotFoundError) {
      return reply.status(404).send({ error: error.name, message: error.message });
    }

    // Our credentials were refused: the caller cannot fix that, so it is a gateway failure
    if (error instanceof AuthenticationError || error instanceof AuthorizationError) {
      app.log.error(error);
      return reply.status(502).send({ error: error.name, message: 'Upstream repository refused access' });
    }

    if (error instanceof FormSearchError || error instanceof DecodingError) {
      app.log.error(error);
      return reply.status(502).send({ error: error.name, message: 'Upstream repository error' });
    }

    // Fastify built-in errors (validation, 404 routes) carry a numeric statusCode
    if ('statusCode' in error && typeof error.statusCode === 'number') {
      return reply.status(error.statusCode).send({ error: error.name, message: error.message });
    }

    app.log.error(error);
    return reply.status(500).send({ error: 'InternalError', message: 'Internal server error' });
  });
}
