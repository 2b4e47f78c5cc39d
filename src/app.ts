// Server assembly: plugins, routes and error handling
import Fastify, { type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import { experimentRoutes } from './routes/experiment.js';
import { triageRoutes } from './routes/triage.js';
import type { AnalysisOptions } from './services/analytics/types.js';
import type { EventStore } from './services/events/types.js';
import type { TriageEngine } from './services/triage/index.js';
import { AppError, formatErrorResponse, isAppError } from './utils/errors.js';

export const API_VERSION = '1.0.0';

export interface ServerDependencies {
  engine: TriageEngine;
  store: EventStore;
  analysis?: AnalysisOptions;
  corsOrigins?: string[];
  logger?: FastifyServerOptions['logger'];
}

export async function buildServer(deps: ServerDependencies) {
  const server = Fastify({ logger: deps.logger ?? false });

  await server.register(cors, {
    origin: deps.corsOrigins ?? [],
    credentials: true,
  });

  server.setErrorHandler((error, request, reply) => {
    if (isAppError(error)) {
      if (error.statusCode >= 500) {
        request.log.error({ err: error }, error.message);
      }
      return reply
        .code(error.statusCode)
        .send(formatErrorResponse(error, error.statusCode < 500));
    }

    // Fastify's own client errors (malformed JSON, unsupported media type)
    if (error.statusCode !== undefined && error.statusCode < 500) {
      return reply
        .code(error.statusCode)
        .send(formatErrorResponse(AppError.badRequest(error.message)));
    }

    request.log.error({ err: error }, 'Unhandled error');
    return reply.code(500).send(formatErrorResponse(AppError.internal()));
  });

  // Main health endpoint with /v1 prefix
  server.get('/v1/health', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: API_VERSION,
    };
  });

  // Legacy redirect
  server.get('/health', async (request, reply) => {
    return reply.code(301).redirect('/v1/health');
  });

  await server.register(triageRoutes, { prefix: '/v1', engine: deps.engine, store: deps.store });
  await server.register(experimentRoutes, { prefix: '/v1', store: deps.store, analysis: deps.analysis ?? {} });

  return server;
}
