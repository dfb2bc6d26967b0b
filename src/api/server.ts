import Fastify, { type FastifyInstance } from 'fastify';
import { createLogger } from '../utils/logger.js';
import { ErrorCode, toErrorEnvelope } from '../core/errors.js';
import { registerRoutes, sendError, type RouteDeps } from './routes.js';

const logger = createLogger('ApiServer');

export async function buildServer(deps: RouteDeps): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false,
  });

  app.setNotFoundHandler((request, reply) => {
    void reply.code(404).send(toErrorEnvelope(ErrorCode.NotFound, `Route ${request.method} ${request.url} not found`));
  });

  app.setErrorHandler((error, _request, reply) => {
    logger.error(`Unhandled API error: ${error.message}`);
    void sendError(reply, error);
  });

  await registerRoutes(app, deps);
  return app;
}

export async function startServer(app: FastifyInstance, host: string, port: number): Promise<string> {
  const address = await app.listen({ host, port });
  logger.info(`API listening on ${address}`);
  return address;
}

export type { RouteDeps } from './routes.js';
