import Fastify, { FastifyInstance } from 'fastify';
import { createAuthenticate } from '#patchbot/middleware/auth.js';
import { registerApiRoutes, ApiDependencies } from '#patchbot/api/routes.js';
import { logApiRequest } from '#patchbot/util/safe-logging.js';

export interface ServerOptions extends ApiDependencies {
  apiKey?: string;
  /** Fastify's pino logger; off in tests */
  logger?: boolean;
}

export async function buildServer(options: ServerOptions): Promise<FastifyInstance> {
  const server = Fastify({
    logger: options.logger ?? true
  });

  const authenticate = createAuthenticate(options.apiKey);

  // Authentication for all routes except health check
  server.addHook('onRequest', async (request, reply) => {
    if (request.url === '/health') return;
    await authenticate(request, reply);
    if (reply.sent) return reply;
  });

  server.addHook('onResponse', async (request, reply) => {
    logApiRequest(request.method, request.url, reply.statusCode, reply.elapsedTime);
  });

  server.get('/health', async () => {
    return { status: 'ok' };
  });

  await registerApiRoutes(server, options);
  return server;
}
