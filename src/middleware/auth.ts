import { FastifyRequest, FastifyReply } from 'fastify';

export const API_KEY_HEADER = 'x-patchbot-api-key';

/**
 * Builds the onRequest check. With no key configured every request passes.
 */
export function createAuthenticate(expectedKey: string | undefined) {
  return async function authenticate(request: FastifyRequest, reply: FastifyReply) {
    if (!expectedKey) return;

    const apiKey = request.headers[API_KEY_HEADER];
    if (!apiKey || apiKey !== expectedKey) {
      await reply.code(401).send({ error: 'Unauthorized' });
    }
  };
}
