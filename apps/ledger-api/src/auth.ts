/**
 * Service-token auth for ledger-api.
 * The API sits behind trusted front ends (chat bot, game server) that share one bearer token.
 */

import { timingSafeEqual } from 'node:crypto';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { logger } from './logger.js';

const PUBLIC_PATHS = new Set(['/healthz', '/readyz']);

function tokensMatch(presented: string, expected: string): boolean {
  const a = Buffer.from(presented);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

export function registerAuthHook(app: FastifyInstance, apiToken: string): void {
  app.addHook('onRequest', async (request: FastifyRequest, reply: FastifyReply) => {
    const path = request.url.split('?', 1)[0] ?? request.url;
    if (PUBLIC_PATHS.has(path)) {
      return;
    }

    const authHeader = request.headers['authorization'];
    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      return reply.status(401).send({ error: 'UNAUTHENTICATED' });
    }

    const token = authHeader.slice(7);
    if (!tokensMatch(token, apiToken)) {
      logger.warn({ path, ip: request.ip }, 'Rejected request with invalid service token');
      return reply.status(401).send({ error: 'UNAUTHENTICATED' });
    }
  });
}
