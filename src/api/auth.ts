import type { FastifyRequest } from 'fastify';
import { AuthRejectedError } from '../core/errors.js';
import { extractBearerToken, tokensMatch } from '../utils/tokens.js';
import { getLogger } from '../utils/logging.js';

/**
 * Builds a preHandler enforcing `Authorization: Bearer <token>`.
 * Without a configured token every request passes.
 */
export function requireApiToken(expected: string | undefined) {
  return async function checkApiToken(req: FastifyRequest): Promise<void> {
    if (!expected) return;
    const presented = extractBearerToken(req.headers.authorization);
    if (!presented) {
      throw new AuthRejectedError('Authorization header is required');
    }
    if (!tokensMatch(presented, expected)) {
      getLogger().warn({ route: req.url, ip: req.ip }, 'invalid API token');
      throw new AuthRejectedError('Invalid token');
    }
  };
}
