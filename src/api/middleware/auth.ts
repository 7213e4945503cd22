import type { FastifyRequest, FastifyReply } from 'fastify';
import { createError } from './errorHandler';

/**
 * Checks the x-api-key header against the configured key. Without a configured key
 * the check is skipped outside production.
 */
export function requireApiKey(expectedKey: string | undefined) {
  return async (request: FastifyRequest, _reply: FastifyReply) => {
    const header = request.headers['x-api-key'];
    const apiKey = Array.isArray(header) ? header[0] : header;

    if (!expectedKey) {
      if (process.env.NODE_ENV === 'production') {
        throw createError('API key authentication required', 401, 'AUTH_REQUIRED');
      }
      return;
    }

    if (!apiKey || apiKey !== expectedKey) {
      throw createError('Invalid or missing API key', 401, 'INVALID_API_KEY');
    }
  };
}
