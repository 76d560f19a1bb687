import { randomBytes } from 'crypto';
import type { FastifyInstance, FastifyRequest } from 'fastify';
import { Logger } from '@medidoc/shared';

declare module 'fastify' {
  interface FastifyRequest {
    correlationId: string;
  }
}

/** A Fastify request once the correlation hook has run. */
export type CorrelatedRequest = FastifyRequest;

export const CORRELATION_HEADER = 'x-correlation-id';

export const generateCorrelationId = (): string => `${Date.now()}-${randomBytes(5).toString('hex')}`;

/** Adopts the caller's correlation id (or mints one), echoes it back and logs the request line. */
export function registerCorrelation(fastify: FastifyInstance, logger: Logger): void {
  fastify.decorateRequest('correlationId', '');

  fastify.addHook('onRequest', async (req, reply) => {
    const incoming = req.headers[CORRELATION_HEADER];
    const correlationId = typeof incoming === 'string' && incoming.length > 0 ? incoming : generateCorrelationId();
    req.correlationId = correlationId;
    reply.header('X-Correlation-Id', correlationId);

    logger.info(`${req.method} ${req.url}`, {
      correlationId,
      userAgent: req.headers['user-agent'],
    });
  });
}
