import cors from '@fastify/cors';
import multipart from '@fastify/multipart';
import { FastifyAdapter, NestFastifyApplication } from '@nestjs/platform-fastify';
import { createLogger } from '@medidoc/shared';
import { SERVICE_NAME } from './config/service.config';
import { registerCorrelation } from './http/correlation';
import { ErrorEnvelopeFilter } from './http/error.filter';

export const MAX_UPLOAD_BYTES = 25 * 1024 * 1024;

export const createFastifyAdapter = (): FastifyAdapter =>
  new FastifyAdapter({ ignoreTrailingSlash: true, bodyLimit: MAX_UPLOAD_BYTES });

/** Plugins, hooks and filters shared by `main.ts` and the HTTP tests. */
export async function configureApp(app: NestFastifyApplication): Promise<void> {
  const logger = createLogger({ serviceName: SERVICE_NAME });
  const fastify = app.getHttpAdapter().getInstance();

  await app.register(cors, { origin: true, credentials: true });
  await app.register(multipart, { limits: { fileSize: MAX_UPLOAD_BYTES } });

  registerCorrelation(fastify, logger.child({ component: 'http' }));
  app.useGlobalFilters(new ErrorEnvelopeFilter(logger.child({ component: 'ErrorEnvelopeFilter' })));
}
