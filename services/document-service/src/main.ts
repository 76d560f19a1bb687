import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { NestFastifyApplication } from '@nestjs/platform-fastify';
import { ProxyAgent, setGlobalDispatcher } from 'undici';
import { createLogger } from '@medidoc/shared';
import { AppModule } from './app.module';
import { configureApp, createFastifyAdapter } from './bootstrap';
import { loadConfig, SERVICE_NAME } from './config/service.config';
import { UploadStorage } from './upload-storage';

const logger = createLogger({ serviceName: SERVICE_NAME });

async function bootstrap() {
  const proxyUrl = process.env.HTTPS_PROXY || process.env.HTTP_PROXY;
  if (proxyUrl) {
    setGlobalDispatcher(new ProxyAgent(proxyUrl));
  }

  const config = loadConfig();
  if (!config.completion.apiKey) {
    logger.warn('GROQ_API_KEY is not set - classification will fall back and search will fail');
  }
  if (!config.ocr.apiKey) {
    logger.warn('GOOGLE_API_KEY is not set - text extraction will fail');
  }

  const app = await NestFactory.create<NestFastifyApplication>(AppModule.register(config), createFastifyAdapter(), {
    logger: ['error', 'warn'],
  });
  await configureApp(app);
  await app.get(UploadStorage).ensureDirectory();

  await app.listen({ port: config.port, host: config.host });
  logger.info(`Service ${SERVICE_NAME} listening`, { port: config.port, uploadDir: config.uploadDir, db: config.database.type });
}

bootstrap().catch((err) => {
  logger.error('Fatal error in document-service', err);
  process.exit(1);
});
