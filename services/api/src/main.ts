import 'reflect-metadata';
import 'dotenv/config';
import fs from 'node:fs';
import path from 'node:path';
import { RequestMethod } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { SERVICE_NAME, SERVICE_VERSION } from '@depin-compat/shared';
import pinoHttp from 'pino-http';
import { LoggerService } from './common/logger.service';
import { loadAppConfig } from './config/app-config';
import { AppModule } from './modules/app.module';
import { loadProjectCatalog } from './modules/catalog/catalog-loader';

async function bootstrap() {
  const config = loadAppConfig();
  const logger = new LoggerService(config);
  const catalog = loadProjectCatalog(path.resolve(config.dataPath), logger);

  const app = await NestFactory.create(AppModule.forRoot({ config, catalog, logger }));

  app.use(
    pinoHttp({
      level: config.logLevel,
    }),
  );

  app.enableCors({ origin: config.corsOrigins });
  app.enableShutdownHooks();
  app.setGlobalPrefix('api/v1', { exclude: [{ path: '/', method: RequestMethod.GET }] });

  const document = SwaggerModule.createDocument(
    app,
    new DocumentBuilder()
      .setTitle(SERVICE_NAME)
      .setDescription('Hardware compatibility scoring for DePIN node projects')
      .setVersion(SERVICE_VERSION)
      .build(),
  );
  SwaggerModule.setup('api/swagger', app, document);

  if (config.openApiOutput) {
    fs.writeFileSync(path.resolve(config.openApiOutput), JSON.stringify(document, null, 2));
  }

  await app.listen(config.port, config.host);
  logger.info('DePIN compatibility API listening', {
    host: config.host,
    port: config.port,
    projects: catalog.length,
  });
}

bootstrap().catch((error: unknown) => {
  const fallback = new LoggerService({ logLevel: 'info', nodeEnv: process.env.NODE_ENV ?? 'development' });
  fallback.error('Fatal startup error', {
    name: error instanceof Error ? error.name : 'Error',
    detail: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
