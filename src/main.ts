import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import type { Env } from './config/env.validation';

const logger = new Logger('Bootstrap');

async function bootstrap() {
  // Signatures are checked over the exact bytes received.
  const app = await NestFactory.create(AppModule, { rawBody: true });
  app.enableShutdownHooks();

  const config = app.get<ConfigService<Env, true>>(ConfigService);
  const swaggerPath = config.get('SWAGGER_PATH', { infer: true });
  const document = SwaggerModule.createDocument(
    app,
    new DocumentBuilder()
      .setTitle('Commit Ingest API')
      .setDescription('Exactly-once commit event ingestion backed by PostgreSQL')
      .setVersion('0.1.0')
      .build(),
  );
  SwaggerModule.setup(swaggerPath, app, document);

  const port = config.get('PORT', { infer: true });
  await app.listen(port);
  logger.log(`Listening on :${port}, Swagger at /${swaggerPath}`);
}

bootstrap().catch((err: unknown) => {
  logger.error(err instanceof Error ? (err.stack ?? err.message) : String(err));
  process.exit(1);
});
