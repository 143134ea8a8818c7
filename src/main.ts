import 'reflect-metadata';
import { Logger as NestLogger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { ConfigService } from '@nestjs/config';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import * as Sentry from '@sentry/node';
import compression from 'compression';
import helmet from 'helmet';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { CORRELATION_HEADER } from './common/middleware/correlation-id.middleware';

if (process.env.SENTRY_DSN) {
  Sentry.init({
    dsn: process.env.SENTRY_DSN,
    tracesSampleRate: parseFloat(process.env.SENTRY_TRACES_SAMPLE_RATE || '0.2'),
    environment: process.env.NODE_ENV,
  });
}

function parseOrigins(raw: string, logger: Logger) {
  const literal = new Set<string>();
  const patterns: RegExp[] = [];
  for (const entry of raw.split(',').map((s) => s.trim()).filter(Boolean)) {
    if (entry.toLowerCase().startsWith('regex:')) {
      const pattern = entry.slice('regex:'.length);
      try {
        patterns.push(new RegExp(pattern));
      } catch (error) {
        logger.warn(`Invalid CORS regex "${pattern}": ${(error as Error).message}`);
      }
      continue;
    }
    literal.add(entry);
  }
  return { literal, patterns };
}

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    bufferLogs: true,
    rawBody: true,
  });
  const config = app.get(ConfigService);
  const logger = app.get(Logger);
  app.useLogger(logger);

  configureApp(app);

  app.use(
    helmet({
      crossOriginOpenerPolicy: false,
      crossOriginEmbedderPolicy: false,
      crossOriginResourcePolicy: false,
      hsts: { maxAge: 31536000 },
    }),
  );
  app.use(compression());

  const originsRaw = config.get<string>('ALLOWED_ORIGINS') ?? '';
  if (originsRaw.trim()) {
    const { literal, patterns } = parseOrigins(originsRaw, logger);
    app.enableCors({
      origin(origin, callback) {
        if (!origin || literal.has(origin) || patterns.some((rx) => rx.test(origin))) {
          return callback(null, true);
        }
        logger.warn(`Rejected CORS origin "${origin}"`);
        return callback(null, false);
      },
      allowedHeaders: ['Content-Type', 'Authorization', 'X-Api-Key', 'X-Requested-With', 'Accept'],
      exposedHeaders: [CORRELATION_HEADER],
      optionsSuccessStatus: 204,
    });
  } else {
    app.enableCors({ exposedHeaders: [CORRELATION_HEADER] });
  }

  const swaggerEnabled = config.get('NODE_ENV') !== 'production' || config.get('SWAGGER_ENABLED') === 'true';
  if (swaggerEnabled) {
    const document = SwaggerModule.createDocument(
      app,
      new DocumentBuilder()
        .setTitle('Helpy API')
        .setDescription('Delivery support chat backend')
        .setVersion('1.0.0')
        .addApiKey({ type: 'apiKey', in: 'header', name: 'x-api-key' }, 'api-key')
        .addSecurityRequirements('api-key')
        .build(),
    );
    SwaggerModule.setup('docs', app, document);
  } else {
    logger.log('Swagger is disabled for production. Set SWAGGER_ENABLED=true to re-enable.', 'Bootstrap');
  }

  const port = config.get<number>('PORT') ?? 10000;
  await app.listen(port);
  logger.log(`Helpy API listening on port ${port}`, 'Bootstrap');
}

bootstrap().catch((err: unknown) => {
  new NestLogger('Bootstrap').error(err instanceof Error ? err.stack : String(err));
  process.exit(1);
});
