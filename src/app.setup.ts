import { INestApplication, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllExceptionsFilter } from './common/filters/all-exceptions.filter';

/** Pipes, filters and routing shared by the server and the e2e suite. */
export function configureApp(app: INestApplication) {
  const config = app.get(ConfigService);

  const prefix = (config.get<string>('API_PREFIX') ?? '').replace(/^\/+|\/+$/g, '');
  if (prefix) {
    app.setGlobalPrefix(prefix);
  }

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      transformOptions: { enableImplicitConversion: true },
    }),
  );
  app.useGlobalFilters(app.get(AllExceptionsFilter));
  return app;
}
