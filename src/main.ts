import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe } from '@nestjs/common';
import { AppModule } from './app.module';
import {
  GENERATED_SHEETS_HEADER,
  GENERATED_SHEET_TITLES_HEADER,
  SKIPPED_OPERATIONS_HEADER,
} from './contexts/purchase-order/interface/http/controllers';

const DEFAULT_CORS_ORIGINS = ['http://localhost:3000', 'http://localhost:3001'];

function corsOrigins(): string[] {
  const configured = (process.env.CORS_ORIGINS ?? '')
    .split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);
  return configured.length > 0 ? configured : DEFAULT_CORS_ORIGINS;
}

async function bootstrap() {
  const app = await NestFactory.create(AppModule);

  app.enableCors({
    origin: corsOrigins(),
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
    exposedHeaders: [
      'Content-Disposition',
      GENERATED_SHEETS_HEADER,
      GENERATED_SHEET_TITLES_HEADER,
      SKIPPED_OPERATIONS_HEADER,
    ],
    credentials: true,
  });

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  app.setGlobalPrefix('api');

  const port = process.env.PORT ?? 4000;
  await app.listen(port);
  console.log(`Purchase order API running on http://localhost:${port}`);
}

bootstrap().catch((error: unknown) => {
  console.error('[Bootstrap] Failed to start:', error);
  process.exit(1);
});
