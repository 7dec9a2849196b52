import 'dotenv/config';
import 'reflect-metadata';
import { readFileSync } from 'fs';
import * as path from 'path';
import { NestFactory } from '@nestjs/core';
import { FastifyAdapter } from '@nestjs/platform-fastify';
import { Logger, ValidationPipe } from '@nestjs/common';
import { OpenAPIObject, SwaggerModule } from '@nestjs/swagger';
import fastifySse from 'fastify-sse-v2';
import yaml from 'js-yaml';
import { AppModule } from './app.module';

function isOpenApiDocument(value: unknown): value is OpenAPIObject {
  return (
    typeof value === 'object' &&
    value !== null &&
    'openapi' in value &&
    typeof value.openapi === 'string' &&
    'info' in value &&
    'paths' in value
  );
}

function resolveAllowedOrigins(): RegExp[] {
  const configured = (process.env.CORS_ORIGINS ?? '')
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
    .map((origin) => new RegExp(`^${origin.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')}$`));
  return [/^https?:\/\/localhost(?::\d+)?$/, ...configured];
}

async function bootstrap() {
  const apiPrefix = 'api/v1';
  const fastifyAdapter = new FastifyAdapter();
  await fastifyAdapter.register(fastifySse);
  const app = await NestFactory.create(AppModule, fastifyAdapter);
  app.setGlobalPrefix(apiPrefix);
  const allowedOrigins = resolveAllowedOrigins();
  app.enableCors({
    origin: (origin, callback) => {
      if (!origin) {
        callback(null, true);
        return;
      }
      const isAllowed = allowedOrigins.some((pattern) => pattern.test(origin));
      callback(
        isAllowed ? null : new Error('Origin not allowed by CORS'),
        isAllowed,
      );
    },
    methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS', 'HEAD'],
    allowedHeaders: ['Content-Type', 'Accept', 'Origin', 'X-Requested-With'],
    maxAge: 3600,
  });
  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));

  const openApiPath = path.join(process.cwd(), 'openapi', 'network-api.yaml');
  const openApiDocument = yaml.load(readFileSync(openApiPath, 'utf8'));
  if (!isOpenApiDocument(openApiDocument)) {
    throw new Error(`${openApiPath} is not an OpenAPI document`);
  }
  SwaggerModule.setup('/api/docs', app, openApiDocument);

  const port = Number.parseInt(process.env.PORT ?? '3000', 10);
  await app.listen(port, '0.0.0.0');
  new Logger('Bootstrap').log(`Route network service listening on port ${port}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    'Failed to start',
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
