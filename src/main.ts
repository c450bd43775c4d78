import 'reflect-metadata';
import 'dotenv/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module.js';
import { FastifyAdapter } from '@nestjs/platform-fastify';
import type { NestFastifyApplication } from '@nestjs/platform-fastify';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { Logger, ValidationPipe } from '@nestjs/common';
import { APP_CONFIG } from './config/app-config.js';
import type { AppConfig } from './config/app-config.js';

async function bootstrap() {
  const app = await NestFactory.create<NestFastifyApplication>(AppModule, new FastifyAdapter(), {
    logger: ['error', 'warn', 'log', 'debug', 'verbose'],
  });

  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));

  const config = new DocumentBuilder()
    .setTitle('Release Timeline API')
    .setDescription('Unified release history across GitHub repositories')
    .setVersion('1.0.0')
    .build();

  const doc = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('docs', app, doc);

  const { port, host, githubToken } = app.get<AppConfig>(APP_CONFIG);
  await app.listen(port, host);

  const logger = new Logger('Bootstrap');
  logger.log(`📚 Swagger documentation: http://localhost:${port}/docs`);
  logger.log(`🔐 GitHub token: ${githubToken ? 'loaded from GITHUB_TOKEN' : 'not set, POST /session/token'}`);
}
bootstrap().catch((err) => {
  console.error('Application failed to start:', err);
  process.exit(1);
});
