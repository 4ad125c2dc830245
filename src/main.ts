import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module.js';
import { FastifyAdapter, type NestFastifyApplication } from '@nestjs/platform-fastify';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { Logger, ValidationPipe } from '@nestjs/common';

async function bootstrap() {
  const app = await NestFactory.create<NestFastifyApplication>(AppModule, new FastifyAdapter(), {
    logger: ['error', 'warn', 'log', 'debug'],
  });

  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));

  const config = new DocumentBuilder()
    .setTitle('Commit Insights API')
    .setDescription('Commit history analytics for a GitHub repository')
    .setVersion('1.0.0')
    .addApiKey({ type: 'apiKey', name: 'X-API-Key', in: 'header' }, 'X-API-Key')
    .build();

  const doc = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('docs', app, doc);

  const port = Number(process.env.PORT) || 3000;
  await app.listen(port, '0.0.0.0');

  const logger = new Logger('Bootstrap');
  const environment = process.env.NODE_ENV || 'development';
  logger.log(`Swagger documentation: http://localhost:${port}/docs`);
  logger.log(`Environment: ${environment}`);
  logger.log(`Authentication: ${environment === 'production' ? 'API key required' : 'open access'}`);
}

bootstrap().catch((err: unknown) => {
  new Logger('Bootstrap').error('Application failed to start', err instanceof Error ? err.stack : String(err));
  process.exit(1);
});
