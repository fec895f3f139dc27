import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import type { Server } from 'node:http';
import { AppModule } from './app.module';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule);
  const config = app.get(ConfigService);

  // Enable CORS for the dashboard
  app.enableCors({
    origin: config.get<string>('CORS_ORIGIN', 'http://localhost:5173'),
    methods: ['GET', 'POST'],
    credentials: true,
  });

  // Large workbooks take a while to upload and decode (5 minutes)
  const server = app.getHttpServer() as Server;
  server.setTimeout(300000);

  await app.listen(config.get<number>('PORT', 3000));
}

void bootstrap();
