// Load environment variables before anything else
import * as dotenv from 'dotenv';
dotenv.config();

import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import { Constants } from './constants';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule);
  const logger = new Logger('Bootstrap');

  // Prices are read by dashboards and home automation hubs from any origin
  app.enableCors({
    origin: '*',
    methods: ['GET', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'x-api-key']
  });

  const port = Constants.SERVER.PORT;
  await app.listen(port);

  logger.log(`Application is running on: http://localhost:${port}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error('Application failed to start', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
