import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';

import { AppModule } from './modules/app/app.module';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    bufferLogs: true
  });

  // OnModuleDestroy hooks run on SIGTERM/SIGINT
  app.enableShutdownHooks();

  const globalPrefix = process.env.API_PREFIX ?? 'api';
  app.setGlobalPrefix(globalPrefix);

  app.useLogger(new Logger('HierarchySync'));
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true
    })
  );

  const port = Number(process.env.PORT ?? 3000);
  await app.listen(port);
  Logger.log(`Hierarchy sync API is running on http://localhost:${port}/${globalPrefix}`);
}

void bootstrap();
