import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app/app.module';
import appConfig from './environment';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    logger: ['log', 'error', 'warn', 'debug', 'verbose'],
  });

  app.enableCors({
    origin: '*',
    credentials: true,
  });
  app.enableShutdownHooks();

  const { port, host } = app.get<ConfigType<typeof appConfig>>(appConfig.KEY);

  await app.listen(port, host);

  Logger.log(`Business consultant API running on ${host}:${port}`, 'Bootstrap');
}

bootstrap().catch((error) => {
  Logger.error(`Failed to start: ${error instanceof Error ? error.message : error}`, 'Bootstrap');
  process.exit(1);
});
