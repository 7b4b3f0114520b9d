import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import configuration from './config/configuration';
import { configureApp } from './app.setup';
import { describeError } from './common/errors';
import { logLevelsFrom } from './config/log-levels';

async function bootstrap() {
  // abortOnError: false so a bad model artifact rejects here instead of aborting
  const app = await NestFactory.create(AppModule, {
    abortOnError: false,
    bodyParser: false,
    logger: logLevelsFrom(configuration().logLevel),
  });
  configureApp(app);
  app.enableShutdownHooks();

  const port = app.get(ConfigService).getOrThrow<number>('port');
  await app.listen(port);
  Logger.log(`Prediction API listening on http://localhost:${port}`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  Logger.fatal(`Startup failed: ${describeError(error)}`, 'Bootstrap');
  process.exit(1);
});
