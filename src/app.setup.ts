import { INestApplication, ValidationPipe } from '@nestjs/common';
import helmet from 'helmet';
import compression from 'compression';
import { RequestLoggingInterceptor } from './common/logging.interceptor';
import { jsonBody } from './common/json-body';
import { PredictionErrorFilter } from './common/prediction-error.filter';
import { validationExceptionFactory } from './common/validation';

/** Middleware, pipes and filters shared by main.ts and the e2e tests. */
export function configureApp(app: INestApplication): INestApplication {
  // Security + performance
  app.use(helmet());
  app.use(compression());

  // CORS (lock down later to your domain)
  app.enableCors({
    origin: true,
    credentials: true,
  });

  // Replaces Nest's parser (create the app with bodyParser: false)
  app.use(...jsonBody());

  // Strict request validation everywhere
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true, // strip unknown props
      forbidNonWhitelisted: true,
      transform: true,
      exceptionFactory: validationExceptionFactory,
    }),
  );
  app.useGlobalFilters(new PredictionErrorFilter());
  app.useGlobalInterceptors(new RequestLoggingInterceptor());

  return app;
}
