import { INestApplication, ValidationPipe } from '@nestjs/common';
import { toValidationError, VALIDATOR_OPTIONS } from './application/validation';
import { HttpExceptionFilter } from './presentation/filters';
import { LoggingInterceptor } from './presentation/interceptors';

/** Global pipes, filters and interceptors shared by the server and the HTTP tests. */
export function configureApp(app: INestApplication): INestApplication {
  app.useGlobalPipes(
    new ValidationPipe({
      ...VALIDATOR_OPTIONS,
      transform: true,
      exceptionFactory: toValidationError,
    }),
  );

  app.useGlobalFilters(new HttpExceptionFilter());
  app.useGlobalInterceptors(new LoggingInterceptor());

  return app;
}
