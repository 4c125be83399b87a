import {
  INestApplication,
  UnprocessableEntityException,
  ValidationPipe,
  VersioningType,
} from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import helmet from 'helmet';
import appConfig from './config/app.config';
import { HttpExceptionFilter } from './common/filters/http-exception.filter';
import { flattenValidationErrors } from './common/utils/validation.util';
import { USER_ID_HEADER_DISPLAY } from './common/constants/headers.constant';

export const createValidationPipe = () =>
  new ValidationPipe({
    whitelist: true, // Strip fields not declared on the DTO
    forbidNonWhitelisted: true, // ...and reject the request when there are any
    transform: true,
    exceptionFactory: (errors) =>
      new UnprocessableEntityException({
        message: 'Validation failed.',
        details: flattenValidationErrors(errors),
      }),
  });

/**
 * Global pipes, filter, routing and HTTP hardening shared by main.ts and
 * the e2e tests, so both serve the exact same surface.
 */
export const configureApp = (app: INestApplication): INestApplication => {
  const config = app.get<ConfigType<typeof appConfig>>(appConfig.KEY);

  app.useGlobalPipes(createValidationPipe());
  app.useGlobalFilters(new HttpExceptionFilter());

  app.setGlobalPrefix('api');
  app.enableVersioning({
    type: VersioningType.URI, //v
    defaultVersion: ['1'], //v1
  });

  //Security headers
  app.use(helmet());
  //CORS configuration
  app.enableCors({
    origin: config.corsOrigin,
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', USER_ID_HEADER_DISPLAY],
  });

  return app;
};
