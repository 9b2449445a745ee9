import { BadRequestException, ValidationPipe, type INestApplication } from '@nestjs/common';
import helmet from 'helmet';
import { INVALID_PAYLOAD_MESSAGE } from '../constants/error-messages.constants';
import { HttpExceptionFilter } from '../filters/http-exception.filter';
import { createJsonBodyMiddleware } from '../middleware/json-body.middleware';
import { requestIdMiddleware } from '../middleware/request-id.middleware';

/**
 * Middleware, pipes and filters shared by the server bootstrap and the e2e
 * suite. The app must be created with `bodyParser: false`.
 */
export function configureHttpPipeline(app: INestApplication): void {
  app.use(helmet());
  app.use(requestIdMiddleware);
  app.use(createJsonBodyMiddleware({ limit: '1mb' }));

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      exceptionFactory: () => new BadRequestException(INVALID_PAYLOAD_MESSAGE),
    }),
  );

  app.useGlobalFilters(new HttpExceptionFilter());
}
