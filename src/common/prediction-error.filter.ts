import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
} from '@nestjs/common';
import type { Response } from 'express';
import {
  InputValidationError,
  PredictionError,
  PredictionErrorKind,
} from './errors';

const STATUS_BY_KIND: Record<PredictionErrorKind, HttpStatus> = {
  ValidationError: HttpStatus.UNPROCESSABLE_ENTITY,
  ModelMismatchError: HttpStatus.INTERNAL_SERVER_ERROR,
  // Neither of these should reach a request; answer generically if they do.
  PersistenceError: HttpStatus.INTERNAL_SERVER_ERROR,
  StartupError: HttpStatus.SERVICE_UNAVAILABLE,
};

/**
 * Translates domain errors into `{ statusCode, error, message, details? }`.
 * Anything else falls through to Nest's default handler.
 */
@Catch(PredictionError)
export class PredictionErrorFilter implements ExceptionFilter {
  catch(error: PredictionError, host: ArgumentsHost) {
    const response = host.switchToHttp().getResponse<Response>();
    const status = STATUS_BY_KIND[error.kind];

    response.status(status).json({
      statusCode: status,
      error: error.kind,
      message: error.message,
      ...(error instanceof InputValidationError && error.details.length
        ? { details: error.details }
        : {}),
    });
  }
}
