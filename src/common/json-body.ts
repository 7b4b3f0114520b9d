import { ErrorRequestHandler, json } from 'express';
import { InputValidationError } from './errors';

export const MALFORMED_JSON_MESSAGE = 'Request body is not valid JSON';

/**
 * JSON body parser whose syntax errors surface as InputValidationError, so
 * they reach PredictionErrorFilter instead of Nest's SyntaxError mapping.
 * The app must be created with `bodyParser: false`.
 */
export function jsonBody() {
  return [json(), rejectMalformedJson] as const;
}

export const rejectMalformedJson: ErrorRequestHandler = (error: unknown, _req, _res, next) => {
  next(fromParseFailure(error));
};

export function fromParseFailure(error: unknown): unknown {
  return isParseFailure(error) ? new InputValidationError(MALFORMED_JSON_MESSAGE) : error;
}

// body-parser tags its own failures with `type`
function isParseFailure(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'type' in error &&
    error.type === 'entity.parse.failed'
  );
}
