/**
 * Domain error hierarchy for the prediction service.
 *
 * Every error carries a `kind` that the HTTP layer maps to a status code
 * (see PredictionErrorFilter). Only ValidationError and ModelMismatchError
 * ever reach a caller; PersistenceError is recovered inside the recorder and
 * StartupError stops the process before it listens.
 */
export type PredictionErrorKind =
  | 'ValidationError'
  | 'ModelMismatchError'
  | 'PersistenceError'
  | 'StartupError';

export interface FieldError {
  field: string;
  messages: string[];
}

export abstract class PredictionError extends Error {
  abstract readonly kind: PredictionErrorKind;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Client-caused: missing, non-numeric or unknown field, or households <= 0. */
export class InputValidationError extends PredictionError {
  readonly kind = 'ValidationError' as const;

  constructor(
    message: string,
    readonly details: FieldError[] = [],
  ) {
    super(message);
  }
}

/** Deployment defect: the feature vector does not fit the loaded model. */
export class ModelMismatchError extends PredictionError {
  readonly kind = 'ModelMismatchError' as const;
}

export type SinkName = 'log' | 'store';

export class PersistenceError extends PredictionError {
  readonly kind = 'PersistenceError' as const;

  constructor(
    readonly sink: SinkName,
    cause: unknown,
  ) {
    super(`${sink} sink write failed: ${describeError(cause)}`, { cause });
  }
}

/** The model artifact is missing or corrupt; the process must not serve. */
export class ModelLoadError extends PredictionError {
  readonly kind = 'StartupError' as const;

  constructor(
    readonly artifactPath: string,
    reason: string,
    options?: ErrorOptions,
  ) {
    super(`Cannot load model artifact ${artifactPath}: ${reason}`, options);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
