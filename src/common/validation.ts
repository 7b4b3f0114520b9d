import { FieldError, InputValidationError } from './errors';

/** The part of a class-validator ValidationError this module reads. */
export interface ConstraintViolation {
  property: string;
  constraints?: Record<string, string>;
  children?: ConstraintViolation[];
}

/**
 * Flatten class-validator output into field-level details.
 * Nested children are reported with dotted paths.
 */
export function toFieldErrors(
  errors: ConstraintViolation[],
  parent = '',
): FieldError[] {
  return errors.flatMap((error) => {
    const field = parent ? `${parent}.${error.property}` : error.property;
    const own: FieldError[] = error.constraints
      ? [{ field, messages: Object.values(error.constraints) }]
      : [];
    return [...own, ...toFieldErrors(error.children ?? [], field)];
  });
}

// Plugged into ValidationPipe so request errors share the domain shape
export function validationExceptionFactory(
  errors: ConstraintViolation[],
): InputValidationError {
  const details = toFieldErrors(errors);
  const fields = details.map((d) => d.field).join(', ');
  return new InputValidationError(`Invalid prediction request: ${fields}`, details);
}
